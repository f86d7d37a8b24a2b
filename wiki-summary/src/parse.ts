import { load } from "cheerio";
import { collapseWhitespace, splitSentences } from "./utils";

/** Paragraph text of an article intro, without reference markers or empty placeholders. */
export function introParagraphs(html: string): string[] {
  const $ = load(html);
  $(".mw-empty-elt, sup.reference, style").remove();

  const paragraphs = $("p")
    .map((_, p) => collapseWhitespace($(p).text()))
    .get()
    .filter((text) => text.length > 0);

  if (paragraphs.length) return paragraphs;

  const plain = collapseWhitespace($.root().text());
  return plain ? [plain] : [];
}

export function firstSentences(html: string, count: number): string[] {
  return introParagraphs(html).flatMap(splitSentences).slice(0, count);
}
