import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { WIKI_LANG } from "./env";
import { CollaboratorError, DisambiguationError, errorMessage, PageNotFoundError } from "./errors";
import { getJson, http } from "./http";
import { firstSentences } from "./parse";
import type { Summary, WikiPage } from "./types";

const PageSchema = z.object({
  title: z.string(),
  missing: z.boolean().optional(),
  invalid: z.boolean().optional(),
  extract: z.string().optional(),
  pageprops: z.record(z.unknown()).optional(),
});

const QueryResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(PageSchema).default([]),
    })
    .optional(),
});

const LinksResponseSchema = z.object({
  query: z
    .object({
      pages: z.array(z.object({ links: z.array(z.object({ ns: z.number(), title: z.string() })).optional() })),
    })
    .optional(),
});

export type WikiClientOptions = {
  client?: AxiosInstance;
  lang?: string;
};

export const apiUrl = (lang: string) => `https://${lang}.wikipedia.org/w/api.php`;
export const pageUrl = (lang: string, title: string) =>
  `https://${lang}.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;

async function request(client: AxiosInstance, lang: string, params: Record<string, string | number>): Promise<unknown> {
  try {
    return await getJson(client, apiUrl(lang), { action: "query", format: "json", formatversion: 2, ...params });
  } catch (err) {
    const detail = axios.isAxiosError(err) && err.response ? `HTTP ${err.response.status}` : errorMessage(err);
    throw new CollaboratorError("UPSTREAM", `Wikipedia request failed: ${detail}`, { cause: err });
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) throw new CollaboratorError("UPSTREAM", "Unexpected response from Wikipedia");
  return parsed.data;
}

export async function fetchIntro(topic: string, options: WikiClientOptions = {}): Promise<WikiPage> {
  const client = options.client ?? http;
  const lang = options.lang ?? WIKI_LANG;

  const data = parseResponse(
    QueryResponseSchema,
    await request(client, lang, { prop: "extracts|pageprops", exintro: 1, redirects: 1, titles: topic })
  );

  const page = data.query?.pages[0];
  if (!page || page.missing || page.invalid) throw new PageNotFoundError(topic);

  return {
    title: page.title,
    extractHtml: page.extract ?? "",
    disambiguation: page.pageprops?.disambiguation !== undefined,
  };
}

export async function fetchDisambiguationOptions(title: string, options: WikiClientOptions = {}): Promise<string[]> {
  const client = options.client ?? http;
  const lang = options.lang ?? WIKI_LANG;

  const data = parseResponse(
    LinksResponseSchema,
    await request(client, lang, { prop: "links", plnamespace: 0, pllimit: "max", titles: title })
  );

  return (data.query?.pages[0]?.links ?? []).map((l) => l.title);
}

/**
 * Looks up the article intro for `topic` and keeps its first `sentences`
 * sentences, with the resolved title and page url.
 *
 * Throws PageNotFoundError when no article matches and DisambiguationError,
 * listing the candidate titles, when the topic lands on a disambiguation page.
 */
export async function fetchSummary(topic: string, sentences: number, options: WikiClientOptions = {}): Promise<Summary> {
  const lang = options.lang ?? WIKI_LANG;
  const trimmed = topic.trim();
  if (!trimmed) throw new PageNotFoundError(topic);

  const page = await fetchIntro(trimmed, options);
  if (page.disambiguation) {
    throw new DisambiguationError(trimmed, await fetchDisambiguationOptions(page.title, options));
  }

  const picked = firstSentences(page.extractHtml, sentences);
  if (!picked.length) throw new PageNotFoundError(trimmed);

  return {
    topic: trimmed,
    title: page.title,
    sentences: picked,
    text: picked.join(" "),
    url: pageUrl(lang, page.title),
  };
}

/** The first `sentences` sentences of the article intro for `topic`, as one string. */
export async function summarize(topic: string, sentences: number, options: WikiClientOptions = {}): Promise<string> {
  return (await fetchSummary(topic, sentences, options)).text;
}
