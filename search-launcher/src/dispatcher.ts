import { BrowserOpenError, EmptyQueryError, errorMessage, NoCategoriesSelectedError, UnknownCategoryError } from "./errors";
import { expand } from "./expand";
import { logError } from "./helpers/log.helper";
import { getDefaultRegistry, TemplateRegistry } from "./registry";
import type { BrowserOpener, OpenEvent, SearchRecord } from "./types";
import { sleep } from "./utils";

export type GenerateOptions = {
  registry?: TemplateRegistry;
  now?: () => Date;
};

export type OpenAllOptions = {
  onEvent?: (event: OpenEvent) => void;
  wait?: (ms: number) => Promise<unknown>;
  log?: (message: string) => void;
};

const OPENABLE_SCHEME = /^https?:\/\//i;

export function isOpenable(record: SearchRecord): boolean {
  return !record.error && OPENABLE_SCHEME.test(record.url);
}

/**
 * Expands every template of the selected categories for one subject name.
 * Categories come out in the order given, platforms in registry order. A
 * template that cannot be expanded becomes an error record instead of
 * aborting the batch.
 */
export function generate(name: string, categories: readonly string[], options: GenerateOptions = {}): SearchRecord[] {
  const registry = options.registry ?? getDefaultRegistry();
  const now = options.now ?? (() => new Date());

  const subject = name.trim();
  if (!subject) throw new EmptyQueryError("Name");
  if (categories.length === 0) throw new NoCategoriesSelectedError();

  const unknown = categories.find((c) => !registry.has(c));
  if (unknown !== undefined) throw new UnknownCategoryError(unknown);

  const records: SearchRecord[] = [];
  for (const category of categories) {
    for (const [platform, template] of registry.templatesFor(category)) {
      const generatedAt = now().toISOString();
      try {
        records.push({ category, platform, url: expand(subject, template), generatedAt });
      } catch (err) {
        const reason = errorMessage(err);
        records.push({ category, platform, url: `Error: ${reason}`, error: reason, generatedAt });
      }
    }
  }
  return records;
}

/**
 * Opens the records one after another, waiting `delayMs` after each attempt.
 * Error records and non-http(s) urls are skipped; a failed open is logged and
 * the rest of the sequence still runs.
 *
 * @returns how many urls were opened
 */
export async function openAll(
  records: readonly SearchRecord[],
  delayMs: number,
  opener: BrowserOpener,
  options: OpenAllOptions = {}
): Promise<number> {
  const wait = options.wait ?? sleep;
  const log = options.log ?? logError;
  const openable = records.filter(isOpenable);
  let opened = 0;

  for (const record of records) {
    if (!isOpenable(record)) {
      options.onEvent?.({ record, status: "skipped" });
      continue;
    }

    try {
      const ok = await opener(record.url);
      if (!ok) throw new BrowserOpenError(record.url);
      opened++;
      options.onEvent?.({ record, status: "opened" });
    } catch (err) {
      const failure = err instanceof BrowserOpenError ? err : new BrowserOpenError(record.url, err);
      log(`Error opening ${record.platform}: ${failure.message}`);
      options.onEvent?.({ record, status: "failed", error: failure.message });
    }

    if (record !== openable[openable.length - 1] && delayMs > 0) {
      await wait(delayMs);
    }
  }

  return opened;
}
