import { EmptyQueryError, errorMessage } from "./errors";
import { escapePlus } from "./expand";
import { SEARCH_BASE_URL } from "./env";
import type { BrowserOpener, SearchOutcome } from "./types";

export function buildSearchUrl(query: string, baseUrl = SEARCH_BASE_URL): string {
  const q = query.trim();
  if (!q) throw new EmptyQueryError();
  return baseUrl + escapePlus(q);
}

/** Opens one web search for `query`. Never throws; failures come back as `ok: false`. */
export async function search(query: string, opener: BrowserOpener, baseUrl = SEARCH_BASE_URL): Promise<SearchOutcome> {
  let url: string;
  try {
    url = buildSearchUrl(query, baseUrl);
  } catch (err) {
    return { ok: false, message: errorMessage(err) };
  }

  try {
    const opened = await opener(url);
    if (!opened) return { ok: false, message: "Error opening browser", url };
    return { ok: true, message: `Opened search for: ${query.trim()}`, url };
  } catch (err) {
    return { ok: false, message: `Error opening browser: ${errorMessage(err)}`, url };
  }
}
