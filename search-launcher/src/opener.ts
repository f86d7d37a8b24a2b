import open from "open";
import { BROWSER_APP } from "./env";
import type { BrowserOpener } from "./types";

/**
 * Hands a url to the system browser, or to `app` when one is named.
 *
 * `open` spawns the launcher detached and returns before the child reports a
 * spawn failure, so the child's `error` event is turned into a rejection here.
 */
export function createBrowserOpener(app?: string): BrowserOpener {
  return async (url) => {
    // spawn errors are emitted on the next tick: start inside a microtask so the
    // listener below is attached before that tick runs.
    await Promise.resolve();
    const child = await open(url, app ? { app: { name: app } } : {});

    return new Promise<boolean>((resolve, reject) => {
      child.once("error", reject);
      if (child.pid !== undefined) resolve(true);
    });
  };
}

export const openInBrowser: BrowserOpener = createBrowserOpener(BROWSER_APP);
