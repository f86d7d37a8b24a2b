#!/usr/bin/env node
import chalk from "chalk";
import { stdin, stdout } from "node:process";
import type { Readable } from "node:stream";
import { parseGoogleArgs, type GoogleArgs } from "./args";
import { startServer } from "./api/server";
import { HOST, OPEN_DELAY_MS, OUTPUT_DIR, PORT, SEARCH_BASE_URL } from "./env";
import { errorMessage } from "./errors";
import { search } from "./googleSearch";
import { logError } from "./helpers/log.helper";
import { runInteractive } from "./interactive";
import { openInBrowser } from "./opener";
import { getDefaultRegistry } from "./registry";
import type { BrowserOpener, SearchOutcome } from "./types";

export const GOOGLE_USAGE = `Usage:
  google-search 'John Smith'    # direct search
  google-search -i              # interactive mode
  google-search [--gui]         # browser UI`;

export const formatOutcome = (outcome: SearchOutcome): string => `${outcome.ok ? "✓" : "✗"} ${outcome.message}`;

export type GoogleDeps = {
  opener?: BrowserOpener;
  input?: Readable;
  baseUrl?: string;
};

function serve(opener: BrowserOpener, searchBaseUrl: string): number {
  startServer(
    { registry: getDefaultRegistry(), opener, defaultDelayMs: OPEN_DELAY_MS, outputDir: OUTPUT_DIR, searchBaseUrl },
    PORT,
    HOST
  );
  return 0;
}

export async function runGoogle(argv: string[], deps: GoogleDeps = {}): Promise<number> {
  const opener = deps.opener ?? openInBrowser;
  const baseUrl = deps.baseUrl ?? SEARCH_BASE_URL;

  let args: GoogleArgs;
  try {
    args = parseGoogleArgs(argv);
  } catch (err) {
    logError(errorMessage(err));
    console.log(GOOGLE_USAGE);
    return 0;
  }

  if (args.help) {
    console.log(GOOGLE_USAGE);
    return 0;
  }

  if (args.gui) return serve(opener, baseUrl);

  if (args.interactive) {
    console.log("Web Search Tool - Interactive Mode");
    console.log("Type 'quit' or 'exit' to stop\n");
    await runInteractive(deps.input ?? stdin, stdout, async (query) => formatOutcome(await search(query, opener, baseUrl)));
    return 0;
  }

  if (args.query) {
    console.log(formatOutcome(await search(args.query, opener, baseUrl)));
    return 0;
  }

  return serve(opener, baseUrl);
}

if (require.main === module) {
  runGoogle(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((e) => {
      console.error(chalk.red("Error:"), errorMessage(e));
      process.exit(1);
    });
}
