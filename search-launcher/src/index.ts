#!/usr/bin/env node
import chalk from "chalk";
import { parseOsintArgs, type OsintArgs } from "./args";
import { startServer } from "./api/server";
import { generate, openAll } from "./dispatcher";
import { HOST, OPEN_DELAY_MS, OUTPUT_DIR, PORT } from "./env";
import { errorMessage, LauncherError } from "./errors";
import { logError, logInfo, logSuccess, logWarn } from "./helpers/log.helper";
import { openInBrowser } from "./opener";
import { getDefaultRegistry, type TemplateRegistry } from "./registry";
import { exportResults, formatListing } from "./save";
import type { BrowserOpener, SearchRecord } from "./types";

export const OSINT_USAGE = `Usage:
  osint-search "Jane Doe"                     # all categories
  osint-search "Jane Doe" -c "Social Media"   # one or more categories
  osint-search "Jane Doe" --open --delay 2    # open every link, 2s apart
  osint-search "Jane Doe" --export csv        # write txt, json or csv
  osint-search --list                         # show categories
  osint-search [--gui]                        # browser UI`;

export type OsintDeps = {
  opener?: BrowserOpener;
  registry?: TemplateRegistry;
  outputDir?: string;
  wait?: (ms: number) => Promise<unknown>;
};

function printBanner() {
  logWarn("OSINT People Investigation Tool");
  logWarn("=".repeat(40));
  logWarn("ETHICAL USE ONLY: background checks, journalism and research,");
  logWarn("cybersecurity investigations and due diligence.");
  logWarn("Please respect privacy laws and platform terms of service.");
  logWarn("=".repeat(40) + "\n");
}

export async function runOsint(argv: string[], deps: OsintDeps = {}): Promise<number> {
  const opener = deps.opener ?? openInBrowser;
  const registry = deps.registry ?? getDefaultRegistry();
  const outputDir = deps.outputDir ?? OUTPUT_DIR;

  let args: OsintArgs;
  try {
    args = parseOsintArgs(argv);
  } catch (err) {
    logError(errorMessage(err));
    console.log(OSINT_USAGE);
    return 0;
  }

  if (args.help) {
    console.log(OSINT_USAGE);
    return 0;
  }

  if (args.list) {
    for (const category of registry.listCategories()) {
      console.log(`${category} (${registry.platformCount(category)})`);
    }
    return 0;
  }

  printBanner();

  if (args.gui || !args.name) {
    startServer({ registry, opener, defaultDelayMs: OPEN_DELAY_MS, outputDir }, PORT, HOST);
    return 0;
  }

  const categories = args.categories.length ? args.categories : registry.listCategories();

  let records: SearchRecord[];
  try {
    records = generate(args.name, categories, { registry });
  } catch (err) {
    if (err instanceof LauncherError) {
      logError(err.message);
      return 0;
    }
    throw err;
  }

  const generatedAt = new Date();
  console.log(formatListing(args.name, records, generatedAt));
  logSuccess(`Investigation complete! Generated ${records.length} search queries`);

  if (args.exportFormat) {
    const file = await exportResults(args.name, records, args.exportFormat, outputDir, generatedAt);
    logInfo(`Results exported to ${file}`);
  }

  if (args.open) {
    logInfo("Opening browser tabs...");
    const opened = await openAll(records, args.delayMs ?? OPEN_DELAY_MS, opener, { wait: deps.wait });
    logSuccess(`Opened ${opened} browser tabs`);
  }

  return 0;
}

if (require.main === module) {
  runOsint(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((e) => {
      console.error(chalk.red("Error:"), errorMessage(e));
      process.exit(1);
    });
}
