import { UsageError } from "./errors";
import type { ExportFormat } from "./types";

export type OsintArgs = {
  name: string;
  categories: string[];
  open: boolean;
  delayMs?: number;
  exportFormat?: ExportFormat;
  list: boolean;
  gui: boolean;
  help: boolean;
};

export type GoogleArgs = {
  query: string;
  interactive: boolean;
  gui: boolean;
  help: boolean;
};

const EXPORT_FORMATS: readonly ExportFormat[] = ["txt", "json", "csv"];

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("-")) throw new UsageError(`${flag} needs a value`);
  return value;
}

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

export function parseOsintArgs(argv: readonly string[]): OsintArgs {
  const args: OsintArgs = { name: "", categories: [], open: false, list: false, gui: false, help: false };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case "-c":
      case "--category":
        args.categories.push(takeValue(argv, i++, a));
        break;
      case "--delay": {
        const seconds = Number(takeValue(argv, i++, a));
        if (!Number.isFinite(seconds) || seconds < 0) throw new UsageError("--delay must be a number of seconds");
        args.delayMs = Math.round(seconds * 1000);
        break;
      }
      case "--export": {
        const format = takeValue(argv, i++, a);
        if (!isExportFormat(format)) throw new UsageError(`--export must be one of ${EXPORT_FORMATS.join(", ")}`);
        args.exportFormat = format;
        break;
      }
      case "--open":
        args.open = true;
        break;
      case "--list":
        args.list = true;
        break;
      case "--gui":
        args.gui = true;
        break;
      case "-h":
      case "--help":
        args.help = true;
        break;
      default:
        if (a.startsWith("-")) throw new UsageError(`Unknown option ${a}`);
        words.push(a);
    }
  }

  args.name = words.join(" ");
  return args;
}

export function parseGoogleArgs(argv: readonly string[]): GoogleArgs {
  const args: GoogleArgs = { query: "", interactive: false, gui: false, help: false };
  const words: string[] = [];

  for (const a of argv) {
    if (a === "-i" || a === "--interactive") args.interactive = true;
    else if (a === "--gui") args.gui = true;
    else if (a === "-h" || a === "--help") args.help = true;
    else if (a.startsWith("-")) throw new UsageError(`Unknown option ${a}`);
    else words.push(a);
  }

  args.query = words.join(" ");
  return args;
}
