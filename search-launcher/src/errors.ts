export type LauncherErrorCode =
  | "EMPTY_QUERY"
  | "NO_CATEGORIES_SELECTED"
  | "UNKNOWN_CATEGORY"
  | "TEMPLATE_EXPANSION"
  | "BROWSER_OPEN"
  | "USAGE";

export class LauncherError extends Error {
  constructor(readonly code: LauncherErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyQueryError extends LauncherError {
  constructor(what = "Query") {
    super("EMPTY_QUERY", `${what} cannot be empty`);
  }
}

export class NoCategoriesSelectedError extends LauncherError {
  constructor() {
    super("NO_CATEGORIES_SELECTED", "Please select at least one category");
  }
}

export class UnknownCategoryError extends LauncherError {
  constructor(readonly category: string) {
    super("UNKNOWN_CATEGORY", `Unknown category: ${category}`);
  }
}

export class TemplateExpansionError extends LauncherError {
  constructor(readonly pattern: string, reason: string) {
    super("TEMPLATE_EXPANSION", `${reason} in template ${pattern}`);
  }
}

export class BrowserOpenError extends LauncherError {
  constructor(readonly url: string, cause?: unknown) {
    super("BROWSER_OPEN", `Could not open ${url}${cause ? `: ${errorMessage(cause)}` : ""}`);
  }
}

export class UsageError extends LauncherError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
