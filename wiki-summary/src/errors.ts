export type CollaboratorErrorCode = "NOT_FOUND" | "DISAMBIGUATION" | "UPSTREAM";

export class CollaboratorError extends Error {
  constructor(readonly code: CollaboratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PageNotFoundError extends CollaboratorError {
  constructor(readonly topic: string) {
    super("NOT_FOUND", `Page id "${topic}" does not match any pages. Try another id!`);
  }
}

export class DisambiguationError extends CollaboratorError {
  constructor(readonly topic: string, readonly options: string[]) {
    super("DISAMBIGUATION", `"${topic}" may refer to: ${options.length ? options.join(", ") : "several pages"}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
