export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export async function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

// Splits after . ! ? when the next word starts like a new sentence.
export function splitSentences(text: string): string[] {
  return collapseWhitespace(text)
    .split(/(?<=[.!?]["')\]]?)\s+(?=["'(\[]?[A-Z0-9])/)
    .map((s) => s.trim())
    .filter(Boolean);
}
