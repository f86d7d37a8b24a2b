import { TemplateExpansionError } from "./errors";
import type { EscapeMode, PlatformTemplate } from "./types";

const SLOT = /\{([^{}]*)\}/g;

type SlotShape = { kind: "positional" } | { kind: "named" };

export function escapePercent(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

// form-style: only A-Z a-z 0-9 _ . - ~ survive, space becomes "+"
export function escapePlus(value: string): string {
  return escapePercent(value).replace(/%20/g, "+");
}

export function escapeValue(value: string, mode: EscapeMode): string {
  return mode === "percent" ? escapePercent(value) : escapePlus(value);
}

function slotShape(pattern: string): SlotShape {
  const slots = Array.from(pattern.matchAll(SLOT), (m) => m[1]);
  if (slots.length === 0) throw new TemplateExpansionError(pattern, "No substitution slot");

  const positional = slots.filter((s) => s === "").length;
  const named = slots.filter((s) => s !== "");

  if (positional && named.length) throw new TemplateExpansionError(pattern, "Mixed positional and named slots");
  if (positional > 1) throw new TemplateExpansionError(pattern, "More than one positional slot");
  if (positional === 1) return { kind: "positional" };

  const unknown = named.find((s) => s !== "first" && s !== "last");
  if (unknown) throw new TemplateExpansionError(pattern, `Unknown slot {${unknown}}`);
  if (!named.includes("first") || !named.includes("last")) {
    throw new TemplateExpansionError(pattern, "Named templates need both {first} and {last}");
  }
  return { kind: "named" };
}

export function splitName(name: string): { first: string; last: string } {
  const [first = "", ...rest] = name.trim().split(/\s+/);
  return { first, last: rest.join(" ") };
}

/**
 * Substitutes a subject name into a URL pattern.
 *
 * A single `{}` slot receives the whole trimmed name. `{first}`/`{last}` slots
 * receive the first whitespace token and the remaining tokens; a one-word name
 * leaves `{last}` empty.
 *
 * @throws TemplateExpansionError when the pattern has no usable slot layout
 */
export function expand(name: string, template: string | PlatformTemplate, escape: EscapeMode = "plus"): string {
  const pattern = typeof template === "string" ? template : template.urlPattern;
  const mode = typeof template === "string" ? escape : template.escape;
  const shape = slotShape(pattern);

  if (shape.kind === "positional") {
    return pattern.replace("{}", () => escapeValue(name.trim(), mode));
  }

  const parts = splitName(name);
  return pattern.replace(SLOT, (_, slot: string) => escapeValue(slot === "first" ? parts.first : parts.last, mode));
}
