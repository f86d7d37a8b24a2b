import fs from "fs";
import path from "path";
import { z } from "zod";
import { UnknownCategoryError } from "./errors";
import type { PlatformTemplate } from "./types";

export const DEFAULT_PLATFORMS_FILE = path.resolve(__dirname, "../data/platforms.json");

const TemplateEntrySchema = z.object({
  url: z.string().min(1),
  escape: z.enum(["plus", "percent"]).default("plus"),
});

const PlatformTableSchema = z.record(z.string().min(1), z.record(z.string().min(1), TemplateEntrySchema));

export type PlatformTable = z.input<typeof PlatformTableSchema>;

/**
 * Read-only category → platform → URL template table.
 *
 * Categories and platforms keep the order in which they are declared, which is
 * also the order records are generated in.
 */
export class TemplateRegistry {
  private readonly categories: ReadonlyMap<string, ReadonlyMap<string, PlatformTemplate>>;

  constructor(table: PlatformTable) {
    const parsed = PlatformTableSchema.parse(table);
    const categories = new Map<string, ReadonlyMap<string, PlatformTemplate>>();

    for (const [category, platforms] of Object.entries(parsed)) {
      const templates = new Map<string, PlatformTemplate>();
      for (const [platform, entry] of Object.entries(platforms)) {
        templates.set(platform, Object.freeze({ category, platform, urlPattern: entry.url, escape: entry.escape }));
      }
      categories.set(category, templates);
    }

    this.categories = categories;
  }

  listCategories(): string[] {
    return [...this.categories.keys()];
  }

  has(category: string): boolean {
    return this.categories.has(category);
  }

  templatesFor(category: string): ReadonlyMap<string, PlatformTemplate> {
    const templates = this.categories.get(category);
    if (!templates) throw new UnknownCategoryError(category);
    return templates;
  }

  platformCount(category: string): number {
    return this.templatesFor(category).size;
  }
}

export function loadRegistry(file = DEFAULT_PLATFORMS_FILE): TemplateRegistry {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  return new TemplateRegistry(PlatformTableSchema.parse(raw));
}

let defaultRegistry: TemplateRegistry | null = null;

export function getDefaultRegistry(): TemplateRegistry {
  if (!defaultRegistry) defaultRegistry = loadRegistry();
  return defaultRegistry;
}
