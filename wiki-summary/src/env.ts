import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  WIKI_LANG: z
    .string()
    .regex(/^[a-z][a-z-]{1,11}$/, "must be a Wikipedia language code")
    .default("en"),
  WIKI_SENTENCES: z.coerce.number().int().min(1).max(50).default(8),
  USER_AGENT: z.string().min(1).default("research-launchers/1.0 (wiki-summary; local)"),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type WikiEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): WikiEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const { WIKI_LANG, WIKI_SENTENCES, USER_AGENT, HTTP_TIMEOUT_MS } = loadEnv();
