import "dotenv/config";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3333),
  HOST: z.string().default("127.0.0.1"),
  OPEN_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(2000),
  OUTPUT_DIR: z.string().min(1).default("data/out"),
  SEARCH_BASE_URL: z.string().url().default("https://www.google.com/search?q="),
  BROWSER_APP: z.string().min(1).optional(),
});

export type LauncherEnv = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): LauncherEnv {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export const { PORT, HOST, OPEN_DELAY_MS, OUTPUT_DIR, SEARCH_BASE_URL, BROWSER_APP } = loadEnv();
