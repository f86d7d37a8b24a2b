import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import morgan from "morgan";
import type { IncomingHttpHeaders } from "http";
import path from "path";
import { z } from "zod";
import { generate } from "../dispatcher";
import { LauncherError } from "../errors";
import { search } from "../googleSearch";
import { logInfo } from "../helpers/log.helper";
import { DispatchJobs } from "../jobs";
import type { TemplateRegistry } from "../registry";
import { exportResults } from "../save";
import type { BrowserOpener } from "../types";

export const PUBLIC_DIR = path.resolve(__dirname, "../../public");

const RecordSchema = z.object({
  category: z.string(),
  platform: z.string(),
  url: z.string(),
  error: z.string().optional(),
  generatedAt: z.string(),
});

const GenerateBodySchema = z.object({
  name: z.string().trim().min(1, "Name cannot be empty"),
  categories: z.array(z.string()).min(1, "Please select at least one category"),
});

const OpenBodySchema = z.object({
  records: z.array(RecordSchema).min(1, "No search results to open"),
  delayMs: z.number().int().min(0).max(60_000).optional(),
});

const SearchBodySchema = z.object({
  query: z.string(),
});

const ExportBodySchema = z.object({
  name: z.string().trim().min(1, "Name cannot be empty"),
  records: z.array(RecordSchema).min(1, "No search results to export"),
  format: z.enum(["txt", "json", "csv"]).default("txt"),
});

export type AppDeps = {
  registry: TemplateRegistry;
  opener: BrowserOpener;
  jobs?: DispatchJobs;
  defaultDelayMs: number;
  outputDir: string;
  searchBaseUrl?: string;
  requestLog?: boolean;
};

/** Requests without an `Origin` header (curl, same-origin GETs) pass. */
export function isSameOrigin(headers: IncomingHttpHeaders): boolean {
  const origin = headers.origin;
  if (!origin) return true;
  try {
    return new URL(origin).host === headers.host;
  } catch {
    return false;
  }
}

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? "Invalid request";
}

export function createApp(deps: AppDeps) {
  const jobs = deps.jobs ?? new DispatchJobs(deps.opener);
  const app = express();
  // The API opens browser windows and writes files: only the page served from
  // this same host may call it.
  app.use(cors((req, callback) => callback(null, { origin: isSameOrigin(req.headers) })));
  app.use("/api", (req, res, next) => {
    if (isSameOrigin(req.headers)) return next();
    return res.status(403).json({ ok: false, error: "Cross-origin requests are not allowed" });
  });

  app.use(express.json({ limit: "1mb" }));
  if (deps.requestLog !== false) app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "search-launcher" });
  });

  app.use(express.static(PUBLIC_DIR));

  app.get("/api/categories", (_req, res) => {
    const categories = deps.registry.listCategories().map((name) => ({
      name,
      platforms: [...deps.registry.templatesFor(name).keys()],
    }));
    res.json({ ok: true, categories });
  });

  app.post("/api/generate", (req, res) => {
    const parsed = GenerateBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
    }

    const records = generate(parsed.data.name, parsed.data.categories, { registry: deps.registry });
    return res.json({ ok: true, name: parsed.data.name, count: records.length, records });
  });

  app.post("/api/open", (req, res) => {
    const parsed = OpenBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
    }

    const job = jobs.start(parsed.data.records, parsed.data.delayMs ?? deps.defaultDelayMs);
    return res.status(202).json({ ok: true, job });
  });

  app.get("/api/jobs", (_req, res) => {
    res.json({ ok: true, jobs: jobs.list() });
  });

  app.get("/api/jobs/:id", (req, res) => {
    const job = jobs.get(req.params.id);
    if (!job) return res.status(404).json({ ok: false, error: "Job not found" });
    return res.json({ ok: true, job });
  });

  app.post("/api/search", async (req, res) => {
    const parsed = SearchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
    }

    const outcome = await search(parsed.data.query, deps.opener, deps.searchBaseUrl);
    return res.status(outcome.ok ? 200 : 400).json(outcome);
  });

  app.post("/api/export", async (req, res, next) => {
    const parsed = ExportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ ok: false, error: firstIssue(parsed.error) });
    }

    try {
      const { name, records, format } = parsed.data;
      const file = await exportResults(name, records, format, deps.outputDir);
      return res.json({ ok: true, file: { path: file, name: path.basename(file) } });
    } catch (err) {
      return next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  const onError: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof LauncherError) {
      return res.status(400).json({ ok: false, code: err.code, error: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ ok: false, error: "Malformed JSON body" });
    }
    const message = err instanceof Error ? err.message : "request failed";
    return res.status(500).json({ ok: false, error: message });
  };
  app.use(onError);

  return app;
}

export function startServer(deps: AppDeps, port: number, host: string) {
  const app = createApp(deps);
  return app.listen(port, host, () => {
    logInfo(`[UI] listening on http://${host}:${port}`);
    logInfo(`[UI] exports written to: ${path.resolve(deps.outputDir)}`);
  });
}
