import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import request from "supertest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createApp } from "./server";
import { DispatchJobs } from "../jobs";
import { loadRegistry } from "../registry";

const registry = loadRegistry();

describe("search-launcher api", () => {
  let dir: string;
  let opener: Mock<(url: string) => Promise<boolean>>;
  let jobs: DispatchJobs;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "osint-api-"));
    opener = vi.fn(async (_url: string) => true);
    jobs = new DispatchJobs(opener, { wait: async () => undefined, log: vi.fn() });
    app = createApp({
      registry,
      opener,
      jobs,
      defaultDelayMs: 0,
      outputDir: dir,
      searchBaseUrl: "https://www.google.com/search?q=",
      requestLog: false,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("GET /health", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, service: "search-launcher" });
  });

  it("GET / serves the UI page", async () => {
    const res = await request(app).get("/");
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toContain("text/html");
  });

  it("GET /api/categories lists categories with their platforms", async () => {
    const res = await request(app).get("/api/categories");
    expect(res.status).toBe(200);
    expect(res.body.categories).toHaveLength(5);
    expect(res.body.categories[0].name).toBe("Social Media");
    expect(res.body.categories[0].platforms).toHaveLength(8);
  });

  it("POST /api/generate returns ordered records", async () => {
    const res = await request(app)
      .post("/api/generate")
      .send({ name: "Jane Doe", categories: ["Social Media", "Dark Web & Breach Data"] });

    expect(res.status).toBe(200);
    expect(res.body.count).toBe(11);
    expect(res.body.records[0].url).toBe("https://www.linkedin.com/search/results/people/?keywords=Jane+Doe");
    expect(res.body.records[10].platform).toBe("Intelligence X");
  });

  it("POST /api/generate rejects a blank name", async () => {
    const res = await request(app).post("/api/generate").send({ name: "  ", categories: ["Social Media"] });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "Name cannot be empty" });
  });

  it("POST /api/generate rejects an empty category list", async () => {
    const res = await request(app).post("/api/generate").send({ name: "Jane Doe", categories: [] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Please select at least one category");
  });

  it("POST /api/generate rejects unknown categories", async () => {
    const res = await request(app).post("/api/generate").send({ name: "Jane Doe", categories: ["Astrology"] });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, code: "UNKNOWN_CATEGORY", error: "Unknown category: Astrology" });
  });

  it("POST /api/open starts a job that can be polled", async () => {
    const generated = await request(app)
      .post("/api/generate")
      .send({ name: "Jane Doe", categories: ["Dark Web & Breach Data"] });

    const started = await request(app).post("/api/open").send({ records: generated.body.records, delayMs: 0 });
    expect(started.status).toBe(202);

    await jobs.wait(started.body.job.id);
    const polled = await request(app).get(`/api/jobs/${started.body.job.id}`);

    expect(polled.status).toBe(200);
    expect(polled.body.job).toMatchObject({ status: "completed", total: 3, opened: 3 });
    expect(opener).toHaveBeenCalledTimes(3);

    const listed = await request(app).get("/api/jobs");
    expect(listed.body.jobs.map((j: { id: string }) => j.id)).toEqual([started.body.job.id]);
  });

  it("POST /api/open rejects an empty batch", async () => {
    const res = await request(app).post("/api/open").send({ records: [] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("No search results to open");
  });

  it("GET /api/jobs/:id returns 404 for unknown jobs", async () => {
    const res = await request(app).get("/api/jobs/nope");
    expect(res.status).toBe(404);
  });

  it("POST /api/search opens a single query", async () => {
    const res = await request(app).post("/api/search").send({ query: "John Smith" });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      ok: true,
      message: "Opened search for: John Smith",
      url: "https://www.google.com/search?q=John+Smith",
    });
  });

  it("POST /api/search refuses an empty query", async () => {
    const res = await request(app).post("/api/search").send({ query: "   " });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, message: "Query cannot be empty" });
    expect(opener).not.toHaveBeenCalled();
  });

  it("POST /api/export writes a file to the output directory", async () => {
    const generated = await request(app).post("/api/generate").send({ name: "Jane Doe", categories: ["Professional"] });

    const res = await request(app)
      .post("/api/export")
      .send({ name: "Jane Doe", records: generated.body.records, format: "csv" });

    expect(res.status).toBe(200);
    expect(res.body.file.name).toMatch(/^osint_results_\d{8}_\d{6}\.csv$/);
    expect(await readdir(dir)).toEqual([res.body.file.name]);
  });

  it("refuses a cross-origin preflight without CORS headers", async () => {
    const res = await request(app)
      .options("/api/open")
      .set("Origin", "https://elsewhere.test")
      .set("Access-Control-Request-Method", "POST")
      .set("Access-Control-Request-Headers", "content-type");

    expect(res.status).toBe(403);
    expect(res.headers["access-control-allow-origin"]).toBeUndefined();
  });

  it("refuses to open urls for another origin", async () => {
    const res = await request(app)
      .post("/api/open")
      .set("Origin", "https://elsewhere.test")
      .send({
        records: [
          { category: "Test", platform: "A", url: "https://elsewhere.test/page", generatedAt: "2025-05-27T10:00:00.000Z" },
        ],
      });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ ok: false, error: "Cross-origin requests are not allowed" });
    expect(jobs.list()).toEqual([]);
    expect(opener).not.toHaveBeenCalled();
  });

  it("accepts requests from the page it serves", async () => {
    const res = await request(app)
      .post("/api/search")
      .set("Host", "127.0.0.1:3333")
      .set("Origin", "http://127.0.0.1:3333")
      .send({ query: "John Smith" });

    expect(res.status).toBe(200);
    expect(res.headers["access-control-allow-origin"]).toBe("http://127.0.0.1:3333");
  });

  it("answers malformed JSON with 400", async () => {
    const res = await request(app).post("/api/generate").set("Content-Type", "application/json").send("{oops");
    expect(res.status).toBe(400);
  });

  it("answers unknown routes with 404", async () => {
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ ok: false, error: "Not found" });
  });
});
