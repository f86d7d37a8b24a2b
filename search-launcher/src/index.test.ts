import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OSINT_USAGE, runOsint } from "./index";
import { loadRegistry } from "./registry";

const registry = loadRegistry();

describe("runOsint", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "osint-cli-"));
    log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("should print the listing for the chosen categories", async () => {
    const opener = vi.fn(async () => true);

    const code = await runOsint(["Jane", "Doe", "-c", "Social Media"], { opener, registry, outputDir: dir });

    expect(code).toBe(0);
    const listing = String(log.mock.calls[0][0]);
    expect(listing).toContain("OSINT Investigation Results for: Jane Doe");
    expect(listing).toContain("LinkedIn: https://www.linkedin.com/search/results/people/?keywords=Jane+Doe");
    expect(listing).not.toContain("[Professional]");
    expect(opener).not.toHaveBeenCalled();
  });

  it("should open every link with --open", async () => {
    const opener = vi.fn(async (_url: string) => true);
    const wait = vi.fn(async (_ms: number) => undefined);

    await runOsint(["Jane Doe", "-c", "Social Media", "--open", "--delay", "0.5"], {
      opener,
      registry,
      outputDir: dir,
      wait,
    });

    expect(opener).toHaveBeenCalledTimes(8);
    expect(wait).toHaveBeenCalledTimes(7);
    expect(wait).toHaveBeenCalledWith(500);
  });

  it("should export the results when asked", async () => {
    await runOsint(["Jane Doe", "--export", "json"], { registry, outputDir: dir, opener: vi.fn(async () => true) });

    const files = await readdir(dir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^osint_results_\d{8}_\d{6}\.json$/);
  });

  it("should list the categories", async () => {
    await runOsint(["--list"], { registry });
    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "Social Media (8)",
      "Professional (6)",
      "Public Records (7)",
      "Business & Legal (5)",
      "Dark Web & Breach Data (3)",
    ]);
  });

  it("should report an unknown category and still exit 0", async () => {
    const code = await runOsint(["Jane Doe", "-c", "Astrology"], { registry });
    expect(code).toBe(0);
    expect(error).toHaveBeenCalledWith(expect.stringContaining("Unknown category: Astrology"));
  });

  it("should print usage for bad options", async () => {
    const code = await runOsint(["--export"], { registry });
    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(OSINT_USAGE);
  });
});
