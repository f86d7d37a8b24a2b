import { describe, it, expect } from "vitest";
import { loadEnv } from "./env";

describe("loadEnv", () => {
  it("should fill in defaults", () => {
    expect(loadEnv({})).toEqual({
      PORT: 3333,
      HOST: "127.0.0.1",
      OPEN_DELAY_MS: 2000,
      OUTPUT_DIR: "data/out",
      SEARCH_BASE_URL: "https://www.google.com/search?q=",
    });
  });

  it("should coerce numeric settings", () => {
    expect(loadEnv({ PORT: "8080", OPEN_DELAY_MS: "500" })).toMatchObject({ PORT: 8080, OPEN_DELAY_MS: 500 });
  });

  it("should refuse a negative delay", () => {
    expect(() => loadEnv({ OPEN_DELAY_MS: "-1" })).toThrow(/OPEN_DELAY_MS/);
  });

  it("should refuse a search base that is not a url", () => {
    expect(() => loadEnv({ SEARCH_BASE_URL: "google" })).toThrow(/SEARCH_BASE_URL/);
  });
});
