import { describe, it, expect } from "vitest";
import { parseGoogleArgs, parseOsintArgs } from "./args";
import { UsageError } from "./errors";

describe("parseOsintArgs", () => {
  it("should collect name words, categories and options", () => {
    expect(
      parseOsintArgs([
        "Jane",
        "Doe",
        "-c",
        "Social Media",
        "--category",
        "Professional",
        "--open",
        "--delay",
        "1.5",
        "--export",
        "csv",
      ])
    ).toEqual({
      name: "Jane Doe",
      categories: ["Social Media", "Professional"],
      open: true,
      delayMs: 1500,
      exportFormat: "csv",
      list: false,
      gui: false,
      help: false,
    });
  });

  it("should default to no name and no categories", () => {
    expect(parseOsintArgs([])).toMatchObject({ name: "", categories: [], gui: false });
  });

  it.each([
    [["--export", "xml"]],
    [["--delay", "soon"]],
    [["-c"]],
    [["--verbose"]],
  ])("should reject %j", (argv) => {
    expect(() => parseOsintArgs(argv)).toThrow(UsageError);
  });
});

describe("parseGoogleArgs", () => {
  it("should join query words", () => {
    expect(parseGoogleArgs(["John", "Smith", "LinkedIn"])).toEqual({
      query: "John Smith LinkedIn",
      interactive: false,
      gui: false,
      help: false,
    });
  });

  it("should read the mode flags", () => {
    expect(parseGoogleArgs(["-i"]).interactive).toBe(true);
    expect(parseGoogleArgs(["--interactive"]).interactive).toBe(true);
    expect(parseGoogleArgs(["--gui"]).gui).toBe(true);
    expect(parseGoogleArgs(["-h"]).help).toBe(true);
  });

  it("should reject unknown options", () => {
    expect(() => parseGoogleArgs(["--lucky"])).toThrow(UsageError);
  });
});
