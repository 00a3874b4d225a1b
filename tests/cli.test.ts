import { describe, expect, it } from "vitest";
import { optionalNumberArg, parseArgs, requireArg } from "../src/utils/cli.js";

describe("parseArgs", () => {
  it("reads spaced, inline and bare flags", () => {
    expect(parseArgs(["--input", "base.xlsx", "--hi=0.85", "--dry", "solto"])).toEqual({
      input: "base.xlsx",
      hi: "0.85",
      dry: "solto",
    });
    expect(parseArgs(["--dry", "--lo", "0.6"])).toEqual({ dry: true, lo: "0.6" });
  });
});

describe("argument helpers", () => {
  it("requires non-empty values", () => {
    expect(requireArg({ catalog: "catalogo.xlsx" }, "catalog")).toBe("catalogo.xlsx");
    expect(() => requireArg({ catalog: true }, "catalog")).toThrow("Missing required argument --catalog");
  });

  it("parses numeric arguments", () => {
    expect(optionalNumberArg({ hi: "0.85" }, "hi")).toBe(0.85);
    expect(optionalNumberArg({}, "hi")).toBeUndefined();
    expect(() => optionalNumberArg({ hi: "alto" }, "hi")).toThrow('Argument --hi must be a number, got "alto"');
  });
});
