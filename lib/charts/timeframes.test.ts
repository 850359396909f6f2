import { describe, expect, it } from "vitest";
import { isTimeframe, parseTimeframes } from "./timeframes";

describe("timeframes", () => {
  it("knows the standard periods", () => {
    expect(isTimeframe("MN1")).toBe(true);
    expect(isTimeframe("H5")).toBe(false);
    expect(isTimeframe("toString")).toBe(false);
  });

  it("parses a list keeping order and dropping repeats", () => {
    expect(parseTimeframes(" d1,h4 , ,M15,H4")).toEqual({ timeframes: ["D1", "H4", "M15"], unknown: [] });
  });

  it("reports unknown names separately", () => {
    expect(parseTimeframes("H4,X9,m1")).toEqual({ timeframes: ["H4", "M1"], unknown: ["X9"] });
  });
});
