import { describe, it, expect } from "vitest";
import { mapHeaders, parseCsv, parseIntSafe } from "../src/lib/csv";

describe("parseCsv", () => {
  it("handles quoted fields, CRLF and blank lines", () => {
    const rows = parseCsv('data_set,sent\r\n"GLB_AUTO, ""A""",1200\r\n\r\nATT_HOME,"3,400"\n');
    expect(rows).toEqual([
      ["data_set", "sent"],
      ['GLB_AUTO, "A"', "1200"],
      ["ATT_HOME", "3,400"],
    ]);
  });
});

describe("mapHeaders", () => {
  it("matches aliases after normalising headers", () => {
    expect(mapHeaders(["\uFEFFData-Set", "Sent "], { code: ["data set"], sent: ["sent"], list: ["list id"] })).toEqual({
      code: 0,
      sent: 1,
    });
  });
});

describe("parseIntSafe", () => {
  it("strips thousands separators", () => {
    expect(parseIntSafe("3,400")).toBe(3400);
    expect(parseIntSafe(" ")).toBeNull();
    expect(parseIntSafe("n/a")).toBeNull();
  });
});
