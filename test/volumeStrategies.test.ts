import { describe, it, expect, vi } from "vitest";
import {
  buildListVolumes,
  buildSegmentVolumes,
  extractDataSetCodeFromSegment,
  isPartnerSegment,
  parseContactActivityCsv,
  resolveFirst,
} from "../src/volume/strategies";
import { createPartnerVolumeResolver, resolveTotalEspSends } from "../src/volume/partnerVolumeResolver";

describe("segment volumes", () => {
  it("strips engagement suffixes in a single ordered pass", () => {
    expect(extractDataSetCodeFromSegment("m77_wit_openers")).toBe("M77_WIT");
    expect(extractDataSetCodeFromSegment("GLB_BR_ALL_30D")).toBe("GLB_BR_ALL");
    expect(extractDataSetCodeFromSegment("ATT_30DC_CLICKERS_")).toBe("ATT_30DC_CLICKERS");
    expect(extractDataSetCodeFromSegment("SCO_FIN_OPENERS_ALL")).toBe("SCO_FIN_OPENERS");
  });

  it("accepts only known partner prefixes", () => {
    expect(isPartnerSegment(" har_home ")).toBe(true);
    expect(isPartnerSegment("MAS")).toBe(true);
    expect(isPartnerSegment("MASTER_LIST")).toBe(false);
  });

  it("sums sends per data-set code", () => {
    const volumes = buildSegmentVolumes([
      { segmentName: "M77_WIT_OPENERS", sent: 100 },
      { segmentName: "M77_WIT_CLICKERS", sent: 50 },
      { segmentName: "GLB_BR_ALL", sent: 70 },
      { segmentName: "Seed list", sent: 10 },
      { segmentName: "SCO_FIN", sent: 0 },
    ]);
    expect(volumes).toEqual({ M77_WIT: 150, GLB_BR: 70 });
  });
});

describe("list volumes", () => {
  it("joins names to sends and normalises codes", () => {
    const volumes = buildListVolumes(
      [
        { id: "1", name: " m77_wit_ " },
        { id: "2", name: "Main" },
      ],
      [
        { listId: "1", sent: 40 },
        { listId: "2", sent: 60 },
        { listId: "3", sent: 5 },
      ]
    );
    expect(volumes).toEqual({ M77_WIT: 40, MAIN: 60 });
  });
});

describe("parseContactActivityCsv", () => {
  it("aggregates per code and skips templates and sentinels", () => {
    const csv = [
      "data_set,sent",
      "m77_wit_,10",
      "M77_WIT,5",
      "GLB_BR,\"1,200\"",
      "{{data_set}},99",
      "WMRY,7",
      ",3",
    ].join("\n");
    expect(parseContactActivityCsv(csv)).toEqual({ M77_WIT: 15, GLB_BR: 1200 });
  });

  it("throws when the columns are missing", () => {
    expect(() => parseContactActivityCsv("segment,count\nA,1")).toThrow(
      "Contact activity export is missing data_set/sent columns: segment,count"
    );
  });
});

describe("resolveFirst", () => {
  it("stops at the first non-null strategy", async () => {
    const third = vi.fn(async () => "list");
    const result = await resolveFirst([async () => null, async () => "segment", third]);
    expect(result).toBe("segment");
    expect(third).not.toHaveBeenCalled();
  });
});

describe("partner volume resolver", () => {
  const volume = {
    mode: "segment" as const,
    volumes: { M77_WIT: 1000, M77_FIN: 500, GLB_BR: 300, ATT_30DC: 200, WMRY: 50 },
  };

  it("sums volumes over each partner group", () => {
    const resolver = createPartnerVolumeResolver({
      volume,
      knownPartners: new Set(["M77", "IGN"]),
      grandTotalClicks: 100,
      grandTotalConversions: 10,
      totalEspSends: 5000,
    });
    expect(resolver.hasMatchingVolume).toBe(true);
    expect(resolver.resolvePartnerVolume("M77", 10, 1)).toEqual({ volume: 1500, mode: "segment" });
    // GLB_BR is an in-house data set
    expect(resolver.resolvePartnerVolume("IGN", 10, 1)).toEqual({ volume: 300, mode: "segment" });
    expect(resolver.resolveVolume("m77_fin", 10, 1)).toEqual({ volume: 500, mode: "segment" });
  });

  it("falls back to the click share of total sends", () => {
    const resolver = createPartnerVolumeResolver({
      volume,
      knownPartners: new Set(["SCO"]),
      grandTotalClicks: 300,
      grandTotalConversions: 10,
      totalEspSends: 9000,
    });
    expect(resolver.hasMatchingVolume).toBe(false);
    expect(resolver.resolvePartnerVolume("SCO", 150, 1)).toEqual({ volume: 4500, mode: "estimated" });
  });

  it("uses conversions when there are no clicks", () => {
    const resolver = createPartnerVolumeResolver({
      volume: { mode: "estimated", volumes: {} },
      knownPartners: new Set(["SCO"]),
      grandTotalClicks: 0,
      grandTotalConversions: 4,
      totalEspSends: 1000,
    });
    expect(resolver.proportionalVolume(0, 1)).toBe(250);
  });

  it("picks the first non-zero total", () => {
    expect(resolveTotalEspSends(0, [100, 50], { A: 1 })).toBe(150);
    expect(resolveTotalEspSends(0, [], { A: 1, B: 2 })).toBe(3);
    expect(resolveTotalEspSends(42, [100], {})).toBe(42);
  });
});
