import { afterEach, describe, it, expect, vi } from "vitest";
import { attributeCpmRevenue } from "../src/attribution/cpmAttribution";
import { entityReport } from "./utils/fakeSources";

const CPM_OFFER = { id: "2001", label: "Home Warranty CPM (2001)" };

const offerSub2Report = entityReport([
  { columns: { offer: CPM_OFFER, sub2: { label: "GLB_AUTO" } }, clicks: 150000 },
  { columns: { offer: CPM_OFFER, sub2: { label: "sco_home" } }, clicks: 50000 },
  { columns: { offer: CPM_OFFER, sub2: { label: "a1b2c3d4e5" } }, clicks: 999 },
  { columns: { offer: { id: "407", label: "Life Cover (407)" }, sub2: { label: "GLB_AUTO" } }, clicks: 700 },
]);

describe("attributeCpmRevenue", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("splits CPM revenue by partner click share", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const result = attributeCpmRevenue({
      offerReport: entityReport([
        { columns: { offer: CPM_OFFER }, revenue: 10000 },
        { columns: { offer: { id: "407", label: "Life Cover (407)" } }, revenue: 300 },
      ]),
      offerSub2Report,
    });

    expect(result.shares.map((share) => [share.partnerKey, share.partnerName, share.clicks, share.revenue])).toEqual([
      ["GLB", "Globe Audience", 150000, 7500],
      ["SCO", "Scout Connect", 50000, 2500],
    ]);
    expect(result.summary).toEqual({ totalRevenue: 10000, attributedRevenue: 10000, unattributedRevenue: 0, warnings: [] });
  });

  it("warns about CPM revenue with no partner clicks", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const result = attributeCpmRevenue({
      offerReport: entityReport([
        { columns: { offer: CPM_OFFER }, revenue: 10000 },
        { columns: { offer: { id: "2002", label: "Travel CPM (2002)" } }, revenue: 300 },
      ]),
      offerSub2Report,
    });

    expect(result.summary.totalRevenue).toBe(10300);
    expect(result.summary.unattributedRevenue).toBe(300);
    expect(result.summary.warnings).toEqual([
      "Offer 2002 (Travel CPM (2002)) has $300.00 CPM revenue but no partner clicks",
    ]);
    expect(warn).toHaveBeenCalledWith(
      "CPM attribution: Offer 2002 (Travel CPM (2002)) has $300.00 CPM revenue but no partner clicks"
    );
  });

  it("takes CPM revenue from cached offers when the offer report is missing", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const result = attributeCpmRevenue({
      offerReport: null,
      offerSub2Report,
      fallbackOffers: [
        {
          offerId: "2001",
          offerName: "Home Warranty CPM (2001)",
          clicks: 0,
          conversions: 0,
          revenue: 400,
          payout: 0,
          conversionRate: 0,
          epc: 0,
        },
      ],
    });
    expect(result.shares.map((share) => share.revenue)).toEqual([300, 100]);
  });
});
