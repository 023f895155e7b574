import type { DateRange } from "../lib/dates";
import type { ClickRecord, ConversionsPage, EntityDimension, EntityReport } from "../tracking/types";

/** Affiliate-tracking network. Adapters own authentication and wire decoding. */
export type TrackingNetworkSource = {
  getEntityReport(dimensions: EntityDimension[], range: DateRange, signal: AbortSignal): Promise<EntityReport>;
  getConversionsPage(date: string, page: number, pageSize: number, signal: AbortSignal): Promise<ConversionsPage>;
  getClicks(range: DateRange, signal: AbortSignal): Promise<ClickRecord[]>;
};

export type SendingCampaign = {
  id: string;
  name: string;
  espName: string;
  sendingDomain: string;
  audienceSize: number;
  sent: number;
  delivered: number;
  opens: number;
  uniqueOpens: number;
  clicks: number;
  scheduleDate?: string;
  status?: string;
  bounces?: number;
  unsubscribes?: number;
  complaints?: number;
};

export type SegmentSends = {
  segmentName: string;
  sent: number;
};

export type MailingList = {
  id: string;
  name: string;
};

export type ListSends = {
  listId: string;
  sent: number;
};

export type DailySends = {
  date: string;
  sent: number;
};

export type ContactActivityStatus = "pending" | "completed";

/** Email-sending platform. */
export type SendingPlatformSource = {
  getCampaign(mailingId: string, signal: AbortSignal): Promise<SendingCampaign | null>;
  listCampaigns(range: DateRange, signal: AbortSignal): Promise<SendingCampaign[]>;
  getSendsBySegment(range: DateRange, signal: AbortSignal): Promise<SegmentSends[]>;
  getLists(signal: AbortSignal): Promise<MailingList[]>;
  getSendsByList(range: DateRange, signal: AbortSignal): Promise<ListSends[]>;
  getDailySends(range: DateRange, signal: AbortSignal): Promise<DailySends[]>;
  createContactActivityReport(range: DateRange, signal: AbortSignal): Promise<string>;
  getContactActivityStatus(reportId: string, signal: AbortSignal): Promise<ContactActivityStatus>;
  /** CSV with `data_set,sent` columns. */
  exportContactActivityCsv(reportId: string, signal: AbortSignal): Promise<string>;
  deleteContactActivityReport(reportId: string, signal: AbortSignal): Promise<void>;
};
