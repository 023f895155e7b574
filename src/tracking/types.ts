export type EntityDimension = "date" | "offer" | "sub1" | "sub2";

export type EntityColumn = {
  columnType: string;
  id: string;
  label: string;
};

export type EntityReporting = {
  totalClick: number;
  conversions: number;
  revenue: number;
  payout: number;
};

export type EntityReportRow = {
  columns: EntityColumn[];
  reporting: EntityReporting;
};

export type EntityReport = {
  table: EntityReportRow[];
  summary?: EntityReporting;
};

export type ClickRecord = {
  clickId: string;
  transactionId?: string;
  offerId: string;
  offerName: string;
  sub1: string;
  sub2: string;
  sub3?: string;
  timestamp: string;
  country?: string;
  device?: string;
  isFailed?: boolean;
};

export type RelationshipOffer = {
  networkOfferId: number;
  name: string;
};

export type ConversionRecord = {
  conversionId: string;
  transactionId?: string;
  clickId?: string;
  offerId: string;
  offerName: string;
  status?: string;
  revenue: number;
  payout: number;
  sub1: string;
  sub2: string;
  sub3?: string;
  conversionUnixTimestamp: number;
  clickUnixTimestamp?: number;
  country?: string;
  relationship?: { offer?: RelationshipOffer };
};

export type ConversionPaging = {
  page: number;
  pageSize: number;
  totalCount: number;
};

export type ConversionsPage = {
  conversions: ConversionRecord[];
  paging: ConversionPaging | null;
};

/** Tag-derived fields are "" when the tag does not carry them. */
export type TagFields = {
  propertyCode: string;
  propertyName: string;
  mailingId: string;
  parsedOfferId: string;
  dataSetCode: string;
  dataPartner: string;
};

export type Click = TagFields & {
  clickId: string;
  offerId: string;
  offerName: string;
  sub1: string;
  sub2: string;
  timestamp: string | null;
  date: string;
};

export type Conversion = TagFields & {
  conversionId: string;
  offerId: string;
  offerName: string;
  status: string;
  revenue: number;
  payout: number;
  sub1: string;
  sub2: string;
  conversionTime: string | null;
  date: string;
};
