import type { EntityColumn, EntityReport, EntityReportRow } from "./types";

export function findColumn(row: EntityReportRow, columnType: string): EntityColumn | undefined {
  return row.columns.find((column) => column.columnType === columnType);
}

export const reportRows = (report: EntityReport | null | undefined): EntityReportRow[] => report?.table ?? [];

/** Date-report ids are unix seconds at the start of the day. 0 when the id is unusable. */
export function dateColumnSeconds(row: EntityReportRow): number {
  const column = findColumn(row, "date");
  if (!column) return 0;
  const seconds = Number(column.id);
  return Number.isFinite(seconds) && seconds > 0 ? Math.trunc(seconds) : 0;
}
