/** Lowercased header with a leading BOM and punctuation runs reduced to single spaces. */
export function normalizeHeader(value: string): string {
  const trimmed = value.replace(/^\uFEFF/, "");
  return trimmed
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/** Column index per field, from the first header matching one of its aliases. */
export function mapHeaders(
  headers: string[],
  aliases: Record<string, string[]>
): Record<string, number> {
  const normalized = headers.map((h) => normalizeHeader(h));
  const indexMap: Record<string, number> = {};
  for (const [field, names] of Object.entries(aliases)) {
    for (let i = 0; i < normalized.length; i += 1) {
      if (names.includes(normalized[i])) {
        indexMap[field] = i;
        break;
      }
    }
  }
  return indexMap;
}

export function parseIntSafe(value: string): number | null {
  const raw = value.trim();
  if (!raw) return null;
  const num = Number.parseInt(raw.replace(/,/g, ""), 10);
  return Number.isFinite(num) ? num : null;
}

/**
 * RFC 4180-style rows: quoted fields may hold commas, newlines and doubled
 * quotes. Blank lines are dropped.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < content.length; i += 1) {
    const char = content[i];
    if (char === '"') {
      const next = content[i + 1];
      if (inQuotes && next === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (char === "," && !inQuotes) {
      current.push(field);
      field = "";
      continue;
    }

    if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && content[i + 1] === "\n") {
        i += 1;
      }
      current.push(field);
      field = "";
      if (current.length > 1 || current[0]?.trim()) {
        rows.push(current);
      }
      current = [];
      continue;
    }

    field += char;
  }

  if (field.length || current.length) {
    current.push(field);
    if (current.length > 1 || current[0]?.trim()) rows.push(current);
  }

  return rows;
}
