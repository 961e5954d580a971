// apps/scorer/src/ingest/csv.ts
//
// Minimal RFC 4180 reader: comma separated, double-quoted fields with "" escapes,
// quoted newlines, CRLF or LF line ends, optional UTF-8 BOM. First row is the header.

export type CsvTable = {
  header: string[];
  records: Record<string, string>[];
};

export function parseCsvRows(text: string): string[][] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  // true once the current line has produced any character or delimiter
  let lineStarted = false;

  const endRow = () => {
    row.push(field);
    rows.push(row);
    row = [];
    field = "";
    lineStarted = false;
  };

  for (let i = 0; i < src.length; i++) {
    const c = src[i];

    if (inQuotes) {
      if (c === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += c;
      }
      continue;
    }

    if (c === '"') {
      inQuotes = true;
      lineStarted = true;
    } else if (c === ",") {
      row.push(field);
      field = "";
      lineStarted = true;
    } else if (c === "\r" || c === "\n") {
      if (c === "\r" && src[i + 1] === "\n") i++;
      // blank lines carry no record
      if (lineStarted) endRow();
    } else {
      field += c;
      lineStarted = true;
    }
  }

  if (inQuotes) throw new Error(`CSV_UNTERMINATED_QUOTE: row ${rows.length + 1}`);
  if (lineStarted) endRow();
  return rows;
}

/** Header cells are trimmed; cells beyond the header are dropped, missing ones are absent. */
export function parseCsv(text: string): CsvTable {
  const rows = parseCsvRows(text);
  if (!rows.length) return { header: [], records: [] };

  const header = rows[0].map((h) => h.trim());
  const records = rows.slice(1).map((cells) => {
    const rec: Record<string, string> = {};
    header.forEach((h, i) => {
      if (h && i < cells.length) rec[h] = cells[i];
    });
    return rec;
  });
  return { header, records };
}
