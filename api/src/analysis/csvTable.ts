// api/src/analysis/csvTable.ts
// CSV text -> { columns, rows } for the variance analyzer

export type CsvTable = {
  columns: string[];
  rows: Record<string, string>[];
};

/**
 * Parse CSV content into a header-keyed table.
 * - First non-empty record is the header
 * - Quoted fields with "" escapes; quoted fields may span lines
 * - Rows shorter than the header leave the trailing columns absent
 * Values stay strings; numeric coercion belongs to the analyzer.
 */
export function parseCsvTable(csvContent: string): CsvTable {
  const records = parseCsvRecords(csvContent.replace(/^\uFEFF/, ""));
  if (records.length === 0) return { columns: [], rows: [] };

  const columns = records[0];
  const rows: Record<string, string>[] = [];

  for (let i = 1; i < records.length; i++) {
    const fields = records[i];
    const row: Record<string, string> = {};
    columns.forEach((col, idx) => {
      if (idx < fields.length) row[col] = fields[idx];
    });
    rows.push(row);
  }

  return { columns, rows };
}

/**
 * Split CSV text into records of fields.
 * A record ends only at a newline outside quotes; blank records are skipped.
 */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = "";
  let inQuotes = false;

  const endRecord = () => {
    fields.push(current.trim());
    current = "";
    if (fields.length > 1 || fields[0] !== "") records.push(fields);
    fields = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const nextChar = text[i + 1];

    if (char === '"') {
      if (inQuotes && nextChar === '"') {
        // Escaped quote
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === "," && !inQuotes) {
      fields.push(current.trim());
      current = "";
    } else if ((char === "\n" || char === "\r") && !inQuotes) {
      if (char === "\r" && nextChar === "\n") i++;
      endRecord();
    } else {
      current += char;
    }
  }

  if (current !== "" || fields.length > 0) endRecord();
  return records;
}

/**
 * Parse a single CSV line, handling quoted fields
 */
export function parseCsvLine(line: string): string[] {
  return parseCsvRecords(line)[0] ?? [""];
}
