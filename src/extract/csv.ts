/**
 * Minimal RFC 4180 CSV reader: quoted fields, doubled quotes, CRLF and a
 * leading BOM. The first row is the header.
 */

export interface ParsedCsv {
  headers: string[];
  /** Data rows; each row has one entry per header. */
  rows: string[][];
}

export class CsvFormatError extends Error {
  line: number;

  constructor(line: number, message: string) {
    super(`CSV line ${line}: ${message}`);
    this.name = "CsvFormatError";
    this.line = line;
  }
}

export function parseCsv(input: string): ParsedCsv {
  const text = (input.charCodeAt(0) === 0xfeff ? input.slice(1) : input)
    .replace(/\r\n?/g, "\n");

  const records: Array<{ line: number; values: string[] }> = [];
  let current: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endRow = () => {
    current.push(field);
    field = "";
    // Blank lines carry no record.
    if (!(current.length === 1 && current[0] === "")) {
      records.push({ line: rowStart, values: current });
    }
    current = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      if (field.length > 0) {
        throw new CsvFormatError(line, "quote inside an unquoted field");
      }
      inQuotes = true;
    } else if (ch === ",") {
      current.push(field);
      field = "";
    } else if (ch === "\n") {
      endRow();
      line++;
      rowStart = line;
    } else {
      field += ch;
    }
  }
  if (inQuotes) throw new CsvFormatError(rowStart, "unterminated quoted field");
  if (field.length > 0 || current.length > 0) endRow();

  const header = records.shift();
  if (!header) return { headers: [], rows: [] };
  const headers = header.values.map((h) => h.trim());

  const rows = records.map(({ line: at, values }) => {
    if (values.length !== headers.length) {
      throw new CsvFormatError(
        at,
        `expected ${headers.length} fields, found ${values.length}`,
      );
    }
    return values;
  });
  return { headers, rows };
}
