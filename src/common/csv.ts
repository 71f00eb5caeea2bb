const NEEDS_QUOTES = /[",\r\n]/;

/** Quote a field only when it holds a delimiter, a quote or a line break. */
export function encodeField(value: string): string {
  if (!NEEDS_QUOTES.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function encodeRecord(fields: readonly string[]): string {
  return fields.map(encodeField).join(",");
}

/** Render a header and rows as CSV text with CRLF after every record. */
export function toCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  let out = encodeRecord(header) + "\r\n";
  for (const row of rows) out += encodeRecord(row) + "\r\n";
  return out;
}
