/**
 * CSV field encoding (RFC 4180). Records end with CRLF.
 */

export type CsvValue = string | number | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function csvField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvRecord(values: readonly CsvValue[]): string {
  return `${values.map(csvField).join(',')}\r\n`;
}
