/**
 * Patient reference numbers are stored as integers and shown as NN-NN-NN
 * (1 -> 00-00-01). Numbers past 999999 are shown unpadded.
 */

export function formatReferenceNumber(value: number): string {
  const digits = String(value).padStart(6, '0');

  if (digits.length === 6) {
    return `${digits.slice(0, 2)}-${digits.slice(2, 4)}-${digits.slice(4)}`;
  }
  return digits;
}

/**
 * Accepts "00-00-01", "000001" or "1"; returns null for anything else
 */
export function parseReferenceNumber(value: string): number | null {
  const cleaned = value.replace(/[-\s]/g, '');

  if (!/^\d{1,9}$/.test(cleaned)) {
    return null;
  }

  const parsed = Number(cleaned);
  return parsed > 0 ? parsed : null;
}
