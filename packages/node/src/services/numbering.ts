/**
 * Document numbering: PREFIX/YYYYMMDD/NNN.
 *
 * The sequence restarts every day and is padded to three digits;
 * past 999 it simply grows wider.
 */

const SEQUENCE_WIDTH = 3;

/**
 * formatDocumentNumber("CT", "2025-03-10", 7) → "CT/20250310/007"
 */
export function formatDocumentNumber(
  prefix: string,
  date: string,
  sequence: number,
): string {
  const compactDate = date.slice(0, 10).replaceAll("-", "");
  const seq = String(Math.max(1, Math.floor(sequence))).padStart(SEQUENCE_WIDTH, "0");
  return `${prefix}/${compactDate}/${seq}`;
}

