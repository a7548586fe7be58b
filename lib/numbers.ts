// lib/numbers.ts
export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

// пробелы (включая неразрывные), апострофы и подчёркивания — разделители тысяч
const GROUPING = /[\s'’_]/g;

export function toPositiveInt(v: unknown): number | null {
  const s = String(v ?? '').trim();
  if (!/^\d+$/.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) && n > 0 ? n : null;
}

/**
 * Brings a user-typed number to `123.45` form.
 * Comma or dot may be the decimal separator; when both are present the last one is.
 * Returns null when the text is not a plain unsigned decimal.
 */
export function normalizeDecimal(raw: string): string | null {
  let s = String(raw ?? '').trim().replace(GROUPING, '');
  if (!s) return null;

  const lastComma = s.lastIndexOf(',');
  const lastDot = s.lastIndexOf('.');
  const commas = s.split(',').length - 1;

  if (lastComma >= 0 && lastDot >= 0) {
    s = lastComma > lastDot
      ? s.replace(/\./g, '').replace(',', '.')
      : s.replace(/,/g, '');
  } else if (commas === 1) {
    s = s.replace(',', '.');
  } else if (commas > 1) {
    s = s.replace(/,/g, '');
  }

  if (!/^\d+(\.\d+)?$/.test(s)) return null;
  return s.replace(/^0+(?=\d)/, '');
}

export function parsePositiveDecimal(raw: string): Parsed<{ text: string; value: number }> {
  const text = normalizeDecimal(raw);
  if (text === null) return { ok: false, error: 'NOT_A_NUMBER' };
  const value = Number(text);
  if (!Number.isFinite(value) || value <= 0) return { ok: false, error: 'NOT_POSITIVE' };
  return { ok: true, value: { text, value } };
}

export function normalizeCurrency(raw: string): string | null {
  const s = String(raw ?? '').trim().toUpperCase();
  return /^[A-Z]{3,4}$/.test(s) ? s : null;
}
