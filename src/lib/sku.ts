// src/lib/sku.ts
//
// SKU canonicalization for operator-entered codes:
// - hidden whitespace (NBSP, zero-width) cleanup
// - trims, drops embedded spaces, upper-cases
// - expands spreadsheet scientific notation (5.6061E+11 -> 560610000000)
//

const NBSP_RE = /[\u00A0\u202F]/g;
const ZERO_WIDTH_RE = /[\u200B-\u200D\uFEFF]/g;
const SPACE_RE = / +/g;
const BLOCK_SEPARATOR_RE = /[,;\r\n]+/;

// Positive exponent only; anchored so "AB1E+5" or "1.5E-3" stay as typed.
const SCIENTIFIC_RE = /^([0-9]+)(?:\.([0-9]+))?E\+([0-9]+)$/;

/**
 * Expand positive-exponent scientific notation on the digit string itself,
 * then drop the decimal point. Returns null when the exponent is not a safe
 * integer or the result cannot be built as a string.
 */
function expandScientific(intPart: string, fracPart: string, expPart: string): string | null {
  const exp = parseInt(expPart, 10);
  if (!Number.isSafeInteger(exp)) return null;

  const coefficient = (intPart + fracPart).replace(/^0+/, '') || '0';
  const shift = exp - fracPart.length;

  if (shift >= 0) {
    if (coefficient === '0') return '0';
    return padded(coefficient, shift, 'end');
  }

  // Fractional result, e.g. 1.2345E+2 -> 123.45 -> "12345"
  const pointAt = coefficient.length + shift;
  if (pointAt > 0) return coefficient;
  return padded(coefficient, 1 - pointAt, 'start');
}

// String.repeat throws RangeError past the engine's max string length.
function padded(digits: string, zeros: number, side: 'start' | 'end'): string | null {
  try {
    const pad = '0'.repeat(zeros);
    return side === 'end' ? digits + pad : pad + digits;
  } catch (e) {
    if (e instanceof RangeError) return null;
    throw e;
  }
}

/**
 * Turn one raw token into a canonical SKU. An empty string means "drop it".
 *
 * Idempotent: canonicalizeSku(canonicalizeSku(x)) === canonicalizeSku(x).
 */
export function canonicalizeSku(raw: string | null | undefined): string {
  if (raw === null || raw === undefined) return '';

  const cleaned = String(raw)
    .replace(NBSP_RE, ' ')
    .replace(ZERO_WIDTH_RE, '')
    .trim()
    .replace(SPACE_RE, '')
    .toUpperCase();
  if (!cleaned) return '';

  const m = cleaned.match(SCIENTIFIC_RE);
  if (m) {
    const expanded = expandScientific(m[1], m[2] ?? '', m[3]);
    if (expanded !== null) return expanded;
  }
  return cleaned;
}

/** Split a pasted block on runs of commas, semicolons and line breaks. */
export function splitSkuBlock(raw: string): string[] {
  return (raw || '').split(BLOCK_SEPARATOR_RE);
}

/** Canonicalize every piece of a block; empties dropped, first occurrence kept. */
export function parseSkuBlock(raw: string): string[] {
  const out = new Set<string>();
  for (const piece of splitSkuBlock(raw)) {
    const sku = canonicalizeSku(piece);
    if (sku) out.add(sku);
  }
  return Array.from(out);
}

/**
 * Canonicalize a field meant to hold exactly one code. A field holding a
 * block separator returns null; splitting it would invent codes.
 */
export function canonicalizeSingleSku(raw: string | null | undefined): string | null {
  if (raw !== null && raw !== undefined && BLOCK_SEPARATOR_RE.test(raw)) return null;
  return canonicalizeSku(raw);
}

export function canonicalSkuSet(skus: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const s of skus) {
    const sku = canonicalizeSku(s);
    if (sku) out.add(sku);
  }
  return out;
}
