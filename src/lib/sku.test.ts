// src/lib/sku.test.ts
import {
  canonicalizeSingleSku,
  canonicalizeSku,
  canonicalSkuSet,
  parseSkuBlock,
  splitSkuBlock,
} from './sku';

const NBSP = String.fromCharCode(0xa0);
const ZWSP = String.fromCharCode(0x200b);

describe('canonicalizeSku', () => {
  it('expands positive-exponent scientific notation exactly', () => {
    expect(canonicalizeSku('5.6061E+11')).toBe('560610000000');
    expect(canonicalizeSku('5.6061e+11')).toBe('560610000000');
    expect(canonicalizeSku('8.8091E+12')).toBe('8809100000000');
    expect(canonicalizeSku('1E+3')).toBe('1000');
  });

  it('drops the decimal point when the exponent does not clear the fraction', () => {
    expect(canonicalizeSku('1.2345E+2')).toBe('12345');
    expect(canonicalizeSku('1.50E+1')).toBe('150');
    expect(canonicalizeSku('0.0012E+1')).toBe('0012');
  });

  it('handles zero and leading zeros the way a decimal parser does', () => {
    expect(canonicalizeSku('0E+5')).toBe('0');
    expect(canonicalizeSku('007E+2')).toBe('700');
  });

  it('trims, drops embedded spaces and upper-cases', () => {
    expect(canonicalizeSku(' gh97-18767c ')).toBe('GH97-18767C');
    expect(canonicalizeSku('gh97 18767 c')).toBe('GH9718767C');
  });

  it('cleans non-breaking and zero-width characters', () => {
    expect(canonicalizeSku(`${NBSP}GH97${NBSP}18767C${NBSP}`)).toBe('GH9718767C');
    expect(canonicalizeSku(`${ZWSP}abc${ZWSP}12 `)).toBe('ABC12');
    expect(canonicalizeSku(`5.6061E+11${NBSP}`)).toBe('560610000000');
  });

  it('leaves negative exponents and malformed numbers as cleaned text', () => {
    expect(canonicalizeSku('1.5E-3')).toBe('1.5E-3');
    expect(canonicalizeSku('1.5e-3')).toBe('1.5E-3');
    expect(canonicalizeSku('.5E+3')).toBe('.5E+3');
    expect(canonicalizeSku('5.E+3')).toBe('5.E+3');
    expect(canonicalizeSku('E+5')).toBe('E+5');
    expect(canonicalizeSku('5E+')).toBe('5E+');
    expect(canonicalizeSku('5E3')).toBe('5E3');
  });

  it('only converts when the whole token is a number', () => {
    expect(canonicalizeSku('AB1E+5')).toBe('AB1E+5');
    expect(canonicalizeSku('1E+5X')).toBe('1E+5X');
  });

  it('expands long values in full', () => {
    expect(canonicalizeSku('1E+70')).toBe('1' + '0'.repeat(70));
    expect(canonicalizeSku('123456789012345678901234567890E+40')).toBe(
      '123456789012345678901234567890' + '0'.repeat(40),
    );
    expect(canonicalizeSku('1E+100')).toBe('1' + '0'.repeat(100));
  });

  it('falls back to the cleaned text when the exponent is not a safe integer', () => {
    expect(canonicalizeSku('1E+99999999999999999999')).toBe('1E+99999999999999999999');
  });

  it('returns empty for absent or blank input', () => {
    expect(canonicalizeSku(null)).toBe('');
    expect(canonicalizeSku(undefined)).toBe('');
    expect(canonicalizeSku('')).toBe('');
    expect(canonicalizeSku(`  ${NBSP}${ZWSP} `)).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      '5.6061E+11',
      ' gh97-18767c ',
      '1.5E-3',
      '1.2345E+2',
      '0.0012E+1',
      `${NBSP}x y${ZWSP}`,
      '1E+100',
      'plain',
      '',
    ];
    for (const s of samples) {
      const once = canonicalizeSku(s);
      expect(canonicalizeSku(once)).toBe(once);
    }
  });
});

describe('splitSkuBlock / parseSkuBlock', () => {
  it('splits on runs of commas, semicolons and newlines', () => {
    expect(splitSkuBlock('A1, a2\nP1, A3;A3')).toEqual(['A1', ' a2', 'P1', ' A3', 'A3']);
    expect(splitSkuBlock('A1,;\r\n\nA2')).toEqual(['A1', 'A2']);
  });

  it('canonicalizes, drops empties and dedupes in first-seen order', () => {
    expect(parseSkuBlock('b2, a1;\n\nB2 ,5.6061E+11')).toEqual(['B2', 'A1', '560610000000']);
    expect(parseSkuBlock(',,;\n')).toEqual([]);
  });

  it('builds a canonical set from stored values', () => {
    expect(Array.from(canonicalSkuSet(['a1', ' A1 ', '', '5.6061E+11']))).toEqual([
      'A1',
      '560610000000',
    ]);
  });
});

describe('canonicalizeSingleSku', () => {
  it('canonicalizes a field holding one code', () => {
    expect(canonicalizeSingleSku(' a1 ')).toBe('A1');
    expect(canonicalizeSingleSku('5.6061E+11')).toBe('560610000000');
    expect(canonicalizeSingleSku('')).toBe('');
  });

  it('refuses a field holding several codes', () => {
    expect(canonicalizeSingleSku('A1,A2')).toBeNull();
    expect(canonicalizeSingleSku('A1;A2')).toBeNull();
    expect(canonicalizeSingleSku('A1\nA2')).toBeNull();
  });
});
