/**
 * Receipt Text Normalizer for receipt-ledger
 *
 * Cleans raw OCR or plain-text receipt content before it reaches the
 * field extractors:
 *
 * 1. Unicode compatibility folding (full-width digits, ligatures)
 * 2. Unified line separators
 * 3. Mojibake repair for currency symbols decoded with the wrong charset
 * 4. Exotic whitespace mapped to plain spaces, zero-width characters
 *    dropped, runs of spaces collapsed
 * 5. Currency codes upper-cased (usd → USD)
 * 6. Lines trimmed, empty lines dropped
 *
 * Never throws. Empty input yields empty output.
 */

// ============================================
// Constants
// ============================================

/**
 * UTF-8 sequences that were decoded as Windows-1252/Latin-1.
 * Longest sequences first so partial repairs never win.
 */
const MOJIBAKE_REPAIRS: ReadonlyArray<[string, string]> = [
  ['â‚¬', '€'],
  ['â€™', "'"],
  ['â€˜', "'"],
  ['â€œ', '"'],
  ['â€\u009d', '"'],
  ['â€“', '-'],
  ['â€”', '-'],
  ['Â£', '£'],
  ['Â¥', '¥'],
  ['Â¢', '¢'],
  ['Â©', '©'],
  ['Â\u00a0', ' '],
];

/**
 * Whitespace that OCR engines and PDF extractors emit besides the
 * plain space: tabs, non-breaking and the U+2000 block.
 */
const EXOTIC_WHITESPACE =
  /[\t\v\f\u00a0\u1680\u2000-\u200a\u202f\u205f\u3000]/g;

/** Zero-width characters and byte order marks, dropped outright */
const ZERO_WIDTH = /[\u200b-\u200d\u2060\ufeff]/g;

/** Unicode line and paragraph separators */
const UNICODE_LINE_BREAKS = /[\u0085\u2028\u2029]/g;

/**
 * Currency codes to upper-case regardless of how the OCR cased them.
 */
const CURRENCY_CODE_PATTERN = /\b(usd|eur|gbp|cad|aud|inr)\b/gi;

// ============================================
// Normalizer
// ============================================

/**
 * Normalize raw receipt text.
 *
 * @param raw - Text straight from OCR or a text upload
 * @returns Cleaned text, one non-empty trimmed line per receipt line
 */
export function normalizeText(raw: string): string {
  if (typeof raw !== 'string' || raw.length === 0) {
    return '';
  }

  let text = repairMojibake(raw);

  // NFKC folds full-width characters and ligatures; run it after the
  // mojibake pass so the broken byte pairs are still recognisable.
  text = text.normalize('NFKC');

  text = text.replace(/\r\n?/g, '\n').replace(UNICODE_LINE_BREAKS, '\n');
  text = text.replace(ZERO_WIDTH, '').replace(EXOTIC_WHITESPACE, ' ');
  text = text.replace(CURRENCY_CODE_PATTERN, (code) => code.toUpperCase());

  return text
    .split('\n')
    .map((line) => line.replace(/ {2,}/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

/**
 * Split normalized text into lines. Empty text has no lines.
 */
export function toLines(text: string): string[] {
  return text.length === 0 ? [] : text.split('\n');
}

/**
 * Replace currency symbols and punctuation that were decoded with the
 * wrong charset.
 */
function repairMojibake(text: string): string {
  let repaired = text;
  for (const [broken, fixed] of MOJIBAKE_REPAIRS) {
    if (repaired.includes(broken)) {
      repaired = repaired.split(broken).join(fixed);
    }
  }
  return repaired;
}
