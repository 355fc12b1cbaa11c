export const ASIN_PATTERN = /^[A-Z0-9]{10}$/;

export interface ParsedIdentifiers {
  valid: string[];
  invalid: string[];
}

/**
 * Splits free text (one per line, or separated by commas/whitespace) into
 * ASINs. Tokens are trimmed and upper-cased; anything that is not ten
 * alphanumerics lands in `invalid`. Order is kept. With `dedupe`, only the
 * first occurrence of each ASIN is kept.
 */
export function parseIdentifiers(text: string, options: { dedupe?: boolean } = {}): ParsedIdentifiers {
  const valid: string[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();

  for (const token of text.split(/[\s,;]+/)) {
    const asin = token.trim().toUpperCase();
    if (!asin) continue;
    if (!ASIN_PATTERN.test(asin)) {
      invalid.push(token.trim());
      continue;
    }
    if (options.dedupe && seen.has(asin)) continue;
    seen.add(asin);
    valid.push(asin);
  }

  return { valid, invalid };
}

export function isAsin(value: string): boolean {
  return ASIN_PATTERN.test(value);
}
