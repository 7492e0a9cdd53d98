import { InvalidPrice } from '../errors.js';

export const DEFAULT_MINIMUM_BID_PRICE = '0.001';

const CURRENCY_PREFIX = /^[$€£¥]/;
const SIGN_PREFIX = /^[+-]/;
const DECIMAL = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export type NormalizeResult =
  | { ok: true; value: string }
  | { ok: false; error: InvalidPrice };

/**
 * Canonicalizes a bid price to a plain decimal with exactly three places.
 *
 * `" $0.08 "` becomes `"0.080"`. When the string is not a plain number the
 * digits and the first decimal point are kept and parsed again, so `"0.08/hr"`
 * also becomes `"0.080"`.
 */
export function normalizeBidPrice(raw: string): string {
  // A sign may sit on either side of the currency symbol: "-$0.08", "$-0.08".
  const outer = takeSign(raw.trim());
  const inner = takeSign(outer.rest.replace(CURRENCY_PREFIX, '').trim());
  const body = inner.rest;
  if (body.length === 0) {
    throw new InvalidPrice(raw, 'empty price');
  }

  let price = parseDecimal(body);
  if (price === undefined) {
    const cleaned = scanDigits(body);
    if (cleaned.length === 0) {
      throw new InvalidPrice(raw, 'no numeric value found');
    }
    price = parseDecimal(cleaned);
    if (price === undefined) {
      throw new InvalidPrice(raw, 'no numeric value found');
    }
  }

  if (outer.negative || inner.negative || price <= 0) {
    throw new InvalidPrice(raw, 'price must be greater than 0');
  }
  if (!Number.isFinite(price) || price > Number.MAX_SAFE_INTEGER) {
    throw new InvalidPrice(raw, 'price is too large');
  }

  const fixed = price.toFixed(3);
  if (fixed === '0.000') {
    throw new InvalidPrice(raw, 'price rounds to 0.000');
  }
  return fixed;
}

export function tryNormalizeBidPrice(raw: string): NormalizeResult {
  try {
    return { ok: true, value: normalizeBidPrice(raw) };
  } catch (error) {
    if (error instanceof InvalidPrice) {
      return { ok: false, error };
    }
    throw error;
  }
}

function takeSign(value: string): { rest: string; negative: boolean } {
  const match = SIGN_PREFIX.exec(value);
  if (!match) {
    return { rest: value, negative: false };
  }
  return { rest: value.slice(1).trim(), negative: match[0] === '-' };
}

function parseDecimal(value: string): number | undefined {
  return DECIMAL.test(value) ? Number(value) : undefined;
}

function scanDigits(value: string): string {
  let result = '';
  let decimalFound = false;
  for (const char of value) {
    if (char >= '0' && char <= '9') {
      result += char;
    } else if (char === '.' && !decimalFound) {
      result += char;
      decimalFound = true;
    }
  }
  return result;
}
