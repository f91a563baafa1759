import type { PriceSample, SampleSource } from '../types.js';

export function createSample(
  itemId: string,
  price: number,
  currency: string,
  timestamp: string,
  source: SampleSource
): PriceSample {
  return Object.freeze({
    itemId,
    price,
    currency,
    timestamp,
    source: Object.freeze({ ...source }),
  });
}

export function parsePrice(priceString: string): number | null {
  const match = priceString.replace(/\s/g, '').match(/([\d,]+\.?\d*)/);
  if (!match?.[1]) return null;
  const parsed = parseFloat(match[1].replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

const CURRENCY_SYMBOLS: Record<string, string> = {
  '£': 'GBP',
  '$': 'USD',
  '€': 'EUR',
};

export function detectCurrency(priceString: string): string | null {
  for (const [symbol, code] of Object.entries(CURRENCY_SYMBOLS)) {
    if (priceString.includes(symbol)) return code;
  }
  const code = priceString.match(/\b(GBP|USD|EUR|AUD|CAD)\b/i);
  return code?.[1] ? code[1].toUpperCase() : null;
}
