import { z } from 'zod';
import { ParseError, SourceUnavailableError, describeError } from '../errors.js';
import { fetchWithTimeout } from '../utils/timeout.js';
import { createSample, detectCurrency, parsePrice } from '../utils/sample.js';
import type { Clock, Config, PriceSample, TrackedItem } from '../types.js';

export interface PriceSource {
  readonly name: string;
  fetch(item: TrackedItem): Promise<PriceSample>;
}

const systemClock: Clock = () => new Date();

const shoppingResultSchema = z.object({
  title: z.string().optional(),
  source: z.string().optional(),
  link: z.string().optional(),
  price: z.string().optional(),
});

const shoppingResponseSchema = z.object({
  shopping: z.array(z.unknown()).default([]),
});

export interface ShoppingOffer {
  retailer: string;
  price: number;
  currency: string | null;
  link?: string;
  title?: string;
}

export interface SerperShoppingOptions {
  apiKey: string;
  endpoint: string;
  country: string;
  language: string;
  location: string;
  excludedRetailers: string[];
  defaultCurrency: string;
  timeoutMs: number;
  resultLimit: number;
  clock?: Clock;
}

/** Lowest non-excluded offer from a Google Shopping search through Serper.dev. */
export class SerperShoppingSource implements PriceSource {
  readonly name = 'serper';
  private options: SerperShoppingOptions;
  private clock: Clock;

  constructor(options: SerperShoppingOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  async fetch(item: TrackedItem): Promise<PriceSample> {
    const body = await requestJson(
      this.options.endpoint,
      {
        method: 'POST',
        headers: {
          'X-API-KEY': this.options.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          q: item.query,
          gl: this.options.country,
          hl: this.options.language,
          location: this.options.location,
          num: this.options.resultLimit,
        }),
      },
      this.options.timeoutMs,
      item.id
    );

    const parsed = shoppingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Unexpected shopping response shape for ${item.id}`, { itemId: item.id });
    }

    const offers = extractOffers(parsed.data.shopping, this.options.excludedRetailers);
    const best = offers.reduce<ShoppingOffer | null>(
      (lowest, offer) => (lowest === null || offer.price < lowest.price ? offer : lowest),
      null
    );

    if (!best) {
      throw new ParseError(`No priced results for ${item.id} (query: "${item.query}")`, { itemId: item.id });
    }

    return createSample(
      item.id,
      best.price,
      best.currency ?? item.currency ?? this.options.defaultCurrency,
      this.clock().toISOString(),
      {
        provider: this.name,
        retailer: best.retailer,
        link: best.link,
        title: best.title,
        resultCount: offers.length,
      }
    );
  }
}

export function extractOffers(results: unknown[], excludedRetailers: string[]): ShoppingOffer[] {
  const offers: ShoppingOffer[] = [];

  for (const raw of results) {
    const result = shoppingResultSchema.safeParse(raw);
    if (!result.success || !result.data.price) continue;

    const price = parsePrice(result.data.price);
    if (price === null) continue;

    const retailer = result.data.source ?? 'Unknown';
    const retailerLower = retailer.toLowerCase();
    if (excludedRetailers.some(excluded => retailerLower.includes(excluded))) continue;

    offers.push({
      retailer,
      price,
      currency: detectCurrency(result.data.price),
      link: result.data.link || undefined,
      title: result.data.title,
    });
  }

  return offers;
}

const endpointPriceSchema = z.object({
  price: z.union([z.number(), z.string()]),
  currency: z.string().optional(),
});

export interface JsonEndpointOptions {
  urlTemplate: string;
  defaultCurrency: string;
  timeoutMs: number;
  clock?: Clock;
}

/**
 * Reads `{ price, currency? }` from a JSON endpoint. `{item}` in the URL
 * template is replaced with the encoded query.
 */
export class JsonEndpointSource implements PriceSource {
  readonly name = 'json';
  private options: JsonEndpointOptions;
  private clock: Clock;

  constructor(options: JsonEndpointOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
  }

  async fetch(item: TrackedItem): Promise<PriceSample> {
    const url = this.options.urlTemplate.replaceAll('{item}', encodeURIComponent(item.query));
    const body = await requestJson(url, { method: 'GET' }, this.options.timeoutMs, item.id);

    const parsed = endpointPriceSchema.safeParse(body);
    if (!parsed.success) {
      throw new ParseError(`Response for ${item.id} has no price field`, { itemId: item.id });
    }

    const { price: rawPrice, currency } = parsed.data;
    const price = typeof rawPrice === 'number' ? rawPrice : parsePrice(rawPrice);
    if (price === null || !Number.isFinite(price) || price < 0) {
      throw new ParseError(`Invalid price "${rawPrice}" for ${item.id}`, { itemId: item.id });
    }

    return createSample(
      item.id,
      price,
      (currency ?? item.currency ?? this.options.defaultCurrency).toUpperCase(),
      this.clock().toISOString(),
      { provider: this.name, link: url }
    );
  }
}

async function requestJson(url: string, init: RequestInit, timeoutMs: number, itemId: string): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchWithTimeout(url, init, timeoutMs);
  } catch (error) {
    const reason = error instanceof Error && error.name === 'AbortError' ? `timed out after ${timeoutMs}ms` : describeError(error);
    throw new SourceUnavailableError(`Price source unreachable for ${itemId}: ${reason}`, { itemId, cause: error });
  }

  if (!response.ok) {
    throw new SourceUnavailableError(
      `Price source returned ${response.status} ${response.statusText} for ${itemId}`,
      { itemId, statusCode: response.status }
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ParseError(`Price source returned invalid JSON for ${itemId}`, { itemId, cause: error });
  }
}

export function createPriceSource(config: Config['source']): PriceSource {
  if (config.kind === 'json') {
    if (!config.jsonUrl) {
      throw new Error('SOURCE_URL is required for the json price source');
    }
    return new JsonEndpointSource({
      urlTemplate: config.jsonUrl,
      defaultCurrency: config.defaultCurrency,
      timeoutMs: config.fetchTimeoutMs,
    });
  }

  if (!config.serper.apiKey) {
    throw new Error('SERPER_API_KEY is required for the serper price source');
  }
  return new SerperShoppingSource({
    apiKey: config.serper.apiKey,
    endpoint: config.serper.endpoint,
    country: config.serper.country,
    language: config.serper.language,
    location: config.serper.location,
    excludedRetailers: config.serper.excludedRetailers,
    resultLimit: config.serper.resultLimit,
    defaultCurrency: config.defaultCurrency,
    timeoutMs: config.fetchTimeoutMs,
  });
}
