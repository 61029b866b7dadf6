import { Inject, Injectable, Logger } from '@nestjs/common';
import { QuoteFetchError } from '../errors/quote-fetch.error';
import type {
  Quote,
  RateProvider,
  RawQuote,
  ShipmentDescriptor,
} from '../interfaces/collaborators.interface';
import type { ShipmentFields } from '../interfaces/session-records.interface';
import { quoteFingerprint } from '../utils/quote-fingerprint';
import { RATE_PROVIDER } from '../session.constants';
import { QuoteCache } from './quote-cache.service';

export interface GetQuotesOptions {
  /** Drop the cached entry before looking up. */
  refresh?: boolean;
}

/** Builds a descriptor once every shipment-defining field is collected. */
export function toShipmentDescriptor(
  fields: ShipmentFields,
): ShipmentDescriptor | null {
  const {
    fromZip,
    toZip,
    parcelWeight,
    parcelLength,
    parcelWidth,
    parcelHeight,
  } = fields;

  if (
    fromZip === undefined ||
    toZip === undefined ||
    parcelWeight === undefined ||
    parcelLength === undefined ||
    parcelWidth === undefined ||
    parcelHeight === undefined
  ) {
    return null;
  }

  return {
    fromZip,
    toZip,
    weight: parcelWeight,
    length: parcelLength,
    width: parcelWidth,
    height: parcelHeight,
  };
}

/** Drops quotes without a positive amount and sorts the rest cheapest first. */
export function normalizeQuotes(rawQuotes: RawQuote[]): Quote[] {
  const quotes: Quote[] = [];

  for (const raw of rawQuotes) {
    const amount =
      typeof raw.amount === 'number' ? raw.amount : Number(raw.amount);
    if (!Number.isFinite(amount) || amount <= 0) continue;

    quotes.push({
      id: raw.id ?? `${raw.carrier}:${raw.service}`,
      carrier: raw.carrier,
      service: raw.service,
      amount: Math.round(amount * 100) / 100,
      currency: raw.currency ?? 'USD',
      estimatedDays: raw.estimatedDays ?? null,
    });
  }

  return quotes.sort((a, b) => a.amount - b.amount);
}

@Injectable()
export class QuoteService {
  private readonly logger = new Logger(QuoteService.name);

  constructor(
    private readonly cache: QuoteCache,
    @Inject(RATE_PROVIDER) private readonly rateProvider: RateProvider,
  ) {}

  async getQuotes(
    descriptor: ShipmentDescriptor,
    options: GetQuotesOptions = {},
  ): Promise<Quote[]> {
    const fingerprint = quoteFingerprint(descriptor);

    if (options.refresh) {
      this.cache.delete(fingerprint);
    }

    const cached = this.cache.get(fingerprint);
    if (cached) {
      return cached;
    }

    let rawQuotes: RawQuote[];
    try {
      rawQuotes = await this.rateProvider.fetchQuotes(descriptor);
    } catch (error) {
      this.logger.error(
        `Rate provider failed for shipment ${fingerprint}`,
        error instanceof Error ? error.stack : error,
      );
      throw new QuoteFetchError(
        fingerprint,
        'Could not load carrier rates. Please try again later',
        error,
      );
    }

    const quotes = normalizeQuotes(rawQuotes);
    if (quotes.length === 0) {
      this.logger.warn(`Rate provider returned no usable quotes for ${fingerprint}`);
      throw new QuoteFetchError(
        fingerprint,
        'No carriers are available for this shipment',
      );
    }

    this.cache.set(fingerprint, quotes);
    this.logger.log(`Cached ${quotes.length} quote(s) for shipment ${fingerprint}`);
    return quotes;
  }
}
