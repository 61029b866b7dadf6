import type { Quote } from '../../src/interfaces/collaborators.interface';
import { QuoteCache } from '../../src/services/quote-cache.service';

const quotes: Quote[] = [
  { id: 'usps-priority', carrier: 'USPS', service: 'Priority', amount: 8.25, currency: 'USD', estimatedDays: 3 },
];

describe('QuoteCache', () => {
  let cache: QuoteCache;

  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    cache = new QuoteCache({ quoteTtlSeconds: 60 });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should miss before set and hit after', () => {
    expect(cache.get('fp')).toBeNull();
    cache.set('fp', quotes);
    expect(cache.get('fp')).toEqual(quotes);
  });

  it('should expire entries once the ttl has elapsed', () => {
    cache.set('fp', quotes);

    jest.advanceTimersByTime(59_999);
    expect(cache.get('fp')).toEqual(quotes);

    jest.advanceTimersByTime(1);
    expect(cache.get('fp')).toBeNull();
    expect(cache.getStats()).toEqual({
      hits: 1,
      misses: 1,
      hitRate: 50,
      size: 0,
    });
  });

  it('should honour a per-entry ttl', () => {
    cache.set('fp', quotes, 5);
    jest.advanceTimersByTime(5_000);
    expect(cache.get('fp')).toBeNull();
  });

  it('should hand out copies', () => {
    cache.set('fp', quotes);
    const first = cache.get('fp');
    if (first) first[0].amount = 1;
    expect(cache.get('fp')).toEqual(quotes);
  });

  it('should delete entries on demand', () => {
    cache.set('fp', quotes);
    expect(cache.delete('fp')).toBe(true);
    expect(cache.delete('fp')).toBe(false);
    expect(cache.get('fp')).toBeNull();
  });

  it('should report hit rate as a percentage with one decimal', () => {
    cache.set('fp', quotes);
    cache.get('fp');
    cache.get('fp');
    cache.get('other');

    expect(cache.getStats()).toEqual({
      hits: 2,
      misses: 1,
      hitRate: 66.7,
      size: 1,
    });
  });

  it('should report zero hit rate without lookups', () => {
    expect(cache.getStats().hitRate).toBe(0);
  });

  it('should clean up only expired entries', () => {
    cache.set('short', quotes, 10);
    cache.set('long', quotes, 100);

    jest.advanceTimersByTime(10_000);
    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.getStats().size).toBe(1);
    expect(cache.get('long')).toEqual(quotes);
  });

  it('should reset entries and counters on clear', () => {
    cache.set('fp', quotes);
    cache.get('fp');
    cache.clear();

    expect(cache.getStats()).toEqual({
      hits: 0,
      misses: 0,
      hitRate: 0,
      size: 0,
    });
  });
});
