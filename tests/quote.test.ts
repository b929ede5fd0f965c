import { afterEach, describe, expect, it, vi } from 'vitest';
import { quoteShipping } from '../src/utils/quote';
import { InvalidModeError } from '../src/utils/errors';
import { getAllShippingRates, getShippingRate } from '../src/config/shipping';

describe('quoteShipping', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('quotes 10 units by Ground at 15.00 USD', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-15T12:00:00Z'));

    const quote = quoteShipping({ mode: 'Ground', weight: 10 });

    expect(quote.mode).toBe('Ground');
    expect(quote.weight).toBe(10);
    expect(quote.unit_price).toBe(1.5);
    expect(quote.cost).toBe(15);
    expect(quote.currency).toBe('USD');
    expect(quote.generated_at).toBe(Date.parse('2026-01-15T12:00:00Z'));
    expect(quote.quote_id).toMatch(/^qt_[0-9a-f]{8}$/);
  });

  it('quotes 10 units by Air at 30.00 USD', () => {
    const quote = quoteShipping({ mode: 'Air', weight: 10 });

    expect(quote.unit_price).toBe(3);
    expect(quote.cost).toBe(30);
  });

  it('rounds cost to cents', () => {
    // 0.25 × 1.5 = 0.375
    expect(quoteShipping({ mode: 'Ground', weight: 0.25 }).cost).toBe(0.38);
    // 1.111 × 3 = 3.333
    expect(quoteShipping({ mode: 'Air', weight: 1.111 }).cost).toBe(3.33);
  });

  it('propagates InvalidModeError for unknown modes', () => {
    expect(() => quoteShipping({ mode: 'Sea', weight: 10 })).toThrow(InvalidModeError);
  });
});

describe('shipping catalog', () => {
  it('has one rate per mode', () => {
    expect(getAllShippingRates()).toEqual([
      { mode: 'Ground', name: 'Ground Shipping', unit_price: 1.5, currency: 'USD' },
      { mode: 'Air', name: 'Air Shipping', unit_price: 3, currency: 'USD' },
    ]);
  });

  it('rejects writes to a returned rate', () => {
    const rate = getShippingRate('Ground');

    expect(rate).toBeDefined();
    if (rate) {
      expect(Object.isFrozen(rate)).toBe(true);
      expect(Reflect.set(rate, 'unit_price', 99)).toBe(false);
    }

    const quote = quoteShipping({ mode: 'Ground', weight: 10 });
    expect(quote.unit_price).toBe(1.5);
    expect(quote.cost).toBe(15);
  });

  it('rejects writes through the rate list', () => {
    const [ground] = getAllShippingRates();

    expect(Reflect.set(ground, 'unit_price', 99)).toBe(false);
    expect(getShippingRate('Ground')?.unit_price).toBe(1.5);
  });

  it('looks up rates by exact mode', () => {
    expect(getShippingRate('Air')?.unit_price).toBe(3);
    expect(getShippingRate('air')).toBeUndefined();
  });
});
