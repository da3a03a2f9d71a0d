import { parseConcurrencyMode, parseIntegerSetting } from '../src/connections/config/app.config';

describe('parseIntegerSetting', () => {
  test('falls back when unset or blank', () => {
    expect(parseIntegerSetting('ORDER_MAX_ATTEMPTS', undefined, 3)).toBe(3);
    expect(parseIntegerSetting('ORDER_MAX_ATTEMPTS', '  ', 3)).toBe(3);
  });

  test('reads integers', () => {
    expect(parseIntegerSetting('ORDER_BACKOFF_BASE_MS', '40', 25)).toBe(40);
    expect(parseIntegerSetting('ORDER_BACKOFF_BASE_MS', '0', 25)).toBe(0);
  });

  test.each(['abc', '2.5', '-1'])('rejects %p', raw => {
    expect(() => parseIntegerSetting('ORDER_BACKOFF_MAX_MS', raw, 250)).toThrow(
      `ORDER_BACKOFF_MAX_MS must be an integer >= 0, got "${raw}"`
    );
  });

  test('enforces the minimum', () => {
    expect(() => parseIntegerSetting('ORDER_MAX_ATTEMPTS', '0', 3, 1)).toThrow(
      'ORDER_MAX_ATTEMPTS must be an integer >= 1, got "0"'
    );
  });
});

describe('parseConcurrencyMode', () => {
  test('defaults to serializable', () => {
    expect(parseConcurrencyMode(undefined)).toBe('serializable');
  });

  test('accepts either mode, case-insensitively', () => {
    expect(parseConcurrencyMode('Optimistic')).toBe('optimistic');
    expect(parseConcurrencyMode(' serializable ')).toBe('serializable');
  });

  test('rejects anything else', () => {
    expect(() => parseConcurrencyMode('pessimistic')).toThrow(
      'ORDER_CONCURRENCY_MODE must be "serializable" or "optimistic", got "pessimistic"'
    );
  });
});
