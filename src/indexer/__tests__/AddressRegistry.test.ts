import { describe, it, expect } from 'vitest';
import { AddressRegistry, buildRegistries } from '../AddressRegistry';
import { ConfigurationError } from '../../utils/errors';
import { BINANCE_HOT, OUTSIDER_B } from '../../__tests__/fixtures';

describe('AddressRegistry', () => {
  it('normalizes entries and matches addresses case-insensitively', () => {
    const registry = AddressRegistry.create(' Binance ', ['  0xAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA ']);

    expect(registry.label()).toBe('binance');
    expect(registry.contains(BINANCE_HOT)).toBe(true);
    expect(registry.contains('0xAaAaAaAaAaAaAaAaAaAaAaAaAaAaAaAaAaAaAaAa')).toBe(true);
    expect(registry.contains(OUTSIDER_B)).toBe(false);
  });

  it('treats malformed lookups as not contained', () => {
    const registry = AddressRegistry.create('binance', [BINANCE_HOT]);

    expect(registry.contains('0xaaa')).toBe(false);
    expect(registry.contains('')).toBe(false);
  });

  it('collapses duplicate entries', () => {
    const registry = AddressRegistry.create('binance', [BINANCE_HOT, BINANCE_HOT.toUpperCase().replace('0X', '0x'), OUTSIDER_B]);

    expect(registry.size).toBe(2);
    expect(registry.addresses()).toEqual([BINANCE_HOT, OUTSIDER_B]);
  });

  it('fails fast on a malformed address', () => {
    expect(() => AddressRegistry.create('binance', [BINANCE_HOT, '0x1234'])).toThrow(ConfigurationError);
    expect(() => AddressRegistry.create('binance', ['0x1234'])).toThrow(
      'Exchange "binance" has a malformed address: "0x1234"'
    );
    expect(() => AddressRegistry.create('binance', ['aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa'])).toThrow(
      ConfigurationError
    );
  });

  it('rejects an empty label or address list', () => {
    expect(() => AddressRegistry.create('  ', [BINANCE_HOT])).toThrow('Exchange label must not be empty');
    expect(() => AddressRegistry.create('binance', [])).toThrow('Exchange "binance" has no monitored addresses');
  });
});

describe('buildRegistries', () => {
  it('builds one registry per exchange in configuration order', () => {
    const registries = buildRegistries({
      binance: [BINANCE_HOT],
      okx: [OUTSIDER_B],
    });

    expect(registries.map(registry => registry.label())).toEqual(['binance', 'okx']);
  });

  it('rejects labels that collide after normalization', () => {
    expect(() => buildRegistries({ Binance: [BINANCE_HOT], binance: [OUTSIDER_B] })).toThrow(
      'Exchange "binance" is configured more than once'
    );
  });

  it('requires at least one exchange', () => {
    expect(() => buildRegistries({})).toThrow(ConfigurationError);
  });
});
