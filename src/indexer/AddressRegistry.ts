import type { Address } from 'viem';
import { ConfigurationError } from '../utils/errors';

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

function normalizeAddress(address: string): Address | null {
  const candidate = address.trim().toLowerCase();
  return ADDRESS_PATTERN.test(candidate) ? `0x${candidate.slice(2)}` : null;
}

/**
 * Monitored wallets of a single exchange.
 *
 * Built once from configuration and never mutated, so it can be shared by the
 * ingestion loop and request handlers without coordination.
 */
export class AddressRegistry {
  private readonly exchangeLabel: string;
  private readonly members: ReadonlySet<Address>;

  private constructor(exchangeLabel: string, members: ReadonlySet<Address>) {
    this.exchangeLabel = exchangeLabel;
    this.members = members;
  }

  static create(label: string, addresses: readonly string[]): AddressRegistry {
    const exchangeLabel = label.trim().toLowerCase();
    if (!exchangeLabel) {
      throw new ConfigurationError('Exchange label must not be empty');
    }
    if (addresses.length === 0) {
      throw new ConfigurationError(`Exchange "${exchangeLabel}" has no monitored addresses`);
    }

    const members = new Set<Address>();
    for (const entry of addresses) {
      const normalized = normalizeAddress(entry);
      if (!normalized) {
        throw new ConfigurationError(`Exchange "${exchangeLabel}" has a malformed address: "${entry}"`);
      }
      members.add(normalized);
    }

    return new AddressRegistry(exchangeLabel, members);
  }

  contains(address: string): boolean {
    const normalized = normalizeAddress(address);
    return normalized !== null && this.members.has(normalized);
  }

  label(): string {
    return this.exchangeLabel;
  }

  get size(): number {
    return this.members.size;
  }

  addresses(): Address[] {
    return [...this.members].sort();
  }
}

/**
 * One registry per configured exchange. Labels must stay distinct once
 * normalised, otherwise two registries would write to the same netflow series.
 */
export function buildRegistries(exchanges: Readonly<Record<string, readonly string[]>>): AddressRegistry[] {
  const registries: AddressRegistry[] = [];
  const seen = new Set<string>();

  for (const [label, addresses] of Object.entries(exchanges)) {
    const registry = AddressRegistry.create(label, addresses);
    if (seen.has(registry.label())) {
      throw new ConfigurationError(`Exchange "${registry.label()}" is configured more than once`);
    }
    seen.add(registry.label());
    registries.push(registry);
  }

  if (registries.length === 0) {
    throw new ConfigurationError('At least one exchange must be configured');
  }
  return registries;
}
