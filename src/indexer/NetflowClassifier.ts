import type { ClassifiedFlow, TransferEvent } from '../types';
import type { AddressRegistry } from './AddressRegistry';

/**
 * Classifies a transfer relative to one exchange.
 * A transfer into a monitored wallet is inflow, one out of it is outflow.
 * When both sides are monitored (an internal move) the receiving side wins
 * and the transfer counts as inflow.
 */
export function classifyTransfer(event: TransferEvent, registry: AddressRegistry): ClassifiedFlow {
  const exchangeLabel = registry.label();

  if (registry.contains(event.toAddress)) {
    return { exchangeLabel, inflowAmount: event.amount, outflowAmount: 0n };
  }

  if (registry.contains(event.fromAddress)) {
    return { exchangeLabel, inflowAmount: 0n, outflowAmount: event.amount };
  }

  return { exchangeLabel, inflowAmount: 0n, outflowAmount: 0n };
}

export function isRelevantFlow(flow: ClassifiedFlow): boolean {
  return flow.inflowAmount !== 0n || flow.outflowAmount !== 0n;
}

/** Relevant flows for every exchange the transfer touches, in registry order. */
export function classifyAcrossRegistries(
  event: TransferEvent,
  registries: readonly AddressRegistry[]
): ClassifiedFlow[] {
  return registries
    .map(registry => classifyTransfer(event, registry))
    .filter(isRelevantFlow);
}
