import { describe, it, expect } from 'vitest';
import { classifyAcrossRegistries, classifyTransfer, isRelevantFlow } from '../NetflowClassifier';
import { AddressRegistry } from '../AddressRegistry';
import { BINANCE_HOT, COINBASE_HOT, OUTSIDER_B, OUTSIDER_C, transferEvent } from '../../__tests__/fixtures';

const binance = AddressRegistry.create('binance', [BINANCE_HOT]);
const coinbase = AddressRegistry.create('coinbase', [COINBASE_HOT]);

describe('classifyTransfer', () => {
  it('counts a deposit into a monitored wallet as inflow', () => {
    const flow = classifyTransfer(transferEvent({ from: OUTSIDER_B, to: BINANCE_HOT, amount: 1000n }), binance);

    expect(flow).toEqual({ exchangeLabel: 'binance', inflowAmount: 1000n, outflowAmount: 0n });
  });

  it('counts a withdrawal from a monitored wallet as outflow', () => {
    const flow = classifyTransfer(transferEvent({ from: BINANCE_HOT, to: OUTSIDER_C, amount: 200n }), binance);

    expect(flow).toEqual({ exchangeLabel: 'binance', inflowAmount: 0n, outflowAmount: 200n });
  });

  it('counts a move between two monitored wallets as inflow', () => {
    const registry = AddressRegistry.create('binance', [BINANCE_HOT, OUTSIDER_B]);
    const flow = classifyTransfer(transferEvent({ from: OUTSIDER_B, to: BINANCE_HOT, amount: 50n }), registry);

    expect(flow).toEqual({ exchangeLabel: 'binance', inflowAmount: 50n, outflowAmount: 0n });
  });

  it('returns a zero flow for transfers between outside wallets', () => {
    const flow = classifyTransfer(transferEvent({ from: OUTSIDER_B, to: OUTSIDER_C, amount: 5n }), binance);

    expect(flow).toEqual({ exchangeLabel: 'binance', inflowAmount: 0n, outflowAmount: 0n });
    expect(isRelevantFlow(flow)).toBe(false);
  });

  it('treats a zero-value deposit as irrelevant', () => {
    const flow = classifyTransfer(transferEvent({ from: OUTSIDER_B, to: BINANCE_HOT, amount: 0n }), binance);

    expect(isRelevantFlow(flow)).toBe(false);
  });
});

describe('classifyAcrossRegistries', () => {
  it('yields one flow per exchange the transfer touches', () => {
    const flows = classifyAcrossRegistries(
      transferEvent({ from: COINBASE_HOT, to: BINANCE_HOT, amount: 700n }),
      [binance, coinbase]
    );

    expect(flows).toEqual([
      { exchangeLabel: 'binance', inflowAmount: 700n, outflowAmount: 0n },
      { exchangeLabel: 'coinbase', inflowAmount: 0n, outflowAmount: 700n },
    ]);
  });

  it('drops exchanges the transfer does not touch', () => {
    const flows = classifyAcrossRegistries(
      transferEvent({ from: OUTSIDER_B, to: COINBASE_HOT, amount: 1n }),
      [binance, coinbase]
    );

    expect(flows.map(flow => flow.exchangeLabel)).toEqual(['coinbase']);
  });

  it('returns nothing for an unrelated transfer', () => {
    expect(
      classifyAcrossRegistries(transferEvent({ from: OUTSIDER_B, to: OUTSIDER_C, amount: 1n }), [binance, coinbase])
    ).toEqual([]);
  });
});
