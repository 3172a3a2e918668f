/**
 * Chains the monitor can subscribe to. Only one runs per process.
 */

import type { Chain } from 'viem';
import { mainnet, polygon, arbitrum, bsc } from 'viem/chains';

export const SUPPORTED_CHAINS = {
  polygon,
  mainnet,
  arbitrum,
  bsc,
} as const satisfies Record<string, Chain>;

export type ChainName = keyof typeof SUPPORTED_CHAINS;

export const CHAIN_NAMES = ['polygon', 'mainnet', 'arbitrum', 'bsc'] as const satisfies readonly ChainName[];

export function getChain(name: ChainName): Chain {
  return SUPPORTED_CHAINS[name];
}
