import { parseAbiItem, toEventSelector } from 'viem';

export const TRANSFER_EVENT = parseAbiItem(
  'event Transfer(address indexed from, address indexed to, uint256 value)'
);

/** keccak256("Transfer(address,address,uint256)") */
export const TRANSFER_TOPIC = toEventSelector(TRANSFER_EVENT);
