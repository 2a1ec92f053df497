/**
 * Supported EVM chains, keyed by numeric chain id.
 */

import type { Chain } from "viem";
import {
  mainnet,
  sepolia,
  base,
  arbitrum,
  optimism,
  polygon,
  bsc,
  bitTorrent,
} from "viem/chains";
import { ChainError } from "./errors.js";

export const VIEM_CHAINS: Readonly<Record<number, Chain>> = {
  [mainnet.id]: mainnet,
  [sepolia.id]: sepolia,
  [base.id]: base,
  [arbitrum.id]: arbitrum,
  [optimism.id]: optimism,
  [polygon.id]: polygon,
  [bsc.id]: bsc,
  [bitTorrent.id]: bitTorrent,
};

/**
 * Resolve a numeric chain id to its viem chain definition.
 *
 * @throws ChainError UNSUPPORTED_CHAIN
 */
export function getViemChain(chainId: number): Chain {
  const chain = VIEM_CHAINS[chainId];
  if (chain === undefined) {
    throw new ChainError(
      "UNSUPPORTED_CHAIN",
      `unsupported chain '${chainId}'. Supported: ${Object.keys(VIEM_CHAINS).join(", ")}`,
    );
  }
  return chain;
}

/**
 * Whether a chain id has a viem definition.
 */
export function isSupportedChain(chainId: number): boolean {
  return VIEM_CHAINS[chainId] !== undefined;
}
