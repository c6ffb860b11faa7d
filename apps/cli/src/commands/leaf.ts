/**
 * rootdrop leaf <index> <account> <amount>
 *
 * Print keccak256(uint256(index) || address || uint256(amount)).
 */

import { isAddress, leafHash, parseUint256 } from "@rootdrop/primitives";

export function leafCommand(index: string, account: string, amount: string): string {
  if (!isAddress(account)) {
    throw new Error(`Invalid account: must be 0x + 40 hex chars. Got: ${account}`);
  }
  const leaf = leafHash(parseUint256(index), account, parseUint256(amount));
  console.log(leaf);
  return leaf;
}
