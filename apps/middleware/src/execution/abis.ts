import { parseAbi } from "viem";

export const Erc20Abi = parseAbi([
  "function approve(address spender, uint256 value) returns (bool)",
]);

export const OrderBookAbi = parseAbi([
  "function submitLimitOrder(address fromToken, address toToken, uint256 amount, uint256 price, address maker)",
]);

// Contract address used when ORDER_BOOK_ADDRESS is missing or invalid.
export const SENTINEL_CONTRACT_ADDRESS = "0x000000000000000000000000000000000000dEaD";
