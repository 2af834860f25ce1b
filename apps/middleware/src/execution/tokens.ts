import { parseUnits } from "viem";
import { TransactionBuildError } from "../errors.js";

export type TokenInfo = {
  symbol: string;
  name: string;
  address: string;
  decimals: number;
};

export const DEFAULT_DECIMALS = 18;
export const PRICE_DECIMALS = 18;

// Sepolia test tokens
const KNOWN_TOKENS: TokenInfo[] = [
  { symbol: "WETH", name: "Wrapped Ether", address: "0xfFf9976782d46CC05630D1f6eB9Bc98210fBfCc5", decimals: 18 },
  { symbol: "USDC", name: "USD Coin", address: "0x56aD9fB23C8A0B2C9030A9086A0F174a7D4E708E", decimals: 6 },
];

const bySymbol = new Map(KNOWN_TOKENS.map((t) => [t.symbol.toUpperCase(), t]));
const byAddress = new Map(KNOWN_TOKENS.map((t) => [t.address.toLowerCase(), t]));

/** Known symbol → address; anything else is passed through as an opaque address. */
export function resolveTokenAddress(symbolOrAddress: string): string {
  return bySymbol.get(symbolOrAddress.toUpperCase())?.address ?? symbolOrAddress;
}

export function tokenDecimals(address: string): number {
  return byAddress.get(address.toLowerCase())?.decimals ?? DEFAULT_DECIMALS;
}

/** Exact scaling; parseUnits would round away digits past `decimals`. */
export function toTokenUnits(amount: string, decimals: number): bigint {
  const fraction = amount.split(".")[1] ?? "";
  if (fraction.length > decimals) {
    throw new TransactionBuildError(`${amount} has more than ${decimals} decimal places`);
  }
  return parseUnits(amount, decimals);
}
