import type { Abi, Address, Hash, Hex } from "viem";
import type { FeeQuote } from "@ordergate/shared";

/** An unsigned transaction; the nonce is assigned when it is broadcast. */
export type TxIntent = {
  label: string;
  to: Address;
  data: Hex;
  value: bigint;
  gas: bigint;
  fees: FeeQuote;
};

export type TransactionHandle = {
  hash: Hash;
  nonce: number;
  label: string;
  broadcastAt: string;
};

export type Receipt = {
  hash: Hash;
  blockNumber: bigint;
  status: "success";
  gasUsed: bigint;
};

export type GenericCall = {
  contract: string;
  abi: Abi;
  functionName: string;
  args?: readonly unknown[];
  value?: bigint;
  gasLimit?: bigint;
  label?: string;
};

export type ConfirmationOptions = {
  timeoutMs: number;
  pollMs?: number;
  signal?: AbortSignal;
};

/** What the order orchestrator needs from the chain. */
export interface ChainGateway {
  readonly address: string;
  readonly contractAddress: string;
  isContractUsable(): boolean;
  buildApprovalTransaction(token: string, spender: string, amount: bigint): Promise<TxIntent>;
  buildGenericCallTransaction(call: GenericCall): Promise<TxIntent>;
  signAndBroadcast(intent: TxIntent): Promise<TransactionHandle>;
  awaitConfirmation(handle: TransactionHandle, options: ConfirmationOptions): Promise<Receipt>;
  getNonce(): number;
  /** Re-reads the pending nonce from the node, e.g. after a dropped transaction. */
  resyncNonce(): Promise<number>;
}
