import type { OrderStatus } from "@ordergate/shared";

export type ErrorCode =
  | "CONFIGURATION"
  | "CHAIN_UNAVAILABLE"
  | "RPC_ERROR"
  | "SERVICE_UNAVAILABLE"
  | "TX_BUILD"
  | "INSUFFICIENT_FUNDS"
  | "BROADCAST"
  | "CONFIRMATION_TIMEOUT"
  | "ONCHAIN_EXECUTION_FAILED"
  | "ORDER_NOT_FOUND"
  | "PROPOSAL_NOT_FOUND"
  | "INVALID_TRANSITION";

export class OrderGateError extends Error {
  constructor(public readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrderGateError";
  }
}

/** Missing or malformed process configuration; no chain client is built. */
export class ConfigurationError extends OrderGateError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export class ChainConnectionError extends OrderGateError {
  constructor(public readonly rpcUrl: string, cause?: unknown) {
    super("CHAIN_UNAVAILABLE", `Failed to connect to RPC ${rpcUrl}: ${describeError(cause)}`, { cause });
    this.name = "ChainConnectionError";
  }
}

/** A read against the node failed where no safe fallback exists. */
export class RpcRequestError extends OrderGateError {
  constructor(public readonly operation: string, cause?: unknown) {
    super("RPC_ERROR", `RPC ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "RpcRequestError";
  }
}

export class ServiceUnavailableError extends OrderGateError {
  constructor(public readonly reason: string) {
    super("SERVICE_UNAVAILABLE", `Order service unavailable: ${reason}`);
    this.name = "ServiceUnavailableError";
  }
}

export class TransactionBuildError extends OrderGateError {
  constructor(message: string, cause?: unknown) {
    super("TX_BUILD", message, { cause });
    this.name = "TransactionBuildError";
  }
}

export class InsufficientFundsError extends OrderGateError {
  constructor(public readonly balance: bigint, public readonly required: bigint) {
    super("INSUFFICIENT_FUNDS", `Insufficient balance: have ${balance} wei, need ${required} wei`);
    this.name = "InsufficientFundsError";
  }
}

export class BroadcastError extends OrderGateError {
  constructor(public readonly nonce: number, cause?: unknown) {
    super("BROADCAST", `Broadcast failed for nonce ${nonce}: ${describeError(cause)}`, { cause });
    this.name = "BroadcastError";
  }
}

/**
 * No receipt arrived within the bound. The transaction was broadcast and may
 * still be mined later.
 */
export class ConfirmationTimeoutError extends OrderGateError {
  constructor(public readonly hash: string, public readonly timeoutMs: number) {
    super("CONFIRMATION_TIMEOUT", `No receipt for ${hash} within ${timeoutMs}ms; it may still confirm later`);
    this.name = "ConfirmationTimeoutError";
  }
}

export class OnchainExecutionFailedError extends OrderGateError {
  constructor(public readonly hash: string, public readonly receiptStatus: string, public readonly blockNumber: bigint | null) {
    super("ONCHAIN_EXECUTION_FAILED", `Transaction ${hash} failed on-chain (status ${receiptStatus})`);
    this.name = "OnchainExecutionFailedError";
  }
}

export class OrderNotFoundError extends OrderGateError {
  constructor(public readonly orderId: number) {
    super("ORDER_NOT_FOUND", `Order ${orderId} not found`);
    this.name = "OrderNotFoundError";
  }
}

export class ProposalNotFoundError extends OrderGateError {
  constructor(public readonly ref: string) {
    super("PROPOSAL_NOT_FOUND", `Proposal not found: ${ref}`);
    this.name = "ProposalNotFoundError";
  }
}

export class InvalidOrderTransitionError extends OrderGateError {
  constructor(public readonly orderId: number, public readonly from: OrderStatus, public readonly to: OrderStatus) {
    super("INVALID_TRANSITION", `Invalid order state transition: ${from} -> ${to} for order ${orderId}`);
    this.name = "InvalidOrderTransitionError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    // viem errors carry a one-line shortMessage next to a multi-line message
    const short = "shortMessage" in err && typeof err.shortMessage === "string" ? err.shortMessage : undefined;
    return short ?? err.message;
  }
  return String(err);
}
