import type { OrderStatus } from "@ordergate/shared";

export const STATE_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  CREATED: ["APPROVAL_PENDING", "CANCELED"],
  APPROVAL_PENDING: ["APPROVED", "CREATED", "CANCELED"],
  APPROVED: ["GOVERNANCE_PENDING", "CANCELED"],
  GOVERNANCE_PENDING: ["GOVERNANCE_APPROVED", "CANCELED"],
  // FAILED_ONCHAIN here covers failures before anything was broadcast
  GOVERNANCE_APPROVED: ["ONCHAIN_SUBMITTED", "FAILED_ONCHAIN", "CANCELED"],
  ONCHAIN_SUBMITTED: ["EXECUTED", "FAILED_ONCHAIN", "CANCELED"],
  EXECUTED: [],
  FAILED_ONCHAIN: [],
  CANCELED: [],
};

export const TERMINAL_STATES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(["EXECUTED", "FAILED_ONCHAIN", "CANCELED"]);

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATES.has(status);
}

export function isValidTransition(from: OrderStatus, to: OrderStatus): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}
