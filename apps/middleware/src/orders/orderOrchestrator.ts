import { z } from "zod";
import {
  createOrderSchema,
  type AuditDetails,
  type CancellationResult,
  type Clock,
  type CreateOrderRequest,
  type ExecutionResult,
  type GovernanceResult,
  type Logger,
  type Order,
  type OrderStatus,
} from "@ordergate/shared";
import type { AppConfig } from "../config.js";
import type { RuleChecker } from "../advisory/ruleChecker.js";
import { placeholderSource, type SourceGenerator } from "../advisory/sourceGenerator.js";
import type { AuditLog } from "../audit/auditLog.js";
import { describeError, InvalidOrderTransitionError, TransactionBuildError } from "../errors.js";
import { OrderBookAbi } from "../execution/abis.js";
import { PRICE_DECIMALS, resolveTokenAddress, toTokenUnits, tokenDecimals } from "../execution/tokens.js";
import type { ChainGateway, TransactionHandle } from "../execution/types.js";
import type { GovernanceGateway } from "../governance/governanceGateway.js";
import { OrderStore, type OrderPatch } from "./orderStore.js";

export type OrchestratorSettings = {
  approvalTimeoutMs: number;
  submitTimeoutMs: number;
  orderGasLimit: bigint;
};

export function settingsFromConfig(
  config: Pick<AppConfig, "approvalTimeoutSeconds" | "submitTimeoutSeconds" | "orderGasLimit">
): OrchestratorSettings {
  return {
    approvalTimeoutMs: config.approvalTimeoutSeconds * 1000,
    submitTimeoutMs: config.submitTimeoutSeconds * 1000,
    orderGasLimit: config.orderGasLimit,
  };
}

function fractionDigits(decimal: string): number {
  const dot = decimal.indexOf(".");
  return dot < 0 ? 0 : decimal.length - dot - 1;
}

// Amounts finer than the token's decimals would scale to a different on-chain value.
const limitOrderSchema = createOrderSchema.superRefine((req, ctx) => {
  const decimals = tokenDecimals(resolveTokenAddress(req.fromToken));
  if (fractionDigits(req.amount) > decimals) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["amount"], message: `At most ${decimals} decimal places for ${req.fromToken}` });
  }
  if (fractionDigits(req.price) > PRICE_DECIMALS) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["price"], message: `At most ${PRICE_DECIMALS} decimal places` });
  }
});

export type OrchestratorDeps = {
  chain: ChainGateway;
  governance: GovernanceGateway;
  sourceGenerator: SourceGenerator;
  ruleChecker: RuleChecker;
  audit: Pick<AuditLog, "orderEvent" | "transition" | "error">;
  logger: Logger;
  clock: Clock;
  settings: OrchestratorSettings;
  store?: OrderStore;
};

/**
 * Drives an order from creation through allowance, governance and on-chain
 * submission. Chain failures during approval and submission are recorded on the
 * order instead of being thrown.
 */
export class OrderOrchestrator {
  private readonly store: OrderStore;
  private readonly chain: ChainGateway;
  private readonly governance: GovernanceGateway;
  private readonly sourceGenerator: SourceGenerator;
  private readonly ruleChecker: RuleChecker;
  private readonly audit: OrchestratorDeps["audit"];
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly settings: OrchestratorSettings;
  // orders with a governance or submission call in flight
  private readonly inFlight = new Set<number>();

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store ?? new OrderStore();
    this.chain = deps.chain;
    this.governance = deps.governance;
    this.sourceGenerator = deps.sourceGenerator;
    this.ruleChecker = deps.ruleChecker;
    this.audit = deps.audit;
    this.logger = deps.logger;
    this.clock = deps.clock;
    this.settings = deps.settings;
  }

  async createLimitOrder(request: CreateOrderRequest): Promise<Order> {
    const input = limitOrderSchema.parse(request);
    const sourceCode = await this.generateSource(input.prompt);

    const order = this.store.insert({
      prompt: input.prompt,
      fromToken: input.fromToken,
      toToken: input.toToken,
      fromTokenAddress: resolveTokenAddress(input.fromToken),
      toTokenAddress: resolveTokenAddress(input.toToken),
      amount: input.amount,
      price: input.price,
      wallet: this.chain.address,
      sourceCode,
      createdAt: this.clock.nowIso(),
      canceledAt: null,
      approvalTxHash: null,
      governanceProposalId: null,
      orderTxHash: null,
      ruleFindings: [],
      lastError: null,
    });
    this.logger.info(`Limit order ${order.id} created: ${order.amount} ${order.fromToken} -> ${order.toToken} @ ${order.price}`);
    this.record(() =>
      this.audit.orderEvent(order, "created", { fromToken: order.fromToken, toToken: order.toToken, amount: order.amount, price: order.price })
    );

    return this.approve(order.id);
  }

  /** Re-attempts the allowance for an order whose approval failed. */
  async retryApproval(orderId: number): Promise<Order> {
    this.store.require(orderId);
    return this.approve(orderId);
  }

  async initiateGovernanceApproval(orderId: number): Promise<GovernanceResult> {
    const order = this.store.require(orderId);
    const release = this.reserve(order, "APPROVED", "GOVERNANCE_PENDING");
    try {
      const title = `Approve Limit Order #${order.id} (${order.amount} ${order.fromToken})`;
      const proposal = await this.governance.propose(order.id, title, order.wallet);
      this.move(orderId, "GOVERNANCE_PENDING", { governanceProposalId: proposal.id });

      const decided = await this.governance.simulateApproval(orderId);
      const updated = this.settle(orderId, "GOVERNANCE_PENDING", "GOVERNANCE_APPROVED", {});
      this.logger.info(`Order ${orderId} passed governance (proposal ${decided.id})`);
      return { orderId, proposal: decided, status: updated.status };
    } finally {
      release();
    }
  }

  async submitAndExecute(orderId: number): Promise<ExecutionResult> {
    const order = this.store.require(orderId);
    const release = this.reserve(order, "GOVERNANCE_APPROVED", "ONCHAIN_SUBMITTED");
    try {
      return await this.execute(order);
    } finally {
      release();
    }
  }

  private async execute(order: Order): Promise<ExecutionResult> {
    const orderId = order.id;
    let handle: TransactionHandle | null = null;
    try {
      if (!this.chain.isContractUsable()) {
        throw new TransactionBuildError("Order book contract address is not configured");
      }
      const intent = await this.chain.buildGenericCallTransaction({
        contract: this.chain.contractAddress,
        abi: OrderBookAbi,
        functionName: "submitLimitOrder",
        args: [
          order.fromTokenAddress,
          order.toTokenAddress,
          toTokenUnits(order.amount, tokenDecimals(order.fromTokenAddress)),
          toTokenUnits(order.price, PRICE_DECIMALS),
          order.wallet,
        ],
        gasLimit: this.settings.orderGasLimit,
        label: `submitLimitOrder #${orderId}`,
      });
      handle = await this.chain.signAndBroadcast(intent);
      this.settle(orderId, "GOVERNANCE_APPROVED", "ONCHAIN_SUBMITTED", { orderTxHash: handle.hash });

      await this.chain.awaitConfirmation(handle, { timeoutMs: this.settings.submitTimeoutMs });
      const settled = this.settle(orderId, "ONCHAIN_SUBMITTED", "EXECUTED", { lastError: null });
      this.logger.info(`Order ${orderId} executed in tx ${handle.hash}`);
      return { orderId, status: settled.status === "CANCELED" ? "CANCELED" : "EXECUTED", txHash: settled.orderTxHash };
    } catch (e) {
      const message = describeError(e);
      this.logger.error(`Order ${orderId} submission failed: ${message}`);
      this.record(() => this.audit.error(e, { orderId, stage: "submit", txHash: handle?.hash ?? null }));
      const settled = this.settle(orderId, handle ? "ONCHAIN_SUBMITTED" : "GOVERNANCE_APPROVED", "FAILED_ONCHAIN", {
        lastError: message,
      });
      return {
        orderId,
        status: settled.status === "CANCELED" ? "CANCELED" : "FAILED_ONCHAIN",
        txHash: settled.orderTxHash,
        error: message,
      };
    }
  }

  cancel(orderId: number): CancellationResult {
    const canceledAt = this.clock.nowIso();
    this.move(orderId, "CANCELED", { canceledAt });
    this.logger.info(`Order ${orderId} canceled`);
    return { orderId, status: "CANCELED", canceledAt };
  }

  listOrders(): Order[] {
    return this.store.list();
  }

  getOrder(orderId: number): Order {
    return this.store.require(orderId);
  }

  async getAuditDetails(orderId: number): Promise<AuditDetails> {
    const order = this.store.require(orderId);
    const ruleFindings = await this.ruleChecker.check(order.sourceCode);
    const updated = this.store.update(orderId, { ruleFindings });
    this.record(() => this.audit.orderEvent(updated, "rules_checked", { findings: ruleFindings.length }));
    return { orderId, sourceCode: updated.sourceCode, ruleFindings: updated.ruleFindings };
  }

  private async generateSource(prompt: string): Promise<string> {
    try {
      return await this.sourceGenerator.generate(prompt);
    } catch (e) {
      this.logger.warn(`Source generation failed (${describeError(e)}); using placeholder`);
      return placeholderSource(prompt, Math.floor(this.clock.nowMs() / 1000));
    }
  }

  private async approve(orderId: number): Promise<Order> {
    const order = this.move(orderId, "APPROVAL_PENDING");
    try {
      if (!this.chain.isContractUsable()) {
        throw new TransactionBuildError("Order book contract address is not configured");
      }
      const amount = toTokenUnits(order.amount, tokenDecimals(order.fromTokenAddress));
      const intent = await this.chain.buildApprovalTransaction(order.fromTokenAddress, this.chain.contractAddress, amount);
      const handle = await this.chain.signAndBroadcast(intent);
      await this.chain.awaitConfirmation(handle, { timeoutMs: this.settings.approvalTimeoutMs });
      this.logger.info(`Order ${orderId} allowance confirmed in tx ${handle.hash}`);
      return this.settle(orderId, "APPROVAL_PENDING", "APPROVED", { approvalTxHash: handle.hash, lastError: null });
    } catch (e) {
      const message = describeError(e);
      this.logger.warn(`Order ${orderId} allowance failed: ${message}`);
      this.record(() => this.audit.error(e, { orderId, stage: "approve" }));
      return this.settle(orderId, "APPROVAL_PENDING", "CREATED", { lastError: message });
    }
  }

  private move(orderId: number, to: OrderStatus, patch: OrderPatch = {}): Order {
    const from = this.store.require(orderId).status;
    const order = this.store.transition(orderId, to, patch);
    this.record(() => this.audit.transition(orderId, from, to, patch));
    return order;
  }

  // Audit writes never decide an order's state.
  private record(write: () => unknown): void {
    try {
      write();
    } catch (e) {
      this.logger.error(`Audit write failed: ${describeError(e)}`);
    }
  }

  // Claimed before the first await so a concurrent duplicate request is refused.
  private reserve(order: Order, expected: OrderStatus, to: OrderStatus): () => void {
    if (order.status !== expected || this.inFlight.has(order.id)) {
      throw new InvalidOrderTransitionError(order.id, order.status, to);
    }
    this.inFlight.add(order.id);
    return () => {
      this.inFlight.delete(order.id);
    };
  }

  // The order may have been canceled while a chain call was in flight; the
  // outcome is then recorded without moving the status.
  private settle(orderId: number, expected: OrderStatus, to: OrderStatus, patch: OrderPatch): Order {
    const current = this.store.require(orderId);
    if (current.status !== expected) {
      this.logger.warn(`Order ${orderId} is ${current.status}, not ${expected}; keeping it there`);
      return this.store.update(orderId, patch);
    }
    return this.move(orderId, to, patch);
  }
}
