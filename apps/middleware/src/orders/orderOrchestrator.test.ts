import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ZodError } from "zod";
import { createSilentLogger, type Clock } from "@ordergate/shared";
import { StaticRuleChecker } from "../advisory/ruleChecker.js";
import { placeholderSource, PlaceholderSourceGenerator, type SourceGenerator } from "../advisory/sourceGenerator.js";
import { AuditLog } from "../audit/auditLog.js";
import { InvalidOrderTransitionError, OrderNotFoundError } from "../errors.js";
import { SimulatedGovernance } from "../governance/simulatedGovernance.js";
import { FakeChain, hashFor, ORDER_BOOK, USDC, WALLET, WETH } from "../testing/fakeChain.js";
import { OrderOrchestrator, type OrchestratorDeps } from "./orderOrchestrator.js";

const NOW_MS = 1_753_926_014_868;
const NOW_ISO = "2026-03-01T12:00:00.000Z";
const clock: Clock = { nowMs: () => NOW_MS, nowIso: () => NOW_ISO };

const ORDER_INPUT = { prompt: "Sell 0.01 WETH for USDC at 3500", fromToken: "WETH", toToken: "USDC", amount: 0.01, price: 3500.0 };

describe("OrderOrchestrator", () => {
  let dir: string;
  let audit: AuditLog;
  let chain: FakeChain;
  let orchestrator: OrderOrchestrator;

  function build(sourceGenerator: SourceGenerator = new PlaceholderSourceGenerator(clock), trail: OrchestratorDeps["audit"] = audit) {
    return new OrderOrchestrator({
      chain,
      governance: new SimulatedGovernance(createSilentLogger(), clock),
      sourceGenerator,
      ruleChecker: new StaticRuleChecker(),
      audit: trail,
      logger: createSilentLogger(),
      clock,
      settings: { approvalTimeoutMs: 180_000, submitTimeoutMs: 300_000, orderGasLimit: 500_000n },
    });
  }

  async function approvedOrder() {
    const order = await orchestrator.createLimitOrder(ORDER_INPUT);
    await orchestrator.initiateGovernanceApproval(order.id);
    return order.id;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ordergate-"));
    audit = new AuditLog(path.join(dir, "audit.jsonl"), clock);
    chain = new FakeChain(NOW_ISO);
    orchestrator = build();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("createLimitOrder", () => {
    it("creates the order and approves the allowance", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(order.id).toBe(1);
      expect(order.status).toBe("APPROVED");
      expect(order.approvalTxHash).toBe(hashFor(0));
      expect(order.amount).toBe("0.01");
      expect(order.price).toBe("3500");
      expect(order.fromTokenAddress).toBe(WETH);
      expect(order.toTokenAddress).toBe(USDC);
      expect(order.wallet).toBe(WALLET);
      expect(order.createdAt).toBe(NOW_ISO);
      expect(order.lastError).toBeNull();
      expect(chain.approvals).toEqual([{ token: WETH, spender: ORDER_BOOK, amount: 10n ** 16n }]);
      expect(chain.waits).toEqual([{ timeoutMs: 180_000 }]);
    });

    it("scales the allowance by the from-token decimals", async () => {
      await orchestrator.createLimitOrder({ ...ORDER_INPUT, fromToken: "USDC", toToken: "WETH", amount: "12.5" });
      expect(chain.approvals[0]?.amount).toBe(12_500_000n);
    });

    it("keeps the order CREATED when the approval times out", async () => {
      chain.approvalOutcome = "timeout";
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(order.status).toBe("CREATED");
      expect(order.approvalTxHash).toBeNull();
      expect(order.lastError).toBe(`No receipt for ${hashFor(0)} within 180000ms; it may still confirm later`);
    });

    it("keeps the order CREATED when the order book address is unusable", async () => {
      chain.usable = false;
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(order.status).toBe("CREATED");
      expect(order.lastError).toBe("Order book contract address is not configured");
      expect(chain.approvals).toEqual([]);
    });

    it("uses the placeholder source when generation fails", async () => {
      orchestrator = build({ generate: async () => { throw new Error("model offline"); } });
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(order.sourceCode).toBe(placeholderSource(ORDER_INPUT.prompt, 1_753_926_014));
    });

    it("rejects invalid amounts before creating anything", async () => {
      await expect(orchestrator.createLimitOrder({ ...ORDER_INPUT, amount: "-1" })).rejects.toThrow();
      expect(orchestrator.listOrders()).toEqual([]);
    });

    it("rejects amounts finer than the from-token decimals", async () => {
      const tooFine = { ...ORDER_INPUT, fromToken: "USDC", toToken: "WETH", amount: "0.0000004" };
      const err = await orchestrator.createLimitOrder(tooFine).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ZodError);
      if (err instanceof ZodError) {
        expect(err.issues.map((i) => [i.path.join("."), i.message])).toEqual([["amount", "At most 6 decimal places for USDC"]]);
      }
      expect(orchestrator.listOrders()).toEqual([]);
      expect(chain.approvals).toEqual([]);
    });

    it("assigns strictly increasing ids", async () => {
      const ids: number[] = [];
      for (let i = 0; i < 3; i++) ids.push((await orchestrator.createLimitOrder(ORDER_INPUT)).id);
      expect(ids).toEqual([1, 2, 3]);
    });

    it("records each transition in the audit log", async () => {
      await orchestrator.createLimitOrder(ORDER_INPUT);
      const transitions = audit
        .tail()
        .filter((e): e is { type: string; from: string; to: string } => typeof e === "object" && e !== null && "type" in e && e.type === "transition")
        .map((e) => `${e.from}->${e.to}`);
      expect(transitions).toEqual(["CREATED->APPROVAL_PENDING", "APPROVAL_PENDING->APPROVED"]);
    });

    it("leaves an order canceled during the approval wait canceled", async () => {
      let release = () => {};
      chain.hold = new Promise<void>((resolve) => { release = resolve; });
      const pending = orchestrator.createLimitOrder(ORDER_INPUT);
      await new Promise((r) => setTimeout(r, 0));
      orchestrator.cancel(1);
      release();
      const order = await pending;
      expect(order.status).toBe("CANCELED");
      expect(order.approvalTxHash).toBe(hashFor(0));
    });
  });

  describe("retryApproval", () => {
    it("approves an order whose first approval failed", async () => {
      chain.approvalOutcome = "reverted";
      const failed = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(failed.status).toBe("CREATED");
      chain.approvalOutcome = "success";
      const retried = await orchestrator.retryApproval(failed.id);
      expect(retried.status).toBe("APPROVED");
      expect(retried.approvalTxHash).toBe(hashFor(1));
      expect(retried.lastError).toBeNull();
    });

    it("refuses orders that are already approved", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      await expect(orchestrator.retryApproval(order.id)).rejects.toBeInstanceOf(InvalidOrderTransitionError);
    });
  });

  describe("initiateGovernanceApproval", () => {
    it("proposes and approves the order", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      const result = await orchestrator.initiateGovernanceApproval(order.id);
      expect(result.status).toBe("GOVERNANCE_APPROVED");
      expect(result.proposal).toEqual({
        id: NOW_MS,
        orderId: 1,
        title: "Approve Limit Order #1 (0.01 WETH)",
        proposer: WALLET,
        status: "approved",
        createdAt: NOW_ISO,
      });
      expect(orchestrator.getOrder(order.id).governanceProposalId).toBe(NOW_MS);
    });

    it("requires an approved allowance", async () => {
      chain.usable = false;
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      await expect(orchestrator.initiateGovernanceApproval(order.id)).rejects.toBeInstanceOf(InvalidOrderTransitionError);
      expect(orchestrator.getOrder(order.id).status).toBe("CREATED");
    });

    it("throws OrderNotFoundError for unknown orders", async () => {
      await expect(orchestrator.initiateGovernanceApproval(42)).rejects.toBeInstanceOf(OrderNotFoundError);
    });

    it("opens one proposal for concurrent requests on the same order", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      const [first, second] = await Promise.allSettled([
        orchestrator.initiateGovernanceApproval(order.id),
        orchestrator.initiateGovernanceApproval(order.id),
      ]);
      expect(first).toMatchObject({ status: "fulfilled", value: { status: "GOVERNANCE_APPROVED", proposal: { id: NOW_MS } } });
      expect(second?.status).toBe("rejected");
      if (second?.status === "rejected") expect(second.reason).toBeInstanceOf(InvalidOrderTransitionError);
      expect(orchestrator.getOrder(order.id).governanceProposalId).toBe(NOW_MS);
    });
  });

  describe("submitAndExecute", () => {
    it("submits the order and marks it executed", async () => {
      const id = await approvedOrder();
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({ orderId: id, status: "EXECUTED", txHash: hashFor(1) });
      const order = orchestrator.getOrder(id);
      expect(order.status).toBe("EXECUTED");
      expect(order.orderTxHash).toBe(hashFor(1));
      expect(chain.calls[0]?.functionName).toBe("submitLimitOrder");
      expect(chain.calls[0]?.args).toEqual([WETH, USDC, 10n ** 16n, 3500n * 10n ** 18n, WALLET]);
      expect(chain.calls[0]?.gasLimit).toBe(500_000n);
      expect(chain.waits[1]).toEqual({ timeoutMs: 300_000 });
    });

    it("records a reverted submission without throwing", async () => {
      const id = await approvedOrder();
      chain.submitOutcome = "reverted";
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({
        orderId: id,
        status: "FAILED_ONCHAIN",
        txHash: hashFor(1),
        error: `Transaction ${hashFor(1)} failed on-chain (status reverted)`,
      });
      const order = orchestrator.getOrder(id);
      expect(order.status).toBe("FAILED_ONCHAIN");
      expect(order.orderTxHash).toBe(hashFor(1));
    });

    it("fails the order when the broadcast is rejected", async () => {
      const id = await approvedOrder();
      chain.rejectBroadcast = true;
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({ orderId: id, status: "FAILED_ONCHAIN", txHash: null, error: "Broadcast failed for nonce 1: rejected" });
      expect(orchestrator.getOrder(id).orderTxHash).toBeNull();
    });

    it("fails the order with its hash when confirmation times out", async () => {
      const id = await approvedOrder();
      chain.submitOutcome = "timeout";
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({
        orderId: id,
        status: "FAILED_ONCHAIN",
        txHash: hashFor(1),
        error: `No receipt for ${hashFor(1)} within 300000ms; it may still confirm later`,
      });
      const order = orchestrator.getOrder(id);
      expect(order.status).toBe("FAILED_ONCHAIN");
      expect(order.orderTxHash).toBe(hashFor(1));
      expect(chain.nonce).toBe(2);
    });

    it("fails the order without broadcasting when the order book address is unusable", async () => {
      const id = await approvedOrder();
      chain.usable = false;
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({ orderId: id, status: "FAILED_ONCHAIN", txHash: null, error: "Order book contract address is not configured" });
      expect(chain.calls).toEqual([]);
      expect(chain.nonce).toBe(1);
      expect(orchestrator.getOrder(id).status).toBe("FAILED_ONCHAIN");
    });

    it("broadcasts once for concurrent submissions of the same order", async () => {
      const id = await approvedOrder();
      const [first, second] = await Promise.allSettled([orchestrator.submitAndExecute(id), orchestrator.submitAndExecute(id)]);
      expect(first).toEqual({ status: "fulfilled", value: { orderId: id, status: "EXECUTED", txHash: hashFor(1) } });
      expect(second?.status).toBe("rejected");
      if (second?.status === "rejected") expect(second.reason).toBeInstanceOf(InvalidOrderTransitionError);
      expect(chain.calls).toHaveLength(1);
      expect(orchestrator.getOrder(id).orderTxHash).toBe(hashFor(1));
    });

    it("reports CANCELED when the order is canceled during the confirmation wait", async () => {
      const id = await approvedOrder();
      let release = () => {};
      chain.hold = new Promise<void>((resolve) => { release = resolve; });
      const pending = orchestrator.submitAndExecute(id);
      await new Promise((r) => setTimeout(r, 0));
      expect(orchestrator.cancel(id).status).toBe("CANCELED");
      release();
      expect(await pending).toEqual({ orderId: id, status: "CANCELED", txHash: hashFor(1) });
      const order = orchestrator.getOrder(id);
      expect(order.status).toBe("CANCELED");
      expect(order.orderTxHash).toBe(hashFor(1));
    });

    it("keeps working when the audit log cannot be written", async () => {
      audit = new AuditLog(dir, clock, createSilentLogger());
      orchestrator = build();
      const id = await approvedOrder();
      const result = await orchestrator.submitAndExecute(id);
      expect(result).toEqual({ orderId: id, status: "EXECUTED", txHash: hashFor(1) });
      expect(orchestrator.getOrder(id).status).toBe("EXECUTED");
    });

    it("settles a failed submission even when every audit write throws", async () => {
      const fail = () => {
        throw new Error("EACCES: audit");
      };
      orchestrator = build(undefined, { orderEvent: fail, transition: fail, error: fail });
      const id = await approvedOrder();
      chain.submitOutcome = "reverted";
      const result = await orchestrator.submitAndExecute(id);
      expect(result.status).toBe("FAILED_ONCHAIN");
      expect(orchestrator.getOrder(id).status).toBe("FAILED_ONCHAIN");
    });

    it("requires governance approval", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      await expect(orchestrator.submitAndExecute(order.id)).rejects.toBeInstanceOf(InvalidOrderTransitionError);
      expect(chain.calls).toEqual([]);
    });
  });

  describe("cancel", () => {
    it("cancels an order that never got its allowance", async () => {
      chain.usable = false;
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      expect(orchestrator.cancel(order.id)).toEqual({ orderId: order.id, status: "CANCELED", canceledAt: NOW_ISO });
      const canceled = orchestrator.getOrder(order.id);
      expect(canceled.status).toBe("CANCELED");
      expect(canceled.canceledAt).toBe(NOW_ISO);
    });

    it("throws OrderNotFoundError for unknown orders", () => {
      expect(() => orchestrator.cancel(99)).toThrow(OrderNotFoundError);
    });

    it("refuses to cancel executed orders", async () => {
      const id = await approvedOrder();
      await orchestrator.submitAndExecute(id);
      expect(() => orchestrator.cancel(id)).toThrow(InvalidOrderTransitionError);
      expect(orchestrator.getOrder(id).status).toBe("EXECUTED");
    });
  });

  describe("queries", () => {
    it("lists orders in creation order without side effects", async () => {
      await orchestrator.createLimitOrder(ORDER_INPUT);
      await orchestrator.createLimitOrder({ ...ORDER_INPUT, amount: "2" });
      const first = orchestrator.listOrders();
      expect(first.map((o) => o.amount)).toEqual(["0.01", "2"]);
      expect(orchestrator.listOrders()).toEqual(first);
    });

    it("runs the rule checker and stores its findings", async () => {
      const order = await orchestrator.createLimitOrder(ORDER_INPUT);
      const details = await orchestrator.getAuditDetails(order.id);
      expect(details.ruleFindings).toEqual([{ severity: "info", message: "No critical issues found." }]);
      expect(details.sourceCode).toBe(order.sourceCode);
      expect(orchestrator.getOrder(order.id).ruleFindings).toEqual(details.ruleFindings);
    });

    it("throws OrderNotFoundError from getOrder for unknown ids", () => {
      expect(() => orchestrator.getOrder(5)).toThrow(OrderNotFoundError);
    });
  });
});
