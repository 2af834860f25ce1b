import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Clock, Logger } from "@ordergate/shared";
import { AuditLog } from "./auditLog.js";

const clock: Clock = { nowMs: () => 0, nowIso: () => "2026-03-01T00:00:00.000Z" };

describe("AuditLog", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "ordergate-audit-"));
    file = path.join(dir, "audit.jsonl");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes one JSON line per entry with a unique id", () => {
    const audit = new AuditLog(file, clock);
    const a = audit.transition(1, "CREATED", "APPROVAL_PENDING");
    const b = audit.error(new Error("boom"), { orderId: 1 });
    expect(a.id).not.toBe(b.id);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);

    const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? "")).toEqual({ ts: "2026-03-01T00:00:00.000Z", id: b.id, type: "error", error: "boom", orderId: 1 });
  });

  it("tails the last entries and tolerates corrupt lines", () => {
    const audit = new AuditLog(file, clock);
    audit.append("a");
    fs.appendFileSync(file, "not json\n");
    audit.append("b");
    const tail = audit.tail(2);
    expect(tail).toHaveLength(2);
    expect(tail[0]).toEqual({ type: "parse_error", raw: "not json" });
    expect(tail[1]).toMatchObject({ type: "b" });
  });

  it("returns nothing before the first write", () => {
    expect(new AuditLog(file, clock).tail()).toEqual([]);
  });

  it("logs and carries on when the file cannot be written", () => {
    const errors: string[] = [];
    const logger: Logger = { debug: () => {}, info: () => {}, warn: () => {}, error: (message) => errors.push(message) };
    // a directory cannot be appended to
    const audit = new AuditLog(dir, clock, logger);
    const entry = audit.transition(3, "APPROVED", "GOVERNANCE_PENDING");
    expect(entry).toMatchObject({ type: "transition", orderId: 3, from: "APPROVED", to: "GOVERNANCE_PENDING" });
    expect(errors).toHaveLength(1);
    expect(errors[0]?.startsWith(`Audit write to ${dir} failed: EISDIR`)).toBe(true);
  });
});
