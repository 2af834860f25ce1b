import fs from "node:fs";
import { v4 as uuidv4 } from "uuid";
import { createClock, createLogger, type Clock, type Logger, type Order, type OrderStatus } from "@ordergate/shared";

export type AuditEntry = {
  ts: string;
  id: string;
  type: string;
  [key: string]: unknown;
};

/**
 * Append-only JSONL trail of order events. Writes are best-effort: a failed
 * append is logged and the entry is still returned.
 */
export class AuditLog {
  constructor(
    private path: string,
    private clock: Clock = createClock(),
    private logger: Logger = createLogger("audit")
  ) {}

  append(type: string, fields: Record<string, unknown> = {}): AuditEntry {
    const entry: AuditEntry = { ts: this.clock.nowIso(), id: uuidv4(), type, ...fields };
    try {
      fs.appendFileSync(this.path, JSON.stringify(entry) + "\n", "utf-8");
    } catch (e) {
      this.logger.error(`Audit write to ${this.path} failed: ${e instanceof Error ? e.message : String(e)}`, { entry });
    }
    return entry;
  }

  orderEvent(order: Order, event: string, fields: Record<string, unknown> = {}) {
    return this.append("order", { event, orderId: order.id, status: order.status, ...fields });
  }

  transition(orderId: number, from: OrderStatus, to: OrderStatus, fields: Record<string, unknown> = {}) {
    return this.append("transition", { orderId, from, to, ...fields });
  }

  error(err: unknown, fields: Record<string, unknown> = {}) {
    return this.append("error", { error: err instanceof Error ? err.message : String(err), ...fields });
  }

  /** Last `maxLines` entries; unparseable lines come back as `parse_error` records. */
  tail(maxLines = 200): unknown[] {
    if (!fs.existsSync(this.path)) return [];
    const txt = fs.readFileSync(this.path, "utf-8").trim();
    if (!txt) return [];
    return txt
      .split("\n")
      .slice(-maxLines)
      .map((l) => {
        try {
          return JSON.parse(l);
        } catch {
          return { type: "parse_error", raw: l };
        }
      });
  }
}
