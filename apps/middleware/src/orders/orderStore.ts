import type { Order, OrderStatus } from "@ordergate/shared";
import { InvalidOrderTransitionError, OrderNotFoundError } from "../errors.js";
import { isValidTransition } from "./orderStates.js";

export type OrderDraft = Omit<Order, "id" | "status">;
export type OrderPatch = Partial<Omit<Order, "id" | "status">>;

function snapshot(order: Order): Order {
  return { ...order, ruleFindings: order.ruleFindings.map((f) => ({ ...f })) };
}

/** In-memory order table. Reads hand out copies; status moves only through `transition`. */
export class OrderStore {
  private readonly orders = new Map<number, Order>();
  private nextId = 1;

  insert(draft: OrderDraft): Order {
    const order: Order = { ...draft, id: this.nextId++, status: "CREATED" };
    this.orders.set(order.id, order);
    return snapshot(order);
  }

  require(id: number): Order {
    const order = this.orders.get(id);
    if (!order) throw new OrderNotFoundError(id);
    return snapshot(order);
  }

  transition(id: number, to: OrderStatus, patch: OrderPatch = {}): Order {
    const order = this.orders.get(id);
    if (!order) throw new OrderNotFoundError(id);
    if (!isValidTransition(order.status, to)) throw new InvalidOrderTransitionError(id, order.status, to);
    Object.assign(order, patch, { status: to });
    return snapshot(order);
  }

  update(id: number, patch: OrderPatch): Order {
    const order = this.orders.get(id);
    if (!order) throw new OrderNotFoundError(id);
    Object.assign(order, patch);
    return snapshot(order);
  }

  list(): Order[] {
    return [...this.orders.values()].map(snapshot);
  }
}
