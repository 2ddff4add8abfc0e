/**
 * Read-only order index, keyed by order number. Stands in for the order
 * database: loaded once from a JSON seed file at startup.
 */

import { readFile } from "node:fs/promises";
import type { Order } from "../domain/types.js";
import { describeIssues, orderListSchema } from "../domain/validation.js";
import { createLogger, type Logger } from "../logger.js";

export class OrderLookup {
  private readonly byNumber: ReadonlyMap<string, Order>;

  constructor(orders: readonly Order[], logger: Logger = createLogger("orders")) {
    const index = new Map<string, Order>();
    for (const order of orders) {
      if (index.has(order.orderNumber)) {
        logger.warn({ orderNumber: order.orderNumber }, "duplicate order number; later record wins");
      }
      index.set(order.orderNumber, order);
    }
    this.byNumber = index;
  }

  /** Load and validate a seed file; throws if it is missing or malformed */
  static async fromFile(path: string, logger: Logger = createLogger("orders")): Promise<OrderLookup> {
    const raw = await readFile(path, "utf-8");
    const parsed = orderListSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid order seed file ${path}: ${describeIssues(parsed.error)}`);
    }
    const lookup = new OrderLookup(parsed.data, logger);
    logger.info({ path, count: lookup.size }, "orders loaded");
    return lookup;
  }

  get(orderNumber: string): Order | undefined {
    return this.byNumber.get(orderNumber.trim());
  }

  get size(): number {
    return this.byNumber.size;
  }
}
