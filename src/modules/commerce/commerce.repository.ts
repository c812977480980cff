import { and, asc, eq, isNull, sql } from "drizzle-orm";
import type { Database } from "../../lib/db.js";
import {
  auditLogs,
  invoices,
  orderItems,
  orders,
  paymentTransactions,
  sites,
} from "../../db/schema.js";
import {
  ORDER_STATUS,
  type AuditEntry,
  type CommerceStore,
  type Invoice,
  type InvoiceContext,
  type Order,
  type SettlementInput,
  type Site,
  type TransactionRecord,
} from "./commerce.types.js";
import { DuplicateTransactionError, StaleOrderStateError } from "./commerce.errors.js";
import { assertFulfillable } from "./fulfillment.js";
import { formatInvoiceNumber, orderTotals } from "./money.js";

const PG_UNIQUE_VIOLATION = "23505";

/** pg errors carry the SQLSTATE in `code`; drizzle may wrap them in `cause`. */
function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("code" in err && err.code === PG_UNIQUE_VIOLATION) return true;
  return "cause" in err && isUniqueViolation(err.cause);
}

type TransactionRow = typeof paymentTransactions.$inferSelect;
type InvoiceRow = typeof invoices.$inferSelect;

function toTransactionRecord(row: TransactionRow): TransactionRecord {
  return {
    id: row.id,
    orderId: row.orderId,
    type: row.type,
    status: row.status,
    gateway: row.gateway,
    gatewayTransactionId: row.gatewayTransactionId,
    method: row.method,
    amount: row.amount,
    currency: row.currency,
    reason: row.reason,
    response: row.response,
    actorId: row.actorId,
    createdAt: row.createdAt,
  };
}

function toInvoice(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    invoiceNumber: row.invoiceNumber,
    orderId: row.orderId,
    status: row.status,
    grossTotal: row.grossTotal,
    discountTotal: row.discountTotal,
    taxTotal: row.taxTotal,
    total: row.total,
    currency: row.currency,
    relatedTransactionId: row.relatedTransactionId,
    createdAt: row.createdAt,
  };
}

/** CommerceStore over PostgreSQL. */
export function createCommerceRepository(db: Database): CommerceStore {
  async function resolveOrder(orderId: number): Promise<Order | null> {
    const [row] = await db.select().from(orders).where(eq(orders.id, orderId)).limit(1);
    if (!row) return null;
    const items = await db
      .select()
      .from(orderItems)
      .where(eq(orderItems.orderId, orderId))
      .orderBy(asc(orderItems.id));
    return {
      id: row.id,
      siteId: row.siteId,
      userId: row.userId,
      customerEmail: row.customerEmail,
      status: row.status,
      currency: row.currency,
      description: row.description,
      fulfilledAt: row.fulfilledAt,
      items: items.map((item) => ({
        id: item.id,
        sku: item.sku,
        itemType: item.itemType,
        title: item.title,
        originalPrice: item.originalPrice,
        discountAmount: item.discountAmount,
        taxAmount: item.taxAmount,
        finalPrice: item.finalPrice,
        fulfilledAt: item.fulfilledAt,
      })),
    };
  }

  return {
    resolveOrder,

    async resolveSite(siteId: number): Promise<Site | null> {
      const [row] = await db.select().from(sites).where(eq(sites.id, siteId)).limit(1);
      return row ?? null;
    },

    async recordAudit(entry: AuditEntry): Promise<void> {
      await db.insert(auditLogs).values({
        action: entry.action,
        orderId: entry.orderId,
        gateway: entry.gateway,
        context: entry.context,
      });
    },

    async commitSettlement(input: SettlementInput): Promise<TransactionRecord> {
      try {
        return await db.transaction(async (tx) => {
          const [row] = await tx
            .insert(paymentTransactions)
            .values({
              orderId: input.order.id,
              type: "payment",
              status: input.status,
              gateway: input.gateway,
              gatewayTransactionId: input.gatewayTransactionId,
              method: input.method,
              amount: input.amount,
              currency: input.currency,
              reason: input.reason,
              response: input.response,
              actorId: input.actorId,
            })
            .returning();
          if (!row) throw new Error(`Transaction insert returned no row for order ${input.order.id}`);

          // Conditional update: a concurrent settlement that already moved the order wins.
          const moved = await tx
            .update(orders)
            .set({ status: ORDER_STATUS.PAID, updatedAt: new Date() })
            .where(and(eq(orders.id, input.order.id), eq(orders.status, ORDER_STATUS.PROCESSING)))
            .returning({ id: orders.id });
          if (moved.length === 0) {
            throw new StaleOrderStateError(input.order.id, ORDER_STATUS.PROCESSING);
          }
          return toTransactionRecord(row);
        });
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new DuplicateTransactionError(input.gateway, input.gatewayTransactionId);
        }
        throw err;
      }
    },

    async createInvoice(order: Order, context: InvoiceContext, transaction: TransactionRecord): Promise<Invoice> {
      const invoiceNumber = formatInvoiceNumber(context.site.invoicePrefix, order.id);
      const totals = orderTotals(order);
      const [created] = await db
        .insert(invoices)
        .values({
          invoiceNumber,
          orderId: order.id,
          status: "paid",
          ...totals,
          currency: order.currency,
          relatedTransactionId: transaction.id,
        })
        .onConflictDoNothing({ target: invoices.invoiceNumber })
        .returning();
      if (created) return toInvoice(created);
      const [existing] = await db
        .select()
        .from(invoices)
        .where(eq(invoices.invoiceNumber, invoiceNumber))
        .limit(1);
      if (!existing) throw new Error(`Invoice ${invoiceNumber} conflicted but could not be read back`);
      return toInvoice(existing);
    },

    async fulfill(order: Order): Promise<void> {
      assertFulfillable(order);
      const now = new Date();
      await db.transaction(async (tx) => {
        await tx
          .update(orderItems)
          .set({ fulfilledAt: now })
          .where(and(eq(orderItems.orderId, order.id), isNull(orderItems.fulfilledAt)));
        await tx
          .update(orders)
          .set({ fulfilledAt: now, updatedAt: now })
          .where(and(eq(orders.id, order.id), isNull(orders.fulfilledAt)));
      });
    },

    async findTransaction(gateway: string, gatewayTransactionId: string): Promise<TransactionRecord | null> {
      const [row] = await db
        .select()
        .from(paymentTransactions)
        .where(
          and(
            eq(paymentTransactions.gateway, gateway),
            eq(paymentTransactions.gatewayTransactionId, gatewayTransactionId)
          )
        )
        .limit(1);
      return row ? toTransactionRecord(row) : null;
    },

    async findTransactionsForOrder(orderId: number): Promise<TransactionRecord[]> {
      const rows = await db
        .select()
        .from(paymentTransactions)
        .where(eq(paymentTransactions.orderId, orderId))
        .orderBy(asc(paymentTransactions.id));
      return rows.map(toTransactionRecord);
    },

    async findPaidInvoice(orderId: number, gatewayTransactionId: string): Promise<Invoice | null> {
      const [row] = await db
        .select({ invoice: invoices })
        .from(invoices)
        .innerJoin(paymentTransactions, eq(invoices.relatedTransactionId, paymentTransactions.id))
        .where(
          and(
            eq(invoices.orderId, orderId),
            eq(invoices.status, "paid"),
            eq(paymentTransactions.gatewayTransactionId, gatewayTransactionId)
          )
        )
        .limit(1);
      return row ? toInvoice(row.invoice) : null;
    },

    async findInvoiceForOrder(orderId: number): Promise<Invoice | null> {
      const [row] = await db.select().from(invoices).where(eq(invoices.orderId, orderId)).limit(1);
      return row ? toInvoice(row) : null;
    },

    async markProcessing(orderId: number): Promise<boolean> {
      const moved = await db
        .update(orders)
        .set({ status: ORDER_STATUS.PROCESSING, updatedAt: new Date() })
        .where(and(eq(orders.id, orderId), eq(orders.status, ORDER_STATUS.PENDING)))
        .returning({ id: orders.id });
      return moved.length > 0;
    },

    async ping(): Promise<void> {
      await db.execute(sql`select 1`);
    },
  };
}
