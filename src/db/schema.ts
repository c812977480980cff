import {
  integer,
  jsonb,
  numeric,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar,
  index,
} from "drizzle-orm/pg-core";

/** Decimal money columns; drizzle returns numeric values as strings. */
const money = (name: string) => numeric(name, { precision: 14, scale: 3 });

export const sites = pgTable("sites", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  domain: text("domain").notNull(),
  invoicePrefix: varchar("invoice_prefix", { length: 16 }).notNull(),
});

export const orders = pgTable(
  "orders",
  {
    id: serial("id").primaryKey(),
    siteId: integer("site_id")
      .notNull()
      .references(() => sites.id),
    userId: text("user_id").notNull(),
    customerEmail: text("customer_email").notNull(),
    /** pending | processing | paid. Only settlement moves processing to paid. */
    status: varchar("status", { length: 32 }).default("pending").notNull(),
    currency: varchar("currency", { length: 3 }).notNull(),
    description: text("description"),
    fulfilledAt: timestamp("fulfilled_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    ordersUserIdx: index("orders_user_id_idx").on(table.userId),
  })
);

export const orderItems = pgTable(
  "order_items",
  {
    id: serial("id").primaryKey(),
    orderId: integer("order_id")
      .notNull()
      .references(() => orders.id, { onDelete: "cascade" }),
    sku: varchar("sku", { length: 64 }).notNull(),
    itemType: varchar("item_type", { length: 32 }).notNull(),
    title: text("title").notNull(),
    originalPrice: money("original_price").notNull(),
    discountAmount: money("discount_amount").default("0").notNull(),
    taxAmount: money("tax_amount").default("0").notNull(),
    finalPrice: money("final_price").notNull(),
    fulfilledAt: timestamp("fulfilled_at", { withTimezone: true }),
  },
  (table) => ({
    orderItemsOrderIdx: index("order_items_order_id_idx").on(table.orderId),
  })
);

export const paymentTransactions = pgTable(
  "payment_transactions",
  {
    id: serial("id").primaryKey(),
    orderId: integer("order_id")
      .notNull()
      .references(() => orders.id),
    type: varchar("type", { length: 16 }).$type<"payment">().default("payment").notNull(),
    status: text("status").notNull(),
    gateway: varchar("gateway", { length: 32 }).notNull(),
    gatewayTransactionId: varchar("gateway_transaction_id", { length: 64 }).notNull(),
    method: varchar("method", { length: 32 }).notNull(),
    amount: money("amount").notNull(),
    currency: varchar("currency", { length: 3 }).notNull(),
    reason: text("reason").notNull(),
    response: jsonb("response").$type<Record<string, string>>().default({}).notNull(),
    actorId: text("actor_id"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    /** At most one record per PSP transaction; the settlement idempotency key. */
    gatewayTransactionUnique: uniqueIndex("payment_transactions_gateway_txn_unique").on(
      table.gateway,
      table.gatewayTransactionId
    ),
    paymentTransactionsOrderIdx: index("payment_transactions_order_id_idx").on(table.orderId),
  })
);

export const invoices = pgTable(
  "invoices",
  {
    id: serial("id").primaryKey(),
    invoiceNumber: varchar("invoice_number", { length: 32 }).notNull(),
    orderId: integer("order_id")
      .notNull()
      .references(() => orders.id),
    status: varchar("status", { length: 16 }).$type<"paid">().default("paid").notNull(),
    grossTotal: money("gross_total").notNull(),
    discountTotal: money("discount_total").notNull(),
    taxTotal: money("tax_total").notNull(),
    total: money("total").notNull(),
    currency: varchar("currency", { length: 3 }).notNull(),
    relatedTransactionId: integer("related_transaction_id").references(() => paymentTransactions.id),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    invoiceNumberUnique: uniqueIndex("invoices_invoice_number_unique").on(table.invoiceNumber),
  })
);

export const auditLogs = pgTable(
  "audit_logs",
  {
    id: serial("id").primaryKey(),
    action: varchar("action", { length: 64 }).notNull(),
    orderId: integer("order_id"),
    gateway: varchar("gateway", { length: 32 }).notNull(),
    context: jsonb("context").$type<Record<string, unknown>>().default({}).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    auditLogsOrderIdx: index("audit_logs_order_id_idx").on(table.orderId),
  })
);
