import type { AuditAction } from "./audit.js";

export const ORDER_STATUS = {
  PENDING: "pending",
  PROCESSING: "processing",
  PAID: "paid",
} as const;

export type OrderStatus = (typeof ORDER_STATUS)[keyof typeof ORDER_STATUS];

export interface Site {
  id: number;
  name: string;
  domain: string;
  invoicePrefix: string;
}

/** Money fields are decimal strings (numeric columns), never floats. */
export interface OrderItem {
  id: number;
  sku: string;
  itemType: string;
  title: string;
  originalPrice: string;
  discountAmount: string;
  taxAmount: string;
  finalPrice: string;
  fulfilledAt: Date | null;
}

export interface Order {
  id: number;
  siteId: number;
  userId: string;
  customerEmail: string;
  /** Stored as text; values outside OrderStatus are reported as unrecognized. */
  status: string;
  currency: string;
  description: string | null;
  items: OrderItem[];
  fulfilledAt: Date | null;
}

export interface TransactionRecord {
  id: number;
  orderId: number;
  type: "payment";
  status: string;
  gateway: string;
  gatewayTransactionId: string;
  method: string;
  amount: string;
  currency: string;
  reason: string;
  response: Record<string, string>;
  actorId: string | null;
  createdAt: Date;
}

export interface Invoice {
  id: number;
  invoiceNumber: string;
  orderId: number;
  status: "paid";
  grossTotal: string;
  discountTotal: string;
  taxTotal: string;
  total: string;
  currency: string;
  relatedTransactionId: number | null;
  createdAt: Date;
}

export interface AuditEntry {
  action: AuditAction;
  orderId: number | null;
  gateway: string;
  context: Record<string, unknown>;
}

export interface SettlementInput {
  order: Order;
  actorId: string | null;
  gateway: string;
  /** PSP response message, e.g. "Success". */
  status: string;
  gatewayTransactionId: string;
  method: string;
  amount: string;
  currency: string;
  reason: string;
  response: Record<string, string>;
}

export interface InvoiceContext {
  site: Site;
  requestId?: string;
}

/**
 * Collaborator contract the payment core depends on. The PostgreSQL implementation
 * lives in commerce.repository.ts; tests use an in-process store with the same semantics.
 */
export interface CommerceStore {
  resolveOrder(orderId: number): Promise<Order | null>;
  resolveSite(siteId: number): Promise<Site | null>;
  recordAudit(entry: AuditEntry): Promise<void>;
  /**
   * Atomically inserts the transaction record and moves the order from processing to paid.
   * Throws DuplicateTransactionError on (gateway, gatewayTransactionId) conflict and
   * StaleOrderStateError when the order is no longer processing; nothing is written in either case.
   */
  commitSettlement(input: SettlementInput): Promise<TransactionRecord>;
  createInvoice(order: Order, context: InvoiceContext, transaction: TransactionRecord): Promise<Invoice>;
  /** Throws FulfillmentError when the order cannot be fulfilled. */
  fulfill(order: Order): Promise<void>;
  findTransaction(gateway: string, gatewayTransactionId: string): Promise<TransactionRecord | null>;
  findTransactionsForOrder(orderId: number): Promise<TransactionRecord[]>;
  findPaidInvoice(orderId: number, gatewayTransactionId: string): Promise<Invoice | null>;
  findInvoiceForOrder(orderId: number): Promise<Invoice | null>;
  /** pending → processing; false when the order was not pending. */
  markProcessing(orderId: number): Promise<boolean>;
  ping(): Promise<void>;
}
