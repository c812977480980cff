import { z } from "zod";
import { parseMerchantReference, type MerchantReference } from "./payfort.reference.js";

/** Flat form fields as PayFort posts them. */
export type CallbackFields = Readonly<Record<string, string>>;

export interface PayfortCallback {
  fortId: string;
  status: string;
  responseMessage: string;
  paymentOption: string;
  amount: string;
  currency: string;
  merchantReference: string;
  reference: MerchantReference;
  responseCode?: string;
  acquirerResponseMessage?: string;
  raw: CallbackFields;
}

export type ResponseFormatResult =
  | { ok: true; callback: PayfortCallback }
  | { ok: false; missing: string[]; invalid: string[] };

export const MISSING_FIELD = "missing";
export const INVALID_FIELD = "invalid";

/** Absent, empty or non-string values all count as missing. */
const presentString = () =>
  z.string({ required_error: MISSING_FIELD, invalid_type_error: MISSING_FIELD }).min(1, MISSING_FIELD);

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

/** Key order is the order `missing`/`invalid` are reported in. */
export const payfortCallbackSchema = z.object({
  fort_id: presentString().regex(/^\d+$/, INVALID_FIELD),
  status: presentString(),
  response_message: presentString(),
  payment_option: presentString(),
  amount: presentString().regex(/^\d+(\.\d+)?$/, INVALID_FIELD),
  currency: presentString()
    .regex(/^[A-Za-z]{3}$/, INVALID_FIELD)
    .transform((s) => s.toUpperCase()),
  merchant_reference: presentString().transform((ref, ctx) => {
    const parsed = parseMerchantReference(ref);
    if (parsed.kind === "malformed") {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: INVALID_FIELD });
      return z.NEVER;
    }
    return { ref, reference: parsed.reference };
  }),
  response_code: optionalString,
  acquirer_response_message: optionalString,
});

/** Top-level field names carrying an issue with the given message, first occurrence order. */
export function fieldsWithIssue(error: z.ZodError, message: string): string[] {
  const names = error.issues
    .filter((issue) => issue.message === message)
    .map((issue) => String(issue.path[0] ?? ""))
    .filter(Boolean);
  return [...new Set(names)];
}

/** Presence and shape of the fields settlement reads. Pure. */
export function validateResponseFormat(fields: CallbackFields): ResponseFormatResult {
  const parsed = payfortCallbackSchema.safeParse(fields);
  if (!parsed.success) {
    const missing = fieldsWithIssue(parsed.error, MISSING_FIELD);
    const invalid = fieldsWithIssue(parsed.error, INVALID_FIELD).filter((name) => !missing.includes(name));
    return { ok: false, missing, invalid };
  }
  const data = parsed.data;
  return {
    ok: true,
    callback: {
      fortId: data.fort_id,
      status: data.status,
      responseMessage: data.response_message,
      paymentOption: data.payment_option,
      amount: data.amount,
      currency: data.currency,
      merchantReference: data.merchant_reference.ref,
      reference: data.merchant_reference.reference,
      responseCode: data.response_code,
      acquirerResponseMessage: data.acquirer_response_message,
      raw: fields,
    },
  };
}

/** Repeated form keys keep their last value; nested or non-string values are dropped. */
const formValueSchema = z
  .union([z.string(), z.array(z.unknown()).transform((values) => values[values.length - 1])])
  .pipe(z.string())
  .optional()
  .catch(undefined);

const callbackBodySchema = z.record(formValueSchema).catch({});

export function toCallbackFields(body: unknown): CallbackFields {
  const entries = Object.entries(callbackBodySchema.parse(body)).flatMap(([key, value]): Array<[string, string]> =>
    value === undefined ? [] : [[key, value]]
  );
  return Object.fromEntries(entries);
}

/** Query of the wait-page status poll. */
export const statusQuerySchema = z.object({
  transaction_id: presentString(),
  merchant_reference: presentString(),
});

export type StatusQuery = Partial<Record<keyof z.input<typeof statusQuerySchema>, unknown>>;

/** `:orderId` path parameter: a decimal id. */
export const orderIdParamSchema = z.object({
  orderId: z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .refine((id) => Number.isSafeInteger(id)),
});
