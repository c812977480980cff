import { createHash, timingSafeEqual } from "node:crypto";
import type { ShaMethod } from "./payfort.settings.js";

export const SIGNATURE_FIELD = "signature";

export type SignableValue = string | number;
export type SignableFields = Readonly<Record<string, SignableValue>>;

const DIGESTS: Record<ShaMethod, string> = {
  "SHA-128": "sha1",
  "SHA-256": "sha256",
  "SHA-512": "sha512",
};

function compareKeys(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Fields in PayFort's canonical order: `signature` removed, keys sorted by their
 * lowercased form in code-unit order. Equal lowercased keys keep insertion order.
 */
export function canonicalEntries(fields: SignableFields): Array<[string, string]> {
  return Object.entries(fields)
    .filter(([key]) => key !== SIGNATURE_FIELD)
    .map(([key, value]): [string, string] => [key, String(value)])
    .sort(([a], [b]) => compareKeys(a, b));
}

export function canonicalString(fields: SignableFields): string {
  return canonicalEntries(fields)
    .map(([key, value]) => `${key}=${value}`)
    .join("");
}

/** Lowercase hex digest of phrase + canonical string + phrase. */
export function signFields(phrase: string, shaMethod: ShaMethod, fields: SignableFields): string {
  return createHash(DIGESTS[shaMethod])
    .update(`${phrase}${canonicalString(fields)}${phrase}`, "utf8")
    .digest("hex");
}

export function verifySignature(
  phrase: string,
  shaMethod: ShaMethod,
  fields: SignableFields,
  claimed: string | undefined
): boolean {
  if (!claimed) return false;
  const expected = Buffer.from(signFields(phrase, shaMethod, fields), "utf8");
  const actual = Buffer.from(claimed, "utf8");
  if (expected.length !== actual.length) return false;
  return timingSafeEqual(expected, actual);
}
