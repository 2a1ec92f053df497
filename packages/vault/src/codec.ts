/**
 * JSON encoding of persisted records.
 *
 * bigints are written as decimal strings. Decoding goes through zod so a
 * malformed record fails loudly instead of producing a half-typed value.
 */

import { z } from "zod";
import { isAddress, isHash, isHex, type Address, type Hash, type Hex } from "viem";

// =============================================================================
// Primitives
// =============================================================================

export const AddressSchema = z.custom<Address>(
  (value) => typeof value === "string" && isAddress(value, { strict: false }),
  { message: "Expected a 20-byte hex address" },
);

export const HashSchema = z.custom<Hash>(
  (value) => typeof value === "string" && isHash(value),
  { message: "Expected a 32-byte hex hash" },
);

export const HexSchema = z.custom<Hex>(
  (value) => typeof value === "string" && isHex(value, { strict: true }),
  { message: "Expected a hex string" },
);

/** Unsigned integer written as a decimal string */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected an unsigned decimal integer")
  .transform((value) => BigInt(value));

export const CountSchema = z.number().int().min(0);

// =============================================================================
// Records
// =============================================================================

export const SignedChequeSchema = z.object({
  vault: AddressSchema,
  beneficiary: AddressSchema,
  cumulativePayout: AmountSchema,
  signature: HexSchema,
});

export const CashoutActionSchema = z.object({
  txHash: HashSchema,
  cheque: SignedChequeSchema,
});

export const CashOutResultSchema = z.object({
  txHash: HashSchema,
  vault: AddressSchema,
  amount: AmountSchema,
  cashTime: z.number().int(),
  status: z.enum(["fail", "success"]),
});

// =============================================================================
// Encode / Decode
// =============================================================================

/**
 * Serialize a record, writing bigints as decimal strings.
 */
export function encodeRecord(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? v.toString() : v,
  );
}

/**
 * Parse and validate a stored record.
 *
 * @throws SyntaxError on malformed JSON, z.ZodError on a shape mismatch
 */
export function decodeRecord<S extends z.ZodTypeAny>(
  schema: S,
  raw: string,
): z.output<S> {
  const parsed: unknown = JSON.parse(raw);
  return schema.parse(parsed);
}
