import { z } from "zod";

const DECIMAL = /^\d+(\.\d+)?$/;

// Number#toString switches to exponent form below 1e-6 and from 1e21 up.
export function plainDecimal(n: number): string {
  const text = n.toString();
  const match = /^(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;
  const digits = (match[1] ?? "") + (match[2] ?? "");
  const shift = Number(match[3]);
  return shift < 0 ? `0.${"0".repeat(-shift - 1)}${digits}` : digits.padEnd(shift + 1, "0");
}

// Numbers are accepted for convenience, but stored as decimal strings so token
// scaling never goes through a float.
export const decimalString = z
  .union([z.string().trim(), z.number().finite().nonnegative()])
  .transform((v) => (typeof v === "number" ? plainDecimal(v) : v))
  .refine((v) => DECIMAL.test(v), { message: "Expected a plain non-negative decimal" })
  .refine((v) => Number(v) > 0, { message: "Must be greater than zero" });

export const tokenRef = z.string().trim().min(1).max(64);

export const createOrderSchema = z.object({
  prompt: z.string().trim().min(1).max(4000),
  fromToken: tokenRef,
  toToken: tokenRef,
  amount: decimalString,
  price: decimalString,
});

export type CreateOrderRequest = z.input<typeof createOrderSchema>;

export const orderIdParam = z.coerce.number().int().positive();

export const proposalIdParam = z.coerce.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
