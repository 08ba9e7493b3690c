/**
 * Validation Helpers
 *
 * Input validation utilities for configuration and API endpoints.
 */

import { z } from "zod";

/**
 * 20-byte hex account address
 */
const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

/**
 * Validate if a string is a hex account address
 */
export function isValidAddress(address: string): boolean {
  return ADDRESS_REGEX.test(address);
}

export const addressSchema = z
  .string()
  .refine(isValidAddress, "Invalid address")
  .transform((a) => a.toLowerCase());

/**
 * Non-negative integer amount given as a decimal string or number
 */
export const amountSchema = z
  .union([z.string().regex(/^\d+$/, "Amount must be a non-negative integer"), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

/**
 * Position id from a query string
 */
export const positionIdSchema = z.coerce.number().int().positive();
