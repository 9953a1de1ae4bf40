/* Validates bodies of the transaction-list admin routes. */

import { z } from 'zod'

const hex = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, 'expected 0x-prefixed hex bytes')
const failureCode = z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected a 32-byte hex failure code')

export const NewTransactionSchema = z
  .object({
    destination: z.string().min(1),
    payload: hex,
    computeBudget: z
      .string()
      .regex(/^\d+$/, 'expected a non-negative integer string')
      .transform(text => BigInt(text)),
    approvedFailureCodes: z.array(failureCode).default([]),
    enabled: z.boolean().default(true),
  })
  .strict()

export type NewTransactionBody = z.infer<typeof NewTransactionSchema>

export const SetEnabledSchema = z.object({ enabled: z.boolean() }).strict()

export const IndexParamSchema = z.coerce.number().int().nonnegative()

export function validateNewTransaction(body: unknown): { valid: true; value: NewTransactionBody } | { valid: false; error: string } {
  const res = NewTransactionSchema.safeParse(body)
  if (!res.success) return { valid: false, error: res.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ') }
  return { valid: true, value: res.data }
}
