/* Validates policy parameter input, both from the environment at startup and from
    PATCH /admin/policy bodies. Fixed-point values are 18-decimal strings ("0.05"). */

import { z } from 'zod'
import { parseFixed } from '@elastic-supply/math'

const fixedString = z.string().transform((text, ctx) => {
  try {
    return parseFixed(text)
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) })
    return z.NEVER
  }
})

const unitsString = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer string')
  .transform(text => BigInt(text))

export const PolicyPatchSchema = z
  .object({
    deviationThreshold: fixedString.optional(),
    rebaseLag: unitsString.optional(),
    minRebaseInterval: z.number().int().positive().optional(),
    rebaseWindowOffset: z.number().int().nonnegative().optional(),
    rebaseWindowLength: z.number().int().nonnegative().optional(),
    auxWeight: fixedString.optional(),
    orchestrator: z.string().min(1).optional(),
  })
  .strict()

export type PolicyPatch = z.infer<typeof PolicyPatchSchema>

export const PolicySettingsSchema = z.object({
  initialSupply: unitsString,
  baseReferenceIndex: fixedString,
  deviationThreshold: fixedString,
  rebaseLag: unitsString,
  minRebaseInterval: z.coerce.number().int().positive(),
  rebaseWindowOffset: z.coerce.number().int().nonnegative(),
  rebaseWindowLength: z.coerce.number().int().nonnegative(),
  auxWeight: fixedString,
  orchestrator: z.string(),
  cycleGasLimit: unitsString,
})

export type PolicySettings = z.infer<typeof PolicySettingsSchema>

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; error: string }

function summarize(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

export function validatePolicyPatch(body: unknown): ValidationResult<PolicyPatch> {
  const res = PolicyPatchSchema.safeParse(body)
  if (!res.success) return { valid: false, error: summarize(res.error) }
  return { valid: true, value: res.data }
}

export function validatePolicySettings(input: unknown): ValidationResult<PolicySettings> {
  const res = PolicySettingsSchema.safeParse(input)
  if (!res.success) return { valid: false, error: summarize(res.error) }
  return { valid: true, value: res.data }
}
