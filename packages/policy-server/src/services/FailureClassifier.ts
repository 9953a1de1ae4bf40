/** FailureClassifier.ts
 * Turns raw failure data from a downstream call into a message and its keccak256 failure code; pure functions only
 */
import { AbiCoder, concat, dataLength, dataSlice, id, isHexString, keccak256, toUtf8Bytes } from 'ethers'

export const OUT_OF_BUDGET_MESSAGE = 'out of budget'
export const SILENT_FAILURE_MESSAGE = 'silent failure'

/** selector + offset word + length word */
const MIN_REASON_BYTES = 68

export const ERROR_SELECTOR = dataSlice(id('Error(string)'), 0, 4)

export interface FailureClassification {
  code: string
  message: string
}

export function failureCode(message: string): string {
  return keccak256(toUtf8Bytes(message))
}

export const OUT_OF_BUDGET_CODE = failureCode(OUT_OF_BUDGET_MESSAGE)
export const SILENT_FAILURE_CODE = failureCode(SILENT_FAILURE_MESSAGE)

/** ABI-encodes `Error(string)` revert data for `message`. */
export function encodeErrorPayload(message: string): string {
  return concat([ERROR_SELECTOR, AbiCoder.defaultAbiCoder().encode(['string'], [message])])
}

function decodeReason(raw: string): string | null {
  try {
    const [message] = AbiCoder.defaultAbiCoder().decode(['string'], dataSlice(raw, 4))
    return typeof message === 'string' ? message : null
  } catch {
    return null
  }
}

export function classifyFailure(raw: string): FailureClassification {
  if (!isHexString(raw) || raw.length % 2 !== 0) {
    return { code: SILENT_FAILURE_CODE, message: SILENT_FAILURE_MESSAGE }
  }
  const size = dataLength(raw)
  if (size === 0) return { code: OUT_OF_BUDGET_CODE, message: OUT_OF_BUDGET_MESSAGE }
  if (size < MIN_REASON_BYTES) return { code: SILENT_FAILURE_CODE, message: SILENT_FAILURE_MESSAGE }

  const message = decodeReason(raw)
  if (message === null) return { code: SILENT_FAILURE_CODE, message: SILENT_FAILURE_MESSAGE }
  return { code: failureCode(message), message }
}
