import type { AssetId, ExecutionHost, Identity, ReceiverCallResult } from './types.js'
import { RECEIVER_MAGIC } from './constants.js'

/**
 * Result of the safe-transfer receipt check
 */
export type ReceiverCheck =
  | { accepted: true }
  | { accepted: false, reason: string }

/**
 * Ask a recipient to acknowledge an incoming asset.
 *
 * Recipients that are not code-bearing accept unconditionally. Code-bearing
 * recipients must answer the callback with exactly RECEIVER_MAGIC.
 */
export function checkReceiver(
  host: ExecutionHost,
  operator: Identity,
  to: Identity,
  assetId: AssetId,
  data: number[] = []
): ReceiverCheck {
  if (!host.isCodeBearing(to)) {
    return { accepted: true }
  }

  let result: ReceiverCallResult
  try {
    result = host.invokeReceiver(to, operator, assetId, data)
  } catch (error) {
    return {
      accepted: false,
      reason: error instanceof Error ? error.message : 'Receiver call failed'
    }
  }

  if (result.status === 'failure') {
    return { accepted: false, reason: result.reason ?? 'Receiver call failed' }
  }
  if (!isMagic(result.value)) {
    return { accepted: false, reason: 'Receiver returned an unexpected acknowledgement' }
  }
  return { accepted: true }
}

function isMagic(value: number[]): boolean {
  return (
    value.length === RECEIVER_MAGIC.length &&
    value.every((byte, i) => byte === RECEIVER_MAGIC[i])
  )
}
