/**
 * Ledger error taxonomy. Every rejected call surfaces as a LedgerError
 * and leaves the store exactly as it was before the call.
 */

export type LedgerErrorCode =
  | 'InvalidAddress'
  | 'NotFound'
  | 'InvalidApproval'
  | 'Unauthorized'
  | 'OwnershipMismatch'
  | 'ReceiverRejected'

export class LedgerError extends Error {
  readonly code: LedgerErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(`[${code}] ${message}`)
    this.name = 'LedgerError'
    this.code = code
    this.details = details
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code)
}
