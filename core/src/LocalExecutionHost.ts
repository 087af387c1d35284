/**
 * LocalExecutionHost - in-process execution host
 *
 * Supplies block entropy and dispatches safe-transfer callbacks to
 * registered receivers. Used by the ledger when no other host is configured,
 * and by the test suite as a stand-in for a real chain.
 */

import { Random } from '@bsv/sdk'

import type {
  AssetId,
  AssetReceiver,
  BlockSnapshot,
  ExecutionHost,
  Identity,
  ReceiverCallResult
} from './types.js'

export class LocalExecutionHost implements ExecutionHost {
  private readonly receivers = new Map<Identity, AssetReceiver>()
  private block?: BlockSnapshot

  /**
   * Pin the entropy snapshot. Until cleared, every seed derived through
   * this host uses the same block hash and timestamp.
   */
  setBlock(block: BlockSnapshot): void {
    if (block.hash.length !== 32) {
      throw new RangeError(`Block hash must be 32 bytes, got ${block.hash.length}`)
    }
    this.block = { hash: [...block.hash], timestamp: block.timestamp }
  }

  /** Go back to drawing fresh entropy on every read */
  clearBlock(): void {
    this.block = undefined
  }

  latestBlock(): BlockSnapshot {
    if (this.block !== undefined) {
      return { hash: [...this.block.hash], timestamp: this.block.timestamp }
    }
    return { hash: Random(32), timestamp: Math.floor(Date.now() / 1000) }
  }

  /**
   * Mark an identity as code-bearing and route its safe-transfer callbacks
   * to `receiver`.
   */
  registerReceiver(identity: Identity, receiver: AssetReceiver): void {
    this.receivers.set(identity, receiver)
  }

  unregisterReceiver(identity: Identity): void {
    this.receivers.delete(identity)
  }

  isCodeBearing(identity: Identity): boolean {
    return this.receivers.has(identity)
  }

  invokeReceiver(
    recipient: Identity,
    operator: Identity,
    assetId: AssetId,
    data: number[]
  ): ReceiverCallResult {
    const receiver = this.receivers.get(recipient)
    if (receiver === undefined) {
      return { status: 'failure', reason: `No receiver registered for ${recipient}` }
    }
    try {
      return { status: 'success', value: receiver.onAssetReceived(operator, assetId, data) }
    } catch (error) {
      return {
        status: 'failure',
        reason: error instanceof Error ? error.message : 'Receiver call failed'
      }
    }
  }
}
