/**
 * Safe Transfer Tests
 *
 * Receipt acknowledgement through LocalExecutionHost, including reverts
 * and re-entrant receivers.
 */

import { ArtworkLedger } from '../ArtworkLedger.js'
import { LocalExecutionHost } from '../LocalExecutionHost.js'
import { checkReceiver } from '../receiver.js'
import { LedgerError } from '../errors.js'
import { NULL_IDENTITY, RECEIVER_MAGIC } from '../constants.js'
import type { AssetId, ExecutionHost, Identity, LedgerEvent } from '../types.js'

const ALICE = '02' + 'a'.repeat(64)
const BOB = '03' + 'b'.repeat(64)
const CAROL = '02' + 'c'.repeat(64)
const VAULT = '03' + 'f'.repeat(64)

const acknowledge = (): number[] => [...RECEIVER_MAGIC]

describe('checkReceiver', () => {
  let host: LocalExecutionHost

  beforeEach(() => {
    host = new LocalExecutionHost()
  })

  it('should accept recipients that are not code-bearing without calling them', () => {
    const spy = jest.spyOn(host, 'invokeReceiver')
    expect(checkReceiver(host, ALICE, BOB, 1)).toEqual({ accepted: true })
    expect(spy).not.toHaveBeenCalled()
  })

  it('should pass operator, asset id and payload to the receiver', () => {
    const onAssetReceived = jest.fn((_operator: Identity, _assetId: AssetId, _data: number[]) => acknowledge())
    host.registerReceiver(VAULT, { onAssetReceived })

    expect(checkReceiver(host, ALICE, VAULT, 4, [1, 2, 3])).toEqual({ accepted: true })
    expect(onAssetReceived).toHaveBeenCalledWith(ALICE, 4, [1, 2, 3])
  })

  it('should default to an empty payload', () => {
    const onAssetReceived = jest.fn((_operator: Identity, _assetId: AssetId, _data: number[]) => acknowledge())
    host.registerReceiver(VAULT, { onAssetReceived })

    checkReceiver(host, ALICE, VAULT, 4)
    expect(onAssetReceived).toHaveBeenCalledWith(ALICE, 4, [])
  })

  it('should reject a wrong acknowledgement', () => {
    host.registerReceiver(VAULT, { onAssetReceived: () => [0x15, 0x0b, 0x7a, 0x03] })
    expect(checkReceiver(host, ALICE, VAULT, 1)).toEqual({
      accepted: false,
      reason: 'Receiver returned an unexpected acknowledgement'
    })
  })

  it('should reject an acknowledgement with extra bytes', () => {
    host.registerReceiver(VAULT, { onAssetReceived: () => [...RECEIVER_MAGIC, 0] })
    expect(checkReceiver(host, ALICE, VAULT, 1).accepted).toBe(false)
  })

  it('should reject a receiver that throws', () => {
    host.registerReceiver(VAULT, {
      onAssetReceived: () => {
        throw new Error('vault is closed')
      }
    })
    expect(checkReceiver(host, ALICE, VAULT, 1)).toEqual({ accepted: false, reason: 'vault is closed' })
  })

  it('should reject when the host itself fails the call', () => {
    const failing: ExecutionHost = {
      latestBlock: () => ({ hash: Array(32).fill(0), timestamp: 0 }),
      isCodeBearing: () => true,
      invokeReceiver: () => {
        throw new Error('host unavailable')
      }
    }
    expect(checkReceiver(failing, ALICE, VAULT, 1)).toEqual({ accepted: false, reason: 'host unavailable' })
  })

  it('should treat an unregistered receiver as no longer code-bearing', () => {
    host.registerReceiver(VAULT, { onAssetReceived: () => [] })
    host.unregisterReceiver(VAULT)
    expect(host.isCodeBearing(VAULT)).toBe(false)
    expect(checkReceiver(host, ALICE, VAULT, 1)).toEqual({ accepted: true })
  })
})

describe('LocalExecutionHost', () => {
  it('should return the pinned block until cleared', () => {
    const host = new LocalExecutionHost()
    const hash = Array(32).fill(3)
    host.setBlock({ hash, timestamp: 42 })
    hash[0] = 99

    expect(host.latestBlock()).toEqual({ hash: Array(32).fill(3), timestamp: 42 })

    host.clearBlock()
    const fresh = host.latestBlock()
    expect(fresh.hash).toHaveLength(32)
    expect(Number.isInteger(fresh.timestamp)).toBe(true)
  })

  it('should reject a block hash that is not 32 bytes', () => {
    expect(() => new LocalExecutionHost().setBlock({ hash: [1, 2], timestamp: 0 })).toThrow(RangeError)
  })

  it('should report a failure for an identity with no receiver', () => {
    expect(new LocalExecutionHost().invokeReceiver(VAULT, ALICE, 1, [])).toEqual({
      status: 'failure',
      reason: `No receiver registered for ${VAULT}`
    })
  })
})

describe('ArtworkLedger.safeTransferFrom', () => {
  let host: LocalExecutionHost
  let ledger: ArtworkLedger
  let events: LedgerEvent[]

  beforeEach(() => {
    host = new LocalExecutionHost()
    host.setBlock({ hash: Array(32).fill(1), timestamp: 1700000000 })
    ledger = new ArtworkLedger({ host, identity: '02' + 'e'.repeat(64) })
    ledger.mint(ALICE)
    events = []
    ledger.on(event => events.push(event))
  })

  it('should behave like transferFrom for plain recipients', () => {
    ledger.safeTransferFrom(ALICE, ALICE, BOB, 1)

    expect(ledger.ownerOf(1)).toBe(BOB)
    expect(events).toEqual([{ type: 'Transfer', from: ALICE, to: BOB, assetId: 1 }])
  })

  it('should complete when a code-bearing recipient acknowledges', () => {
    host.registerReceiver(VAULT, { onAssetReceived: acknowledge })

    ledger.connect(ALICE).safeTransferFrom(ALICE, VAULT, 1, [9])

    expect(ledger.ownerOf(1)).toBe(VAULT)
    expect(ledger.balanceOf(VAULT)).toBe(1)
  })

  it('should pass the caller as operator', () => {
    const onAssetReceived = jest.fn((_operator: Identity, _assetId: AssetId, _data: number[]) => acknowledge())
    host.registerReceiver(VAULT, { onAssetReceived })
    ledger.setApprovalForAll(ALICE, CAROL, true)

    ledger.safeTransferFrom(CAROL, ALICE, VAULT, 1)

    expect(onAssetReceived).toHaveBeenCalledWith(CAROL, 1, [])
  })

  it('should revert everything when the recipient rejects', () => {
    ledger.approve(ALICE, CAROL, 1)
    events.length = 0
    host.registerReceiver(VAULT, { onAssetReceived: () => [0, 0, 0, 0] })

    let caught: unknown
    try {
      ledger.safeTransferFrom(CAROL, ALICE, VAULT, 1)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(LedgerError)
    expect((caught as LedgerError).code).toBe('ReceiverRejected')
    expect(ledger.ownerOf(1)).toBe(ALICE)
    expect(ledger.balanceOf(ALICE)).toBe(1)
    expect(ledger.balanceOf(VAULT)).toBe(0)
    expect(ledger.getApproved(1)).toBe(CAROL)
    expect(events).toEqual([])
  })

  it('should still run the ordinary transfer checks first', () => {
    const onAssetReceived = jest.fn(acknowledge)
    host.registerReceiver(VAULT, { onAssetReceived })

    expect(() => ledger.safeTransferFrom(BOB, ALICE, VAULT, 1)).toThrow('[Unauthorized]')
    expect(() => ledger.safeTransferFrom(ALICE, BOB, VAULT, 1)).toThrow('[OwnershipMismatch]')
    expect(() => ledger.safeTransferFrom(ALICE, ALICE, NULL_IDENTITY, 1)).toThrow('[InvalidAddress]')
    expect(onAssetReceived).not.toHaveBeenCalled()
  })

  it('should commit nested moves made by an accepting receiver, in order', () => {
    host.registerReceiver(VAULT, {
      onAssetReceived: (_operator, assetId) => {
        ledger.transferFrom(VAULT, VAULT, CAROL, assetId)
        return acknowledge()
      }
    })

    ledger.safeTransferFrom(ALICE, ALICE, VAULT, 1)

    expect(ledger.ownerOf(1)).toBe(CAROL)
    expect(ledger.balanceOf(VAULT)).toBe(0)
    expect(events).toEqual([
      { type: 'Transfer', from: ALICE, to: VAULT, assetId: 1 },
      { type: 'Transfer', from: VAULT, to: CAROL, assetId: 1 }
    ])
  })

  it('should discard nested moves and their events when the outer call reverts', () => {
    const seenDuringCallback: LedgerEvent[] = []
    host.registerReceiver(VAULT, {
      onAssetReceived: (_operator, assetId) => {
        ledger.transferFrom(VAULT, VAULT, CAROL, assetId)
        seenDuringCallback.push(...events)
        return [1, 2, 3, 4]
      }
    })

    expect(() => ledger.safeTransferFrom(ALICE, ALICE, VAULT, 1)).toThrow('[ReceiverRejected]')

    expect(ledger.ownerOf(1)).toBe(ALICE)
    expect(ledger.balanceOf(CAROL)).toBe(0)
    expect(events).toEqual([])
    expect(seenDuringCallback).toEqual([])
  })
})
