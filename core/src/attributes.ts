/**
 * Seed derivation and attribute selection.
 *
 * Both steps are pure: they never read or write the ledger.
 */

import { BigNumber, Hash, Utils } from '@bsv/sdk'

import type { Attributes, SeedInput, ShapeKind } from './types.js'
import { SHAPE_DISPLAY_NAMES, SHAPE_KINDS } from './constants.js'

const COLOR_MASK = 0xffffffn

/**
 * Hash the ambient entropy, the asset id and the ledger identity into a
 * 256-bit seed.
 *
 * Preimage layout: blockHash ‖ uint256be(timestamp) ‖ uint256be(assetId) ‖ ledgerIdentity
 */
export function deriveSeed(input: SeedInput): bigint {
  const preimage = [
    ...input.blockHash,
    ...toUint256(input.timestamp),
    ...toUint256(input.assetId),
    ...Utils.toArray(input.ledgerIdentity, 'hex')
  ]
  const digest = Hash.sha256(preimage)
  return BigInt('0x' + Utils.toHex(digest))
}

/**
 * Split a seed into two 24-bit colors and a shape category.
 */
export function selectAttributes(seed: bigint): Attributes {
  if (seed < 0n) {
    throw new RangeError('Seed must be unsigned')
  }
  return {
    colorA: Number((seed >> 24n) & COLOR_MASK),
    colorB: Number((seed >> 48n) & COLOR_MASK),
    shape: shapeForIndex(Number(seed % 3n))
  }
}

export function shapeDisplayName(shape: ShapeKind): string {
  return SHAPE_DISPLAY_NAMES[shape]
}

function shapeForIndex(index: number): ShapeKind {
  const shape = SHAPE_KINDS[index]
  if (shape === undefined) {
    throw new RangeError(`No shape for index ${index}`)
  }
  return shape
}

function toUint256(value: number): number[] {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Expected a non-negative safe integer, got ${value}`)
  }
  return new BigNumber(value).toArray('be', 32)
}
