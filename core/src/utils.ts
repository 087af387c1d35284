/**
 * Utility functions for the artwork ledger
 */

import type { AssetId, Identity } from './types.js'
import { NULL_IDENTITY } from './constants.js'

/**
 * Check that an identity is an even-length, lowercase hex string.
 * The null identity passes this check; use `isNullIdentity` to reject it.
 */
export function isWellFormedIdentity(identity: string): boolean {
  return identity.length > 0 && identity.length % 2 === 0 && /^[0-9a-f]+$/.test(identity)
}

export function isNullIdentity(identity: Identity): boolean {
  return identity === NULL_IDENTITY
}

/**
 * True for identities that may own assets or receive them
 */
export function isUsableIdentity(identity: string): boolean {
  return isWellFormedIdentity(identity) && !isNullIdentity(identity)
}

/**
 * True for values that could have been produced by mint
 */
export function isAssetIdShape(assetId: AssetId): boolean {
  return Number.isSafeInteger(assetId) && assetId >= 1
}

/**
 * Normalize an interface id to 8 lowercase hex characters, accepting an
 * optional 0x prefix.
 */
export function normalizeInterfaceId(interfaceId: string): string {
  const hex = interfaceId.toLowerCase().replace(/^0x/, '')
  return /^[0-9a-f]{8}$/.test(hex) ? hex : ''
}

/**
 * True if the text holds a C0 control character or DEL. The metadata
 * escaper leaves these untouched, so they would break the JSON document.
 */
export function hasControlCharacters(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    if (code < 0x20 || code === 0x7f) return true
  }
  return false
}

/**
 * True if the text holds '<', '>' or '&', which the SVG caption writes raw.
 */
export function hasMarkupCharacters(text: string): boolean {
  return /[<>&]/.test(text)
}
