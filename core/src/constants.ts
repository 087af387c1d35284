/**
 * Artwork Ledger Constants
 *
 * Constants shared by the ledger, the metadata engine and the receiver hook.
 */

import type { Identity, ShapeKind } from './types.js'

// ---------------------------------------------------------------------------
// Identity Constants
// ---------------------------------------------------------------------------

/** The null identity: never an owner, never a valid recipient */
export const NULL_IDENTITY: Identity = '0'.repeat(66)

/** First identifier handed out by mint */
export const FIRST_ASSET_ID = 1

// ---------------------------------------------------------------------------
// Collection Constants
// ---------------------------------------------------------------------------

export const DEFAULT_COLLECTION_NAME = 'AI Artwork'

export const DEFAULT_COLLECTION_SYMBOL = 'AIART'

export const DEFAULT_DESCRIPTION =
  'Generative artwork derived on demand from on-ledger entropy. Palette and shape are drawn from a hash of the latest block, the asset id and the ledger identity.'

// ---------------------------------------------------------------------------
// Receiver Protocol Constants
// ---------------------------------------------------------------------------

/**
 * Acknowledgement a code-bearing recipient must return from
 * `onAssetReceived` for a safe transfer to stand.
 */
export const RECEIVER_MAGIC: readonly number[] = [0x15, 0x0b, 0x7a, 0x02]

/** Interface ids answered by `supportsInterface` (4-byte hex) */
export const INTERFACE_ID_DETECTION = '01ffc9a7'
export const INTERFACE_ID_LEDGER = '80ac58cd'
export const INTERFACE_ID_METADATA = '5b5e139f'

export const SUPPORTED_INTERFACES: readonly string[] = [
  INTERFACE_ID_DETECTION,
  INTERFACE_ID_LEDGER,
  INTERFACE_ID_METADATA
]

// ---------------------------------------------------------------------------
// Rendering Constants
// ---------------------------------------------------------------------------

export const CANVAS_SIZE = 400

export const JSON_DATA_URI_PREFIX = 'data:application/json;utf8,'

export const SVG_DATA_URI_PREFIX = 'data:image/svg+xml;utf8,'

/** Shape categories indexed by `seed mod 3` */
export const SHAPE_KINDS: readonly ShapeKind[] = ['Circles', 'Rectangles', 'StarPolygon']

export const SHAPE_DISPLAY_NAMES: Readonly<Record<ShapeKind, string>> = {
  Circles: 'Concentric Circles',
  Rectangles: 'Rounded Rectangles',
  StarPolygon: 'Star Polygon'
}

/** Outline of the 10-point star, 5 outer and 5 inner vertices around (200,200) */
export const STAR_POINTS =
  '200,70 232,156 324,160 252,217 276,305 200,255 124,305 148,217 76,160 168,156'
