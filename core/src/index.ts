/**
 * @artwork-ledger/core - ownership ledger with generative metadata
 *
 * This library provides:
 * - An ownership ledger with mint, delegate and operator approvals, and
 *   plain and safe transfers
 * - Deterministic seed derivation and attribute selection
 * - An SVG renderer and a JSON data-URI metadata assembler
 * - An in-process execution host and store for embedding and tests
 *
 * @example
 * ```typescript
 * import { ArtworkLedger, LocalExecutionHost } from '@artwork-ledger/core'
 *
 * const host = new LocalExecutionHost()
 * const ledger = new ArtworkLedger({ host, logging: true })
 *
 * const id = ledger.connect(alice).mint()
 * ledger.connect(alice).safeTransferFrom(alice, bob, id)
 * console.log(ledger.tokenURI(id))
 * ```
 *
 * @packageDocumentation
 */

// Ledger
export { ArtworkLedger, LedgerSession } from './ArtworkLedger.js'
export { MemoryLedgerStore } from './MemoryLedgerStore.js'
export { LocalExecutionHost } from './LocalExecutionHost.js'
export { checkReceiver } from './receiver.js'
export type { ReceiverCheck } from './receiver.js'

// Metadata engine
export { deriveSeed, selectAttributes, shapeDisplayName } from './attributes.js'
export { renderArtwork } from './renderer.js'
export { assembleMetadata } from './metadata.js'
export { toHexColor, toDecimalString, escapeJson } from './encoding.js'

// Errors
export { LedgerError, isLedgerError } from './errors.js'
export type { LedgerErrorCode } from './errors.js'

// Logging
export { createLogger, configureLogging } from './logging.js'
export type { Logger } from './logging.js'

// Types
export type {
  Identity,
  AssetId,
  ShapeKind,
  Attributes,
  SeedInput,
  MetadataInput,
  BlockSnapshot,
  ReceiverCallResult,
  AssetReceiver,
  ExecutionHost,
  LedgerStore,
  TransferEvent,
  ApprovalEvent,
  ApprovalForAllEvent,
  LedgerEvent,
  LedgerEventListener,
  LogLevel,
  LedgerConfig,
  ResolvedLedgerConfig
} from './types.js'

// Constants
export {
  NULL_IDENTITY,
  FIRST_ASSET_ID,
  DEFAULT_COLLECTION_NAME,
  DEFAULT_COLLECTION_SYMBOL,
  DEFAULT_DESCRIPTION,
  RECEIVER_MAGIC,
  INTERFACE_ID_DETECTION,
  INTERFACE_ID_LEDGER,
  INTERFACE_ID_METADATA,
  CANVAS_SIZE,
  JSON_DATA_URI_PREFIX,
  SVG_DATA_URI_PREFIX,
  SHAPE_KINDS,
  SHAPE_DISPLAY_NAMES
} from './constants.js'

// Utilities
export { isWellFormedIdentity, isNullIdentity, isUsableIdentity } from './utils.js'
