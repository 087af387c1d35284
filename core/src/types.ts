/**
 * Artwork Ledger Type Definitions
 */

// ---------------------------------------------------------------------------
// Identity & Asset Types
// ---------------------------------------------------------------------------

/** Lowercase hex identity (a compressed public key, or the null identity) */
export type Identity = string

/** Sequential asset identifier, starting at 1 */
export type AssetId = number

// ---------------------------------------------------------------------------
// Metadata Types
// ---------------------------------------------------------------------------

export type ShapeKind = 'Circles' | 'Rectangles' | 'StarPolygon'

/**
 * Visual attributes selected from a seed
 */
export interface Attributes {
  /** 24-bit color, seed bits [24:48) */
  colorA: number
  /** 24-bit color, seed bits [48:72) */
  colorB: number
  /** seed mod 3 */
  shape: ShapeKind
}

/**
 * Inputs hashed into a seed. The block hash and timestamp come from the
 * execution host and move over time, so a seed is only reproducible within
 * one entropy snapshot.
 */
export interface SeedInput {
  blockHash: number[]
  timestamp: number
  assetId: AssetId
  ledgerIdentity: Identity
}

export interface MetadataInput {
  assetId: AssetId
  attributes: Attributes
  /** Label prefix used for `name` and the rendered caption */
  collectionName?: string
  description?: string
}

// ---------------------------------------------------------------------------
// Execution Host Types
// ---------------------------------------------------------------------------

/**
 * Ambient entropy visible to the ledger at the moment of a query
 */
export interface BlockSnapshot {
  /** 32-byte hash of the most recent block */
  hash: number[]
  /** Seconds since the epoch */
  timestamp: number
}

/**
 * Outcome of calling a recipient's receipt callback
 */
export type ReceiverCallResult =
  | { status: 'success', value: number[] }
  | { status: 'failure', reason?: string }

/**
 * Callback exposed by a code-bearing identity that accepts safe transfers.
 * Must return the 4-byte receiver acknowledgement.
 */
export interface AssetReceiver {
  onAssetReceived: (operator: Identity, assetId: AssetId, data: number[]) => number[]
}

/**
 * Capabilities the ledger needs from whatever hosts it
 */
export interface ExecutionHost {
  latestBlock: () => BlockSnapshot
  isCodeBearing: (identity: Identity) => boolean
  invokeReceiver: (
    recipient: Identity,
    operator: Identity,
    assetId: AssetId,
    data: number[]
  ) => ReceiverCallResult
}

// ---------------------------------------------------------------------------
// Storage Types
// ---------------------------------------------------------------------------

/**
 * Key-value records backing the ledger. Implementations must make
 * `atomic` all-or-nothing: writes made inside `fn` vanish if it throws.
 */
export interface LedgerStore {
  getOwner: (assetId: AssetId) => Identity | undefined
  setOwner: (assetId: AssetId, owner: Identity) => void
  getBalance: (owner: Identity) => number
  setBalance: (owner: Identity, balance: number) => void
  getDelegate: (assetId: AssetId) => Identity | undefined
  setDelegate: (assetId: AssetId, delegate: Identity | undefined) => void
  getOperatorApproval: (owner: Identity, operator: Identity) => boolean
  setOperatorApproval: (owner: Identity, operator: Identity, approved: boolean) => void
  getNextAssetId: () => AssetId
  setNextAssetId: (next: AssetId) => void
  atomic: <T>(fn: () => T) => T
}

// ---------------------------------------------------------------------------
// Event Types
// ---------------------------------------------------------------------------

export interface TransferEvent {
  type: 'Transfer'
  from: Identity
  to: Identity
  assetId: AssetId
}

export interface ApprovalEvent {
  type: 'Approval'
  owner: Identity
  /** NULL_IDENTITY when cleared */
  approved: Identity
  assetId: AssetId
}

export interface ApprovalForAllEvent {
  type: 'ApprovalForAll'
  owner: Identity
  operator: Identity
  approved: boolean
}

export type LedgerEvent = TransferEvent | ApprovalEvent | ApprovalForAllEvent

export type LedgerEventListener = (event: LedgerEvent) => void

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Ledger configuration options
 */
export interface LedgerConfig {
  /** Backing store (default: new MemoryLedgerStore()) */
  store?: LedgerStore
  /** Execution host (default: new LocalExecutionHost()) */
  host?: ExecutionHost
  /** The ledger's own identity, hashed into every seed (default: a random public key) */
  identity?: Identity
  /** Collection name (default: 'AI Artwork') */
  collectionName?: string
  /** Collection symbol (default: 'AIART') */
  symbol?: string
  /** Description placed in every metadata document */
  description?: string
  /** Console logging: true, false, or a minimum level (default: false) */
  logging?: boolean | { level: LogLevel }
}

export interface ResolvedLedgerConfig {
  store: LedgerStore
  host: ExecutionHost
  identity: Identity
  collectionName: string
  symbol: string
  description: string
  logLevel: LogLevel | undefined
}
