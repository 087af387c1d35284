/**
 * ArtworkLedger - ownership ledger with on-demand generative metadata
 *
 * Tracks asset ownership, balances, per-asset delegates and owner-wide
 * operators. Metadata for any minted asset is derived from the host's
 * current block entropy each time it is requested.
 */

import { PrivateKey } from '@bsv/sdk'

import type {
  AssetId,
  Attributes,
  Identity,
  LedgerConfig,
  LedgerEvent,
  LedgerEventListener,
  ResolvedLedgerConfig
} from './types.js'
import {
  DEFAULT_COLLECTION_NAME,
  DEFAULT_COLLECTION_SYMBOL,
  DEFAULT_DESCRIPTION,
  NULL_IDENTITY,
  SUPPORTED_INTERFACES
} from './constants.js'
import { LedgerError } from './errors.js'
import { deriveSeed, selectAttributes } from './attributes.js'
import { assembleMetadata } from './metadata.js'
import { checkReceiver } from './receiver.js'
import { createLogger } from './logging.js'
import type { Logger } from './logging.js'
import { MemoryLedgerStore } from './MemoryLedgerStore.js'
import { LocalExecutionHost } from './LocalExecutionHost.js'
import {
  hasControlCharacters,
  hasMarkupCharacters,
  isAssetIdShape,
  isUsableIdentity,
  isWellFormedIdentity,
  normalizeInterfaceId
} from './utils.js'

/**
 * @example
 * ```typescript
 * const host = new LocalExecutionHost()
 * const ledger = new ArtworkLedger({ host })
 *
 * const id = ledger.connect(alice).mint()
 * ledger.connect(alice).transferFrom(alice, bob, id)
 *
 * ledger.ownerOf(id)   // bob
 * ledger.tokenURI(id)  // data:application/json;utf8,{"name":"AI Artwork #1",...
 * ```
 */
export class ArtworkLedger {
  private readonly config: ResolvedLedgerConfig
  private readonly log: Logger
  private readonly listeners = new Set<LedgerEventListener>()
  private pending?: LedgerEvent[]

  constructor(config: LedgerConfig = {}) {
    this.config = this.resolveConfig(config)
    this.log = createLogger('ArtworkLedger', this.config.logLevel)
  }

  /** The ledger's own identity, hashed into every seed */
  get identity(): Identity {
    return this.config.identity
  }

  /**
   * Bind a caller, giving the caller-implicit form of every operation.
   */
  connect(caller: Identity): LedgerSession {
    return new LedgerSession(this, caller)
  }

  /**
   * Subscribe to Transfer, Approval and ApprovalForAll events.
   * Events are delivered only after the call that raised them commits.
   *
   * @returns A function that removes the listener
   */
  on(listener: LedgerEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  // ---------------------------------------------------------------------------
  // Collection Info
  // ---------------------------------------------------------------------------

  name(): string {
    return this.config.collectionName
  }

  symbol(): string {
    return this.config.symbol
  }

  /** Number of minted assets. Assets are never destroyed. */
  totalSupply(): number {
    return this.config.store.getNextAssetId() - 1
  }

  supportsInterface(interfaceId: string): boolean {
    return SUPPORTED_INTERFACES.includes(normalizeInterfaceId(interfaceId))
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * @throws LedgerError InvalidAddress for the null identity
   */
  balanceOf(owner: Identity): number {
    if (!isUsableIdentity(owner)) {
      throw new LedgerError('InvalidAddress', 'Balance query for the null identity', { owner })
    }
    return this.config.store.getBalance(owner)
  }

  /**
   * @throws LedgerError NotFound if the asset was never minted
   */
  ownerOf(assetId: AssetId): Identity {
    return this.requireOwner(assetId)
  }

  exists(assetId: AssetId): boolean {
    return isAssetIdShape(assetId) && this.config.store.getOwner(assetId) !== undefined
  }

  /**
   * The asset's delegate, or NULL_IDENTITY when none is set.
   *
   * @throws LedgerError NotFound if the asset was never minted
   */
  getApproved(assetId: AssetId): Identity {
    this.requireOwner(assetId)
    return this.config.store.getDelegate(assetId) ?? NULL_IDENTITY
  }

  isApprovedForAll(owner: Identity, operator: Identity): boolean {
    return this.config.store.getOperatorApproval(owner, operator)
  }

  // ---------------------------------------------------------------------------
  // Minting
  // ---------------------------------------------------------------------------

  /**
   * Mint the next asset to `caller`.
   *
   * @returns The new asset id
   * @throws LedgerError InvalidAddress if caller is null or malformed
   */
  mint(caller: Identity): AssetId {
    return this.mutate('mint', () => {
      if (!isUsableIdentity(caller)) {
        throw new LedgerError('InvalidAddress', 'Cannot mint to the null identity', { caller })
      }
      const { store } = this.config
      const assetId = store.getNextAssetId()

      store.setOwner(assetId, caller)
      store.setBalance(caller, store.getBalance(caller) + 1)
      store.setNextAssetId(assetId + 1)

      this.emit({ type: 'Transfer', from: NULL_IDENTITY, to: caller, assetId })
      this.log.info(`Minted #${assetId}`, { owner: caller })
      return assetId
    })
  }

  // ---------------------------------------------------------------------------
  // Approvals
  // ---------------------------------------------------------------------------

  /**
   * Set the single delegate allowed to transfer `assetId`. Passing
   * NULL_IDENTITY clears it.
   *
   * @throws LedgerError NotFound, InvalidApproval (to is the owner), Unauthorized
   */
  approve(caller: Identity, to: Identity, assetId: AssetId): void {
    this.mutate('approve', () => {
      const { store } = this.config
      const owner = this.requireOwner(assetId)

      if (to === owner) {
        throw new LedgerError('InvalidApproval', 'Cannot approve the current owner', { assetId })
      }
      if (caller !== owner && !store.getOperatorApproval(owner, caller)) {
        throw new LedgerError('Unauthorized', 'Caller is neither owner nor operator', { caller, assetId })
      }
      if (!isWellFormedIdentity(to)) {
        throw new LedgerError('InvalidAddress', 'Malformed delegate identity', { to })
      }

      store.setDelegate(assetId, to === NULL_IDENTITY ? undefined : to)
      this.emit({ type: 'Approval', owner, approved: to, assetId })
      this.log.info(`Approved delegate for #${assetId}`, { owner, approved: to })
    })
  }

  /**
   * Grant or revoke `operator` rights over every asset `caller` owns.
   *
   * @throws LedgerError InvalidApproval if operator is the caller
   */
  setApprovalForAll(caller: Identity, operator: Identity, approved: boolean): void {
    this.mutate('setApprovalForAll', () => {
      if (operator === caller) {
        throw new LedgerError('InvalidApproval', 'Cannot set self as operator', { caller })
      }
      this.config.store.setOperatorApproval(caller, operator, approved)
      this.emit({ type: 'ApprovalForAll', owner: caller, operator, approved })
      this.log.info(`${approved ? 'Granted' : 'Revoked'} operator`, { owner: caller, operator })
    })
  }

  // ---------------------------------------------------------------------------
  // Transfers
  // ---------------------------------------------------------------------------

  /**
   * Move `assetId` from `from` to `to` and clear its delegate.
   *
   * Checks run in order: NotFound, Unauthorized, OwnershipMismatch,
   * InvalidAddress. Nothing is written unless all pass.
   */
  transferFrom(caller: Identity, from: Identity, to: Identity, assetId: AssetId): void {
    this.mutate('transferFrom', () => {
      this.transfer(caller, from, to, assetId)
    })
  }

  /**
   * transferFrom, then require a code-bearing recipient to acknowledge
   * receipt. A missing or wrong acknowledgement reverts the whole call.
   *
   * @throws LedgerError ReceiverRejected, plus every transferFrom failure
   */
  safeTransferFrom(
    caller: Identity,
    from: Identity,
    to: Identity,
    assetId: AssetId,
    data: number[] = []
  ): void {
    this.mutate('safeTransferFrom', () => {
      this.transfer(caller, from, to, assetId)

      const check = checkReceiver(this.config.host, caller, to, assetId, data)
      if (!check.accepted) {
        throw new LedgerError('ReceiverRejected', check.reason, { to, assetId })
      }
    })
  }

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  /**
   * Attributes for the host's current entropy snapshot. Two calls only
   * agree if the host reports the same block in between.
   *
   * @throws LedgerError NotFound if the asset was never minted
   */
  tokenAttributes(assetId: AssetId): Attributes {
    this.requireOwner(assetId)
    const block = this.config.host.latestBlock()
    const seed = deriveSeed({
      blockHash: block.hash,
      timestamp: block.timestamp,
      assetId,
      ledgerIdentity: this.config.identity
    })
    return selectAttributes(seed)
  }

  /**
   * Self-contained JSON metadata document, recomputed on every call.
   *
   * @throws LedgerError NotFound if the asset was never minted
   */
  tokenURI(assetId: AssetId): string {
    const attributes = this.tokenAttributes(assetId)
    this.log.debug(`Rendering #${assetId}`, attributes)
    return assembleMetadata({
      assetId,
      attributes,
      collectionName: this.config.collectionName,
      description: this.config.description
    })
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private transfer(caller: Identity, from: Identity, to: Identity, assetId: AssetId): void {
    const { store } = this.config
    const owner = this.requireOwner(assetId)

    const authorized =
      caller === owner ||
      store.getDelegate(assetId) === caller ||
      store.getOperatorApproval(owner, caller)
    if (!authorized) {
      throw new LedgerError('Unauthorized', 'Caller is not owner, delegate or operator', { caller, assetId })
    }
    if (owner !== from) {
      throw new LedgerError('OwnershipMismatch', `Asset #${assetId} is not owned by the stated sender`, { from, assetId })
    }
    if (!isUsableIdentity(to)) {
      throw new LedgerError('InvalidAddress', 'Cannot transfer to the null identity', { to })
    }

    store.setDelegate(assetId, undefined)
    store.setBalance(from, store.getBalance(from) - 1)
    store.setBalance(to, store.getBalance(to) + 1)
    store.setOwner(assetId, to)

    this.emit({ type: 'Transfer', from, to, assetId })
    this.log.info(`Transferred #${assetId}`, { from, to })
  }

  private requireOwner(assetId: AssetId): Identity {
    const owner = isAssetIdShape(assetId) ? this.config.store.getOwner(assetId) : undefined
    if (owner === undefined) {
      throw new LedgerError('NotFound', `Asset #${assetId} does not exist`, { assetId })
    }
    return owner
  }

  /**
   * Run `fn` atomically against the store. Events raised inside are held
   * until the outermost mutation commits, and dropped if any level throws.
   */
  private mutate<T>(operation: string, fn: () => T): T {
    const outer = this.pending
    const events: LedgerEvent[] = []
    this.pending = events

    let result: T
    try {
      result = this.config.store.atomic(fn)
    } catch (error) {
      this.pending = outer
      if (error instanceof LedgerError) {
        this.log.warn(`${operation} rejected: ${error.message}`)
      }
      throw error
    }
    this.pending = outer

    if (outer !== undefined) {
      outer.push(...events)
    } else {
      for (const event of events) {
        for (const listener of this.listeners) {
          listener(event)
        }
      }
    }
    return result
  }

  private emit(event: LedgerEvent): void {
    if (this.pending === undefined) {
      throw new Error(`${event.type} raised outside a mutation`)
    }
    this.pending.push(event)
  }

  private resolveConfig(config: LedgerConfig): ResolvedLedgerConfig {
    const identity = config.identity ?? PrivateKey.fromRandom().toPublicKey().toString()
    if (!isUsableIdentity(identity)) {
      throw new LedgerError('InvalidAddress', 'Ledger identity must be non-null lowercase hex', { identity })
    }
    const collectionName = config.collectionName ?? DEFAULT_COLLECTION_NAME
    const description = config.description ?? DEFAULT_DESCRIPTION
    if (hasControlCharacters(collectionName) || hasMarkupCharacters(collectionName)) {
      throw new RangeError('Collection name must not contain control characters or <, > or &')
    }
    if (hasControlCharacters(description)) {
      throw new RangeError('Description must not contain control characters')
    }

    let logLevel: ResolvedLedgerConfig['logLevel']
    if (config.logging === true) {
      logLevel = 'info'
    } else if (typeof config.logging === 'object') {
      logLevel = config.logging.level
    }
    return {
      store: config.store ?? new MemoryLedgerStore(),
      host: config.host ?? new LocalExecutionHost(),
      identity,
      collectionName,
      symbol: config.symbol ?? DEFAULT_COLLECTION_SYMBOL,
      description,
      logLevel
    }
  }
}

/**
 * A ledger bound to one caller.
 */
export class LedgerSession {
  constructor(
    private readonly ledger: ArtworkLedger,
    readonly caller: Identity
  ) {}

  mint(): AssetId {
    return this.ledger.mint(this.caller)
  }

  approve(to: Identity, assetId: AssetId): void {
    this.ledger.approve(this.caller, to, assetId)
  }

  setApprovalForAll(operator: Identity, approved: boolean): void {
    this.ledger.setApprovalForAll(this.caller, operator, approved)
  }

  transferFrom(from: Identity, to: Identity, assetId: AssetId): void {
    this.ledger.transferFrom(this.caller, from, to, assetId)
  }

  safeTransferFrom(from: Identity, to: Identity, assetId: AssetId, data: number[] = []): void {
    this.ledger.safeTransferFrom(this.caller, from, to, assetId, data)
  }

  balanceOf(owner: Identity): number {
    return this.ledger.balanceOf(owner)
  }

  ownerOf(assetId: AssetId): Identity {
    return this.ledger.ownerOf(assetId)
  }

  getApproved(assetId: AssetId): Identity {
    return this.ledger.getApproved(assetId)
  }

  isApprovedForAll(owner: Identity, operator: Identity): boolean {
    return this.ledger.isApprovedForAll(owner, operator)
  }

  tokenURI(assetId: AssetId): string {
    return this.ledger.tokenURI(assetId)
  }
}
