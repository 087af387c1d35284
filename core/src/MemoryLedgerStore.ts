import type { AssetId, Identity, LedgerStore } from './types.js'
import { FIRST_ASSET_ID } from './constants.js'

interface StoreState {
  owners: Map<AssetId, Identity>
  balances: Map<Identity, number>
  delegates: Map<AssetId, Identity>
  operators: Map<string, boolean>
  nextAssetId: AssetId
}

/**
 * In-process LedgerStore backed by Maps.
 *
 * `atomic` snapshots the state on entry and restores it if the callback
 * throws. Each nesting level rolls back independently.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: StoreState = {
    owners: new Map(),
    balances: new Map(),
    delegates: new Map(),
    operators: new Map(),
    nextAssetId: FIRST_ASSET_ID
  }

  getOwner(assetId: AssetId): Identity | undefined {
    return this.state.owners.get(assetId)
  }

  setOwner(assetId: AssetId, owner: Identity): void {
    this.state.owners.set(assetId, owner)
  }

  getBalance(owner: Identity): number {
    return this.state.balances.get(owner) ?? 0
  }

  setBalance(owner: Identity, balance: number): void {
    if (balance === 0) {
      this.state.balances.delete(owner)
    } else {
      this.state.balances.set(owner, balance)
    }
  }

  getDelegate(assetId: AssetId): Identity | undefined {
    return this.state.delegates.get(assetId)
  }

  setDelegate(assetId: AssetId, delegate: Identity | undefined): void {
    if (delegate === undefined) {
      this.state.delegates.delete(assetId)
    } else {
      this.state.delegates.set(assetId, delegate)
    }
  }

  getOperatorApproval(owner: Identity, operator: Identity): boolean {
    return this.state.operators.get(operatorKey(owner, operator)) ?? false
  }

  setOperatorApproval(owner: Identity, operator: Identity, approved: boolean): void {
    const key = operatorKey(owner, operator)
    if (approved) {
      this.state.operators.set(key, true)
    } else {
      this.state.operators.delete(key)
    }
  }

  getNextAssetId(): AssetId {
    return this.state.nextAssetId
  }

  setNextAssetId(next: AssetId): void {
    this.state.nextAssetId = next
  }

  atomic<T>(fn: () => T): T {
    const snapshot = cloneState(this.state)
    try {
      return fn()
    } catch (error) {
      this.state = snapshot
      throw error
    }
  }

  /**
   * Sum of all balances. Equals the number of minted assets.
   */
  totalBalance(): number {
    let total = 0
    for (const balance of this.state.balances.values()) {
      total += balance
    }
    return total
  }
}

function operatorKey(owner: Identity, operator: Identity): string {
  return `${owner}:${operator}`
}

function cloneState(state: StoreState): StoreState {
  return {
    owners: new Map(state.owners),
    balances: new Map(state.balances),
    delegates: new Map(state.delegates),
    operators: new Map(state.operators),
    nextAssetId: state.nextAssetId
  }
}
