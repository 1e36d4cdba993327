/**
 * Process-wide strategy registry
 * Holds one frozen snapshot per running strategy plus its cancellation controller.
 * Only the handle returned by register() may publish new snapshots.
 */

import { randomBytes } from 'crypto';
import { AnyStrategy, StrategyId, StrategyKind, StrategyStateMap } from '../models/Strategy';

interface RegistryEntry<T> {
  record: T;
  controller: AbortController;
}

type EntryStores = { [K in StrategyKind]: Map<StrategyId, RegistryEntry<StrategyStateMap[K]>> };

export interface StrategyHandle<K extends StrategyKind> {
  readonly id: StrategyId;
  readonly kind: K;
  /** Fires when the strategy is removed from the registry */
  readonly signal: AbortSignal;
  current(): StrategyStateMap[K];
  /**
   * Publishes the record computed from the current snapshot. After release()
   * the update still returns the new record but nothing is stored.
   */
  update(mutator: (current: StrategyStateMap[K]) => StrategyStateMap[K]): StrategyStateMap[K];
  release(): void;
}

const KINDS: readonly StrategyKind[] = ['grid', 'twap', 'oco'];

function freeze<T>(record: T): T {
  Object.freeze(record);
  return record;
}

export class StrategyRegistry {
  private readonly stores: EntryStores = {
    grid: new Map(),
    twap: new Map(),
    oco: new Map()
  };

  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * Generates `<kind>_<epoch-ms>_<6 hex chars>`
   */
  createId(kind: StrategyKind): StrategyId {
    return `${kind}_${this.clock()}_${randomBytes(3).toString('hex')}`;
  }

  register<K extends StrategyKind>(kind: K, record: StrategyStateMap[K]): StrategyHandle<K> {
    const store: Map<StrategyId, RegistryEntry<StrategyStateMap[K]>> = this.stores[kind];
    const id = record.id;
    if (this.findKind(id)) {
      throw new Error(`Strategy ${id} is already registered`);
    }

    const entry: RegistryEntry<StrategyStateMap[K]> = {
      record: freeze(record),
      controller: new AbortController()
    };
    store.set(id, entry);

    let latest = entry.record;
    return {
      id,
      kind,
      signal: entry.controller.signal,
      current: () => store.get(id)?.record ?? latest,
      update: mutator => {
        const live = store.get(id);
        const next = freeze(mutator(live?.record ?? latest));
        latest = next;
        if (live === entry) {
          entry.record = next;
        }
        return next;
      },
      release: () => {
        if (store.get(id) === entry) {
          store.delete(id);
        }
        entry.controller.abort();
      }
    };
  }

  get(id: StrategyId): AnyStrategy | undefined {
    const kind = this.findKind(id);
    return kind ? this.storeOf(kind).get(id)?.record : undefined;
  }

  getTyped<K extends StrategyKind>(kind: K, id: StrategyId): StrategyStateMap[K] | undefined {
    const store: Map<StrategyId, RegistryEntry<StrategyStateMap[K]>> = this.stores[kind];
    return store.get(id)?.record;
  }

  list(kind?: StrategyKind): AnyStrategy[] {
    const kinds = kind ? [kind] : KINDS;
    const records: AnyStrategy[] = [];
    for (const k of kinds) {
      for (const entry of this.storeOf(k).values()) {
        records.push(entry.record);
      }
    }
    return records;
  }

  /**
   * Deletes the entry and signals cancellation to its task
   */
  remove(id: StrategyId): boolean {
    const kind = this.findKind(id);
    if (!kind) {
      return false;
    }
    const store = this.storeOf(kind);
    const entry = store.get(id);
    store.delete(id);
    entry?.controller.abort();
    return true;
  }

  /**
   * Removes every strategy, aborting all background tasks
   */
  removeAll(): number {
    let removed = 0;
    for (const kind of KINDS) {
      for (const id of [...this.stores[kind].keys()]) {
        if (this.remove(id)) {
          removed++;
        }
      }
    }
    return removed;
  }

  size(): number {
    return KINDS.reduce((total, kind) => total + this.stores[kind].size, 0);
  }

  private storeOf(kind: StrategyKind): Map<StrategyId, RegistryEntry<AnyStrategy>> {
    return this.stores[kind];
  }

  private findKind(id: StrategyId): StrategyKind | undefined {
    return KINDS.find(kind => this.stores[kind].has(id));
  }
}
