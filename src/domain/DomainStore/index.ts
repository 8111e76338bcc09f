import { wordLength } from '../data-contract';
import { toSlotKey, type PuzzleGeometry, type Slot, type SlotKey } from '../PuzzleGeometry';

export interface DomainStore {
  readonly slotCount: number;
  getDomain: (slot: Slot) => ReadonlySet<string>;
  getDomainSize: (slot: Slot) => number;
  isEmpty: (slot: Slot) => boolean;
  removeWord: (slot: Slot, word: string) => boolean;
  getTotalSize: () => number;
  snapshot: () => ReadonlyMap<SlotKey, readonly string[]>;
}

export class DomainStoreDomainError extends Error {
  readonly code: string;
  readonly retryable: false;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[domain-store] ${message}`);
    this.name = 'DomainStoreDomainError';
    this.code = code;
    this.retryable = false;
    this.context = context;
  }
}

/**
 * Gives every slot its own copy of the full vocabulary. The store is owned by the
 * caller; nothing here is shared between stores.
 */
export function initializeDomainStore(
  geometry: PuzzleGeometry,
  vocabulary: Iterable<string>,
): DomainStore {
  const words = [...vocabulary];
  const domains = new Map<SlotKey, Set<string>>();

  for (const slot of geometry.slots) {
    domains.set(toSlotKey(slot), new Set(words));
  }

  const resolveDomain = (slot: Slot): Set<string> => {
    const domain = domains.get(toSlotKey(slot));
    if (!domain) {
      throw new DomainStoreDomainError(
        'domain-store.unknown-slot',
        'Domain store has no entry for the requested slot.',
        { slot },
      );
    }

    return domain;
  };

  return {
    slotCount: domains.size,
    getDomain: (slot) => resolveDomain(slot),
    getDomainSize: (slot) => resolveDomain(slot).size,
    isEmpty: (slot) => resolveDomain(slot).size === 0,
    removeWord: (slot, word) => resolveDomain(slot).delete(word),
    getTotalSize: () => {
      let total = 0;
      for (const domain of domains.values()) {
        total += domain.size;
      }

      return total;
    },
    snapshot: () => {
      const snapshot = new Map<SlotKey, readonly string[]>();
      for (const [key, domain] of domains) {
        snapshot.set(key, [...domain].sort());
      }

      return snapshot;
    },
  };
}

export function enforceNodeConsistency(store: DomainStore, geometry: PuzzleGeometry): void {
  for (const slot of geometry.slots) {
    const mismatched = [...store.getDomain(slot)].filter(
      (word) => wordLength(word) !== slot.length,
    );

    for (const word of mismatched) {
      store.removeWord(slot, word);
    }
  }
}
