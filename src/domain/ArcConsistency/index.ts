import { letterAt } from '../data-contract';
import type { DomainStore } from '../DomainStore';
import { isSameSlot, toSlotKey, type PuzzleGeometry, type Slot } from '../PuzzleGeometry';

export interface Arc {
  readonly from: Slot;
  readonly to: Slot;
}

export interface ArcRevision {
  readonly arc: Arc;
  readonly removedWords: readonly string[];
}

const QUEUE_COMPACTION_THRESHOLD = 256;

export interface ArcConsistencyOptions {
  readonly onRevision?: (revision: ArcRevision) => void;
}

function toArcKey(arc: Arc): string {
  return `${toSlotKey(arc.from)}>${toSlotKey(arc.to)}`;
}

function countLettersAt(domain: ReadonlySet<string>, index: number): ReadonlyMap<string, number> {
  const counts = new Map<string, number>();

  for (const word of domain) {
    const letter = letterAt(word, index);
    if (letter !== null) {
      counts.set(letter, (counts.get(letter) ?? 0) + 1);
    }
  }

  return counts;
}

function findUnsupportedWords(
  store: DomainStore,
  geometry: PuzzleGeometry,
  x: Slot,
  y: Slot,
): readonly string[] {
  const overlap = geometry.getOverlap(x, y);
  if (!overlap) {
    return [];
  }

  const targetDomain = store.getDomain(y);
  const supportByLetter = countLettersAt(targetDomain, overlap.secondIndex);
  const unsupported: string[] = [];

  for (const word of store.getDomain(x)) {
    const letter = letterAt(word, overlap.firstIndex);
    if (letter === null) {
      unsupported.push(word);
      continue;
    }

    let support = supportByLetter.get(letter) ?? 0;

    // A word never supports itself: the two slots cannot share it.
    if (targetDomain.has(word) && letterAt(word, overlap.secondIndex) === letter) {
      support -= 1;
    }

    if (support <= 0) {
      unsupported.push(word);
    }
  }

  return unsupported;
}

function reviseArc(store: DomainStore, geometry: PuzzleGeometry, arc: Arc): readonly string[] {
  const unsupported = findUnsupportedWords(store, geometry, arc.from, arc.to);

  for (const word of unsupported) {
    store.removeWord(arc.from, word);
  }

  return unsupported;
}

/**
 * Makes `x` arc consistent with `y`: drops every word of x that no other word of y
 * matches at their shared cell. Returns true when x's domain changed.
 */
export function revise(store: DomainStore, geometry: PuzzleGeometry, x: Slot, y: Slot): boolean {
  return reviseArc(store, geometry, { from: x, to: y }).length > 0;
}

export function createAllArcs(geometry: PuzzleGeometry): readonly Arc[] {
  const arcs: Arc[] = [];

  for (const from of geometry.slots) {
    for (const to of geometry.slots) {
      if (!isSameSlot(from, to)) {
        arcs.push({ from, to });
      }
    }
  }

  return arcs;
}

/**
 * AC-3 over a FIFO work queue. An arc that is already waiting in the queue is not
 * queued twice. Returns false as soon as a domain is emptied.
 */
export function ac3(
  store: DomainStore,
  geometry: PuzzleGeometry,
  initialArcs: readonly Arc[] | null = null,
  options: ArcConsistencyOptions = {},
): boolean {
  const queue: Arc[] = [];
  const queuedKeys = new Set<string>();
  let head = 0;

  const enqueue = (arc: Arc): void => {
    const key = toArcKey(arc);
    if (queuedKeys.has(key)) {
      return;
    }

    queuedKeys.add(key);
    queue.push(arc);
  };

  for (const arc of initialArcs ?? createAllArcs(geometry)) {
    enqueue(arc);
  }

  while (head < queue.length) {
    if (head >= QUEUE_COMPACTION_THRESHOLD && head * 2 >= queue.length) {
      queue.splice(0, head);
      head = 0;
    }

    const arc = queue[head];
    head += 1;

    if (!arc) {
      continue;
    }

    queuedKeys.delete(toArcKey(arc));

    const removedWords = reviseArc(store, geometry, arc);
    if (removedWords.length === 0) {
      continue;
    }

    options.onRevision?.({ arc, removedWords });

    if (store.isEmpty(arc.from)) {
      return false;
    }

    for (const neighbor of geometry.getNeighbors(arc.from)) {
      if (!isSameSlot(neighbor, arc.to)) {
        enqueue({ from: neighbor, to: arc.from });
      }
    }
  }

  return geometry.slots.every((slot) => !store.isEmpty(slot));
}
