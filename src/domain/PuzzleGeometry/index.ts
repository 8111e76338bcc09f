import { DEFAULT_SOLVER_SETTINGS } from '../../config/solver-settings';

export type SlotDirection = 'across' | 'down';

export interface Slot {
  readonly row: number;
  readonly col: number;
  readonly length: number;
  readonly direction: SlotDirection;
}

export type SlotKey = `${SlotDirection}:${number}:${number}:${number}`;

export interface SlotOverlap {
  readonly firstIndex: number;
  readonly secondIndex: number;
}

export interface SlotCell {
  readonly row: number;
  readonly col: number;
}

export type CellStructure = readonly (readonly boolean[])[];

export interface PuzzleGeometryOptions {
  readonly minSlotLength?: number;
}

export interface PuzzleGeometry {
  readonly height: number;
  readonly width: number;
  readonly cells: CellStructure;
  readonly slots: readonly Slot[];
  getSlot: (key: SlotKey) => Slot | null;
  getOverlap: (first: Slot, second: Slot) => SlotOverlap | null;
  getNeighbors: (slot: Slot) => readonly Slot[];
}

export class PuzzleGeometryDomainError extends Error {
  readonly code: string;
  readonly retryable: false;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(code: string, message: string, context: Readonly<Record<string, unknown>> = {}) {
    super(`[puzzle-geometry] ${message}`);
    this.name = 'PuzzleGeometryDomainError';
    this.code = code;
    this.retryable = false;
    this.context = context;
  }
}

export function toSlotKey(slot: Slot): SlotKey {
  return `${slot.direction}:${slot.row}:${slot.col}:${slot.length}`;
}

export function isSameSlot(first: Slot, second: Slot): boolean {
  return (
    first.row === second.row &&
    first.col === second.col &&
    first.length === second.length &&
    first.direction === second.direction
  );
}

export function getSlotCells(slot: Slot): readonly SlotCell[] {
  const cells: SlotCell[] = [];

  for (let index = 0; index < slot.length; index += 1) {
    cells.push({
      row: slot.direction === 'down' ? slot.row + index : slot.row,
      col: slot.direction === 'across' ? slot.col + index : slot.col,
    });
  }

  return cells;
}

function normalizeMinSlotLength(value: number | undefined): number {
  if (value === undefined) {
    return DEFAULT_SOLVER_SETTINGS.minSlotLength;
  }

  if (!Number.isSafeInteger(value) || value < 1) {
    throw new PuzzleGeometryDomainError(
      'puzzle-geometry.invalid-min-slot-length',
      'minSlotLength must be a positive integer.',
      { minSlotLength: value },
    );
  }

  return value;
}

function copyStructure(cells: CellStructure): CellStructure {
  const firstRow = cells[0];
  if (!firstRow || firstRow.length === 0) {
    throw new PuzzleGeometryDomainError(
      'puzzle-geometry.empty-structure',
      'Puzzle structure must contain at least one row and one column.',
      { height: cells.length },
    );
  }

  const width = firstRow.length;
  const copiedRows: boolean[][] = [];

  for (const [rowIndex, row] of cells.entries()) {
    if (row.length !== width) {
      throw new PuzzleGeometryDomainError(
        'puzzle-geometry.ragged-structure',
        `Row ${rowIndex} has ${row.length} cells, expected ${width}.`,
        { rowIndex, rowWidth: row.length, expectedWidth: width },
      );
    }

    copiedRows.push([...row]);
  }

  return copiedRows;
}

function measureRun(
  cells: CellStructure,
  row: number,
  col: number,
  direction: SlotDirection,
): number {
  const isPuzzleCellAt = (offset: number): boolean => {
    const cellRow = direction === 'down' ? row + offset : row;
    const cellCol = direction === 'across' ? col + offset : col;
    return cells[cellRow]?.[cellCol] === true;
  };

  let length = 0;
  while (isPuzzleCellAt(length)) {
    length += 1;
  }

  return length;
}

function discoverSlots(cells: CellStructure, minSlotLength: number): readonly Slot[] {
  const slots: Slot[] = [];

  for (const [row, rowCells] of cells.entries()) {
    for (const [col, isPuzzleCell] of rowCells.entries()) {
      if (!isPuzzleCell) {
        continue;
      }

      if (!rowCells[col - 1]) {
        const length = measureRun(cells, row, col, 'across');
        if (length >= minSlotLength) {
          slots.push({ row, col, length, direction: 'across' });
        }
      }

      if (!cells[row - 1]?.[col]) {
        const length = measureRun(cells, row, col, 'down');
        if (length >= minSlotLength) {
          slots.push({ row, col, length, direction: 'down' });
        }
      }
    }
  }

  return slots;
}

function findCrossing(across: Slot, down: Slot): SlotOverlap | null {
  const firstIndex = down.col - across.col;
  const secondIndex = across.row - down.row;

  if (firstIndex < 0 || firstIndex >= across.length) {
    return null;
  }

  if (secondIndex < 0 || secondIndex >= down.length) {
    return null;
  }

  return { firstIndex, secondIndex };
}

function buildOverlapTable(
  slots: readonly Slot[],
): ReadonlyMap<SlotKey, ReadonlyMap<SlotKey, SlotOverlap>> {
  const table = new Map<SlotKey, Map<SlotKey, SlotOverlap>>();

  for (const slot of slots) {
    table.set(toSlotKey(slot), new Map());
  }

  for (const across of slots) {
    if (across.direction !== 'across') {
      continue;
    }

    for (const down of slots) {
      if (down.direction !== 'down') {
        continue;
      }

      const crossing = findCrossing(across, down);
      if (!crossing) {
        continue;
      }

      table.get(toSlotKey(across))?.set(toSlotKey(down), crossing);
      table.get(toSlotKey(down))?.set(toSlotKey(across), {
        firstIndex: crossing.secondIndex,
        secondIndex: crossing.firstIndex,
      });
    }
  }

  return table;
}

/**
 * Derives slots and their crossings from a cell-occupancy matrix where `true`
 * marks a cell that takes a letter. Slots are listed in row-major order of their
 * starting cell, across before down.
 */
export function createPuzzleGeometry(
  cells: CellStructure,
  options: PuzzleGeometryOptions = {},
): PuzzleGeometry {
  const minSlotLength = normalizeMinSlotLength(options.minSlotLength);
  const structure = copyStructure(cells);
  const slots = discoverSlots(structure, minSlotLength);
  const overlapTable = buildOverlapTable(slots);
  const slotsByKey = new Map<SlotKey, Slot>(slots.map((slot) => [toSlotKey(slot), slot]));
  const neighborsByKey = new Map<SlotKey, readonly Slot[]>();

  for (const slot of slots) {
    const overlaps = overlapTable.get(toSlotKey(slot));
    neighborsByKey.set(
      toSlotKey(slot),
      slots.filter((other) => overlaps?.has(toSlotKey(other)) ?? false),
    );
  }

  return {
    height: structure.length,
    width: structure[0]?.length ?? 0,
    cells: structure,
    slots,
    getSlot: (key) => slotsByKey.get(key) ?? null,
    getOverlap: (first, second) =>
      overlapTable.get(toSlotKey(first))?.get(toSlotKey(second)) ?? null,
    getNeighbors: (slot) => {
      const neighbors = neighborsByKey.get(toSlotKey(slot));
      if (!neighbors) {
        throw new PuzzleGeometryDomainError(
          'puzzle-geometry.unknown-slot',
          'Slot is not part of this puzzle geometry.',
          { slot },
        );
      }

      return neighbors;
    },
  };
}
