/**
 * @fileoverview Field of view - symmetric shadowcasting
 *
 * Scans the eight octants around the origin row by row, carrying the lit
 * sector as a pair of exact rational slopes. Sight-blocking cells end the
 * sector behind them and are themselves revealed whenever the sector touches
 * them; open cells are revealed only when their centre lies inside the
 * sector, which makes visibility between open cells symmetric.
 *
 * @module domain/simulation/navigation/FieldOfView
 */

import { DistanceMetric } from "@/shared/constants/TerrainEnums";
import type { GridPosition } from "@/shared/types/grid";
import { positionKey } from "@/shared/utils/mathUtils";
import type { OpacityGrid } from "@/domain/types/world";

/**
 * Set of visible cells keyed by coordinate.
 */
export class VisibleSet implements Iterable<GridPosition> {
  private readonly cells = new Map<string, GridPosition>();

  public add(position: GridPosition): void {
    this.cells.set(positionKey(position), { x: position.x, y: position.y });
  }

  public has(position: GridPosition): boolean {
    return this.cells.has(positionKey(position));
  }

  public get size(): number {
    return this.cells.size;
  }

  public [Symbol.iterator](): Iterator<GridPosition> {
    return this.cells.values();
  }
}

interface Slope {
  readonly num: number;
  readonly den: number;
}

/**
 * Maps (depth, column) inside an octant back to a grid offset.
 */
interface Octant {
  readonly depthX: number;
  readonly depthY: number;
  readonly colX: number;
  readonly colY: number;
}

const OCTANTS: readonly Octant[] = [
  { depthX: 0, depthY: -1, colX: 1, colY: 0 },
  { depthX: 0, depthY: -1, colX: -1, colY: 0 },
  { depthX: 0, depthY: 1, colX: 1, colY: 0 },
  { depthX: 0, depthY: 1, colX: -1, colY: 0 },
  { depthX: 1, depthY: 0, colX: 0, colY: 1 },
  { depthX: 1, depthY: 0, colX: 0, colY: -1 },
  { depthX: -1, depthY: 0, colX: 0, colY: 1 },
  { depthX: -1, depthY: 0, colX: 0, colY: -1 },
];

interface ScanState {
  readonly grid: OpacityGrid;
  readonly origin: GridPosition;
  readonly range: number;
  readonly metric: DistanceMetric;
  readonly octant: Octant;
  readonly visible: VisibleSet;
}

/** floor(depth * slope + 1/2) */
function roundTiesUp(depth: number, slope: Slope): number {
  return Math.floor((2 * depth * slope.num + slope.den) / (2 * slope.den));
}

/** ceil(depth * slope - 1/2) */
function roundTiesDown(depth: number, slope: Slope): number {
  return Math.ceil((2 * depth * slope.num - slope.den) / (2 * slope.den));
}

/** Slope of the edge a column shares with the previous one */
function edgeSlope(depth: number, col: number): Slope {
  return { num: 2 * col - 1, den: 2 * depth };
}

function isCentreInSector(
  depth: number,
  col: number,
  start: Slope,
  end: Slope,
): boolean {
  return col * start.den >= depth * start.num && col * end.den <= depth * end.num;
}

function toGrid(state: ScanState, depth: number, col: number): GridPosition {
  const { origin, octant } = state;
  return {
    x: origin.x + depth * octant.depthX + col * octant.colX,
    y: origin.y + depth * octant.depthY + col * octant.colY,
  };
}

function isInRange(state: ScanState, depth: number, col: number): boolean {
  if (state.metric === DistanceMetric.CHEBYSHEV) {
    return depth <= state.range;
  }
  return depth * depth + col * col <= state.range * state.range;
}

function scanRow(
  state: ScanState,
  depth: number,
  startSlope: Slope,
  endSlope: Slope,
): void {
  if (depth > state.range) return;

  let start = startSlope;
  let previousBlocked: boolean | undefined;
  const minCol = roundTiesUp(depth, start);
  const maxCol = roundTiesDown(depth, endSlope);

  for (let col = minCol; col <= maxCol; col++) {
    const position = toGrid(state, depth, col);
    const inBounds = state.grid.isInBounds(position);
    const blocked = !inBounds || state.grid.blocksSight(position);

    if (
      inBounds &&
      (blocked || isCentreInSector(depth, col, start, endSlope)) &&
      isInRange(state, depth, col)
    ) {
      state.visible.add(position);
    }

    if (previousBlocked === true && !blocked) {
      start = edgeSlope(depth, col);
    }
    if (previousBlocked === false && blocked) {
      scanRow(state, depth + 1, start, edgeSlope(depth, col));
    }
    previousBlocked = blocked;
  }

  if (previousBlocked === false) {
    scanRow(state, depth + 1, start, endSlope);
  }
}

/**
 * Computes every cell visible from `origin` within `range`.
 *
 * The origin is always visible. Out-of-bounds cells block sight and are never
 * returned. Cost is O(range²) and the function has no side effects.
 */
export function computeVisible(
  grid: OpacityGrid,
  origin: GridPosition,
  range: number,
  metric: DistanceMetric = DistanceMetric.EUCLIDEAN,
): VisibleSet {
  const visible = new VisibleSet();
  visible.add(origin);
  if (range < 1) return visible;

  for (const octant of OCTANTS) {
    scanRow(
      { grid, origin, range, metric, octant, visible },
      1,
      { num: 0, den: 1 },
      { num: 1, den: 1 },
    );
  }
  return visible;
}
