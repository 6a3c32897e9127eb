/**
 * Directional Resize Resolver
 *
 * A resize moves one edge of a tile. Positive units push the edge outward,
 * negative units pull it inward; the opposite edge never moves.
 *
 * Requested → Bounded → Resolved:
 * - growth is clamped to the grid boundary, then scanned strip by strip and
 *   stops before the first strip that touches a filled tile
 * - shrink is clamped so the span never drops below 1, and sheds the strips
 *   nearest the moving edge
 *
 * Planning never mutates the grid; `applyResizePlan` performs the single
 * structural change.
 */

import { TileGridError } from './errors';
import { rectOf, type GridIndex } from './grid-index';
import type { CellCoord, Direction, GridRect, ResizePlan, TileId } from './types';

export const DIRECTIONS: readonly Direction[] = ['north', 'south', 'east', 'west'];

export function isDirection(value: unknown): value is Direction {
	return DIRECTIONS.some((direction) => direction === value);
}

/**
 * Convert a unit vector into a direction. `dx` runs along columns, `dy` along rows.
 */
export function directionFromVector(dx: number, dy: number): Direction {
	if (dx === 0 && dy === -1) return 'north';
	if (dx === 0 && dy === 1) return 'south';
	if (dx === 1 && dy === 0) return 'east';
	if (dx === -1 && dy === 0) return 'west';
	throw new TileGridError('InvalidArgument', `(${dx}, ${dy}) is not a unit direction vector`, { dx, dy });
}

/**
 * Convert a signed coordinate-space displacement of an edge into resize units.
 * Moving the west edge by -2 columns grows the tile by 2; moving the south
 * edge by -1 row shrinks it by 1.
 */
export function edgeOffsetToUnits(direction: Direction, offset: number): number {
	const units = direction === 'north' || direction === 'west' ? -offset : offset;
	// Avoid -0 leaking out for a zero offset
	return units === 0 ? 0 : units;
}

// ============================================================================
// Edge handlers
// ============================================================================

interface EdgeHandler {
	/** Span along the axis the edge moves on */
	span(rect: GridRect): number;
	/** Free distance between the edge and the grid boundary */
	room(rect: GridRect, index: GridIndex): number;
	/** The `step`-th strip outside the edge (0 = adjacent) */
	outerStrip(rect: GridRect, step: number): CellCoord[];
	/** The `step`-th strip inside the edge (0 = the edge strip itself) */
	innerStrip(rect: GridRect, step: number): CellCoord[];
	/** Rectangle after moving the edge outward by `units` (negative moves it inward) */
	extend(rect: GridRect, units: number): GridRect;
}

function rowStrip(row: number, rect: GridRect): CellCoord[] {
	const cells: CellCoord[] = [];
	for (let c = 0; c < rect.columnSpan; c++) {
		cells.push({ row, column: rect.column + c });
	}
	return cells;
}

function columnStrip(column: number, rect: GridRect): CellCoord[] {
	const cells: CellCoord[] = [];
	for (let r = 0; r < rect.rowSpan; r++) {
		cells.push({ row: rect.row + r, column });
	}
	return cells;
}

const EDGES: Record<Direction, EdgeHandler> = {
	north: {
		span: (rect) => rect.rowSpan,
		room: (rect) => rect.row,
		outerStrip: (rect, step) => rowStrip(rect.row - 1 - step, rect),
		innerStrip: (rect, step) => rowStrip(rect.row + step, rect),
		extend: (rect, units) => ({ ...rect, row: rect.row - units, rowSpan: rect.rowSpan + units }),
	},
	south: {
		span: (rect) => rect.rowSpan,
		room: (rect, index) => index.rowCount - rect.row - rect.rowSpan,
		outerStrip: (rect, step) => rowStrip(rect.row + rect.rowSpan + step, rect),
		innerStrip: (rect, step) => rowStrip(rect.row + rect.rowSpan - 1 - step, rect),
		extend: (rect, units) => ({ ...rect, rowSpan: rect.rowSpan + units }),
	},
	east: {
		span: (rect) => rect.columnSpan,
		room: (rect, index) => index.columnCount - rect.column - rect.columnSpan,
		outerStrip: (rect, step) => columnStrip(rect.column + rect.columnSpan + step, rect),
		innerStrip: (rect, step) => columnStrip(rect.column + rect.columnSpan - 1 - step, rect),
		extend: (rect, units) => ({ ...rect, columnSpan: rect.columnSpan + units }),
	},
	west: {
		span: (rect) => rect.columnSpan,
		room: (rect) => rect.column,
		outerStrip: (rect, step) => columnStrip(rect.column - 1 - step, rect),
		innerStrip: (rect, step) => columnStrip(rect.column + step, rect),
		extend: (rect, units) => ({ ...rect, column: rect.column - units, columnSpan: rect.columnSpan + units }),
	},
};

// ============================================================================
// Planning
// ============================================================================

function resolveGrowth(index: GridIndex, rect: GridRect, edge: EdgeHandler, requested: number) {
	const bounded = Math.min(requested, edge.room(rect, index));
	const cells: CellCoord[] = [];
	let granted = 0;

	for (let step = 0; step < bounded; step++) {
		const strip = edge.outerStrip(rect, step);
		if (strip.some((cell) => index.isFilled(cell.row, cell.column))) {
			break;
		}
		cells.push(...strip);
		granted++;
	}

	return { bounded, granted, cells };
}

function resolveShrink(rect: GridRect, edge: EdgeHandler, requested: number) {
	const bounded = Math.min(requested, edge.span(rect) - 1);
	const cells: CellCoord[] = [];
	for (let step = 0; step < bounded; step++) {
		cells.push(...edge.innerStrip(rect, step));
	}
	return { bounded, granted: bounded, cells };
}

/**
 * Work out what a resize request can actually do, without changing the grid
 */
export function planResize(index: GridIndex, tileId: TileId, direction: Direction, units: number): ResizePlan {
	if (!isDirection(direction)) {
		throw new TileGridError('InvalidArgument', `unknown direction ${String(direction)}`);
	}
	if (!Number.isInteger(units)) {
		throw new TileGridError('InvalidArgument', `resize units must be an integer, got ${units}`);
	}
	const tile = index.getTile(tileId);
	if (!tile) {
		throw new TileGridError('InvalidArgument', `tile ${tileId} is not live`, { tileId });
	}

	const rect = rectOf(tile);
	const edge = EDGES[direction];
	const growing = units > 0;
	const { bounded, granted, cells } = growing
		? resolveGrowth(index, rect, edge, units)
		: resolveShrink(rect, edge, Math.abs(units));

	if (granted === 0) {
		return { tileId, direction, kind: 'none', requested: units, bounded, granted: 0, cells: [], rect };
	}

	return {
		tileId,
		direction,
		kind: growing ? 'grow' : 'shrink',
		requested: units,
		bounded,
		granted,
		cells,
		rect: edge.extend(rect, growing ? granted : -granted),
	};
}

/**
 * Apply a plan produced by `planResize` against the same, unchanged grid
 */
export function applyResizePlan(index: GridIndex, plan: ResizePlan): void {
	switch (plan.kind) {
		case 'grow':
			index.mergeInto(plan.tileId, plan.rect, plan.cells);
			break;
		case 'shrink':
			index.splitOut(plan.cells, { tile: plan.tileId, rect: plan.rect });
			break;
		case 'none':
			break;
	}
}

/**
 * Plan and apply in one step
 */
export function resizeTile(index: GridIndex, tileId: TileId, direction: Direction, units: number): ResizePlan {
	const plan = planResize(index, tileId, direction, units);
	applyResizePlan(index, plan);
	return plan;
}
