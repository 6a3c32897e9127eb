/**
 * Grid Index
 *
 * Owns the cell-to-tile mapping of an R×C grid. Every cell references exactly
 * one live tile whose rectangle covers it, and the live tiles cover the grid
 * exactly once.
 *
 * `mergeInto` and `splitOut` are the only structural mutators. Both validate
 * their whole input before writing anything.
 */

import { TileGridError } from './errors';
import type { CellCoord, GridRect, TileId, TileSnapshot } from './types';

/**
 * A rectangular region of the grid. Geometry is mutated in place when the
 * tile is the anchor of a merge or the retained part of a shrink.
 */
export interface Tile {
	readonly id: TileId;
	row: number;
	column: number;
	rowSpan: number;
	columnSpan: number;
	filled: boolean;
}

export interface GridIndex {
	readonly rowCount: number;
	readonly columnCount: number;

	contains(row: number, column: number): boolean;
	containsRect(rect: GridRect): boolean;

	/** Throws `OutOfBounds` outside the grid */
	isFilled(row: number, column: number): boolean;

	/** Throws `OutOfBounds` outside the grid */
	ownerOf(row: number, column: number): TileId;

	/** Throws `OutOfBounds` outside the grid */
	tileAt(row: number, column: number): Tile;

	getTile(id: TileId): Tile | undefined;

	setFilled(id: TileId, filled: boolean): void;

	/**
	 * Reassign the anchor's cells inside `rect` plus `cellsToAbsorb` to the
	 * anchor, which takes `rect` as its geometry. Together they must cover
	 * `rect` exactly; absorbed cells may not belong to another filled tile.
	 * Cells of absorbed tiles that fall outside `rect` go back to unit tiles.
	 */
	mergeInto(anchorId: TileId, rect: GridRect, cellsToAbsorb: readonly CellCoord[]): void;

	/**
	 * Give each listed cell a fresh, unfilled 1×1 tile. Every tile touched
	 * must be split completely, except `retained`, which keeps the cells of
	 * `retained.rect` and takes it as its new geometry.
	 */
	splitOut(cells: readonly CellCoord[], retained?: { tile: TileId; rect: GridRect }): void;

	/** Live tiles, ordered by origin (row-major) */
	tiles(): Tile[];
}

// ============================================================================
// Rectangle helpers
// ============================================================================

/**
 * Cells covered by a rectangle, row-major
 */
export function cellsOf(rect: GridRect): CellCoord[] {
	const cells: CellCoord[] = [];
	for (let r = 0; r < rect.rowSpan; r++) {
		for (let c = 0; c < rect.columnSpan; c++) {
			cells.push({ row: rect.row + r, column: rect.column + c });
		}
	}
	return cells;
}

export function rectContains(rect: GridRect, row: number, column: number): boolean {
	return (
		row >= rect.row &&
		row < rect.row + rect.rowSpan &&
		column >= rect.column &&
		column < rect.column + rect.columnSpan
	);
}

export function rectOf(tile: GridRect): GridRect {
	return { row: tile.row, column: tile.column, rowSpan: tile.rowSpan, columnSpan: tile.columnSpan };
}

export function snapshotTile(tile: Tile): TileSnapshot {
	return { id: tile.id, ...rectOf(tile), filled: tile.filled };
}

export function isValidRect(rect: GridRect): boolean {
	return (
		Number.isInteger(rect.row) &&
		Number.isInteger(rect.column) &&
		Number.isInteger(rect.rowSpan) &&
		Number.isInteger(rect.columnSpan) &&
		rect.rowSpan >= 1 &&
		rect.columnSpan >= 1
	);
}

function formatRect(rect: GridRect): string {
	return `(${rect.row}, ${rect.column}) ${rect.rowSpan}×${rect.columnSpan}`;
}

// ============================================================================
// Grid Index
// ============================================================================

/**
 * Create an index with one unit tile per cell
 */
export function createGridIndex(rowCount: number, columnCount: number): GridIndex {
	if (!Number.isInteger(rowCount) || !Number.isInteger(columnCount) || rowCount < 1 || columnCount < 1) {
		throw new TileGridError('InvalidArgument', `grid dimensions must be positive integers, got ${rowCount}×${columnCount}`);
	}

	const tiles = new Map<TileId, Tile>();
	const owners: TileId[][] = [];
	let nextId: TileId = 1;

	function createUnitTile(row: number, column: number): Tile {
		const tile: Tile = { id: nextId++, row, column, rowSpan: 1, columnSpan: 1, filled: false };
		tiles.set(tile.id, tile);
		return tile;
	}

	for (let r = 0; r < rowCount; r++) {
		const rowOwners: TileId[] = [];
		for (let c = 0; c < columnCount; c++) {
			rowOwners.push(createUnitTile(r, c).id);
		}
		owners.push(rowOwners);
	}

	function contains(row: number, column: number): boolean {
		return (
			Number.isInteger(row) &&
			Number.isInteger(column) &&
			row >= 0 &&
			row < rowCount &&
			column >= 0 &&
			column < columnCount
		);
	}

	function containsRect(rect: GridRect): boolean {
		return (
			isValidRect(rect) &&
			rect.row >= 0 &&
			rect.column >= 0 &&
			rect.row + rect.rowSpan <= rowCount &&
			rect.column + rect.columnSpan <= columnCount
		);
	}

	function assertCell(row: number, column: number): void {
		if (!contains(row, column)) {
			throw new TileGridError(
				'OutOfBounds',
				`cell (${row}, ${column}) is outside the ${rowCount}×${columnCount} grid`,
				{ row, column },
			);
		}
	}

	function assertRect(rect: GridRect): void {
		if (!isValidRect(rect)) {
			throw new TileGridError('InvalidArgument', `invalid rectangle ${formatRect(rect)}`);
		}
		if (!containsRect(rect)) {
			throw new TileGridError('OutOfBounds', `rectangle ${formatRect(rect)} leaves the ${rowCount}×${columnCount} grid`, { ...rect });
		}
	}

	function ownerIdAt(row: number, column: number): TileId {
		// contains() was checked by the caller
		return owners[row]![column]!;
	}

	function requireTile(id: TileId): Tile {
		const tile = tiles.get(id);
		if (!tile) {
			throw new TileGridError('InvalidArgument', `tile ${id} is not live`, { tileId: id });
		}
		return tile;
	}

	function key(row: number, column: number): number {
		return row * columnCount + column;
	}

	const index: GridIndex = {
		get rowCount() {
			return rowCount;
		},
		get columnCount() {
			return columnCount;
		},

		contains,
		containsRect,

		isFilled(row: number, column: number): boolean {
			return index.tileAt(row, column).filled;
		},

		ownerOf(row: number, column: number): TileId {
			assertCell(row, column);
			return ownerIdAt(row, column);
		},

		tileAt(row: number, column: number): Tile {
			assertCell(row, column);
			return requireTile(ownerIdAt(row, column));
		},

		getTile(id: TileId): Tile | undefined {
			return tiles.get(id);
		},

		setFilled(id: TileId, filled: boolean): void {
			requireTile(id).filled = filled;
		},

		mergeInto(anchorId: TileId, rect: GridRect, cellsToAbsorb: readonly CellCoord[]): void {
			const anchor = requireTile(anchorId);
			assertRect(rect);

			// Validate everything before writing
			const covered = new Set<number>();
			const touched = new Map<TileId, Tile>([[anchor.id, anchor]]);
			for (const cell of cellsToAbsorb) {
				assertCell(cell.row, cell.column);
				if (!rectContains(rect, cell.row, cell.column)) {
					throw new TileGridError(
						'InvalidArgument',
						`cell (${cell.row}, ${cell.column}) lies outside merge target ${formatRect(rect)}`,
					);
				}
				const owner = requireTile(ownerIdAt(cell.row, cell.column));
				if (owner.id !== anchor.id && owner.filled) {
					throw new TileGridError('AreaOccupied', `cell (${cell.row}, ${cell.column}) belongs to a filled tile`, {
						row: cell.row,
						column: cell.column,
					});
				}
				touched.set(owner.id, owner);
				covered.add(key(cell.row, cell.column));
			}
			for (const cell of cellsOf(anchor)) {
				if (rectContains(rect, cell.row, cell.column)) {
					covered.add(key(cell.row, cell.column));
				}
			}
			if (covered.size !== rect.rowSpan * rect.columnSpan) {
				throw new TileGridError('InvalidArgument', `merge does not cover ${formatRect(rect)}`);
			}

			// Leftovers of touched tiles that fall outside the new rectangle
			const leftovers: CellCoord[] = [];
			for (const tile of touched.values()) {
				for (const cell of cellsOf(tile)) {
					if (!rectContains(rect, cell.row, cell.column)) {
						leftovers.push(cell);
					}
				}
			}

			for (const cell of cellsOf(rect)) {
				owners[cell.row]![cell.column] = anchor.id;
			}
			for (const cell of leftovers) {
				owners[cell.row]![cell.column] = createUnitTile(cell.row, cell.column).id;
			}
			for (const tile of touched.values()) {
				if (tile.id !== anchor.id) {
					tiles.delete(tile.id);
				}
			}

			anchor.row = rect.row;
			anchor.column = rect.column;
			anchor.rowSpan = rect.rowSpan;
			anchor.columnSpan = rect.columnSpan;
		},

		splitOut(cells: readonly CellCoord[], retained?: { tile: TileId; rect: GridRect }): void {
			const released = new Set<number>();
			const unique: CellCoord[] = [];
			const touched = new Map<TileId, Tile>();
			for (const cell of cells) {
				assertCell(cell.row, cell.column);
				const cellKey = key(cell.row, cell.column);
				if (released.has(cellKey)) {
					continue;
				}
				released.add(cellKey);
				unique.push(cell);
				const owner = requireTile(ownerIdAt(cell.row, cell.column));
				touched.set(owner.id, owner);
			}

			const kept = retained ? requireTile(retained.tile) : undefined;
			if (retained && kept) {
				touched.set(kept.id, kept);
				assertRect(retained.rect);
				for (const cell of cellsOf(retained.rect)) {
					if (!rectContains(kept, cell.row, cell.column) || released.has(key(cell.row, cell.column))) {
						throw new TileGridError(
							'InvalidArgument',
							`retained rectangle ${formatRect(retained.rect)} does not fit inside tile ${kept.id} minus the released cells`,
						);
					}
				}
			}

			for (const tile of touched.values()) {
				for (const cell of cellsOf(tile)) {
					const isReleased = released.has(key(cell.row, cell.column));
					const isRetained = retained !== undefined && tile.id === retained.tile && rectContains(retained.rect, cell.row, cell.column);
					if (!isReleased && !isRetained) {
						throw new TileGridError(
							'InvalidArgument',
							`split leaves cell (${cell.row}, ${cell.column}) of tile ${formatRect(tile)} without a valid owner`,
						);
					}
				}
			}

			for (const cell of unique) {
				owners[cell.row]![cell.column] = createUnitTile(cell.row, cell.column).id;
			}
			for (const tile of touched.values()) {
				if (tile !== kept) {
					tiles.delete(tile.id);
				}
			}

			if (retained && kept) {
				kept.row = retained.rect.row;
				kept.column = retained.rect.column;
				kept.rowSpan = retained.rect.rowSpan;
				kept.columnSpan = retained.rect.columnSpan;
			}
		},

		tiles(): Tile[] {
			return Array.from(tiles.values()).sort((a, b) => a.row - b.row || a.column - b.column);
		},
	};

	return index;
}

/**
 * Check the partition invariant
 * @returns Human-readable violations, empty when the grid is an exact partition
 */
export function findPartitionViolations(index: GridIndex): string[] {
	const violations: string[] = [];
	let coveredCells = 0;

	for (const tile of index.tiles()) {
		if (!index.containsRect(tile)) {
			violations.push(`tile ${tile.id} ${formatRect(tile)} leaves the grid`);
			continue;
		}
		coveredCells += tile.rowSpan * tile.columnSpan;
		for (const cell of cellsOf(tile)) {
			const owner = index.ownerOf(cell.row, cell.column);
			if (owner !== tile.id) {
				violations.push(`cell (${cell.row}, ${cell.column}) inside tile ${tile.id} is owned by tile ${owner}`);
			}
		}
	}

	const totalCells = index.rowCount * index.columnCount;
	if (coveredCells !== totalCells) {
		violations.push(`tiles cover ${coveredCells} cells, grid has ${totalCells}`);
	}

	for (let r = 0; r < index.rowCount; r++) {
		for (let c = 0; c < index.columnCount; c++) {
			const tile = index.getTile(index.ownerOf(r, c));
			if (!tile) {
				violations.push(`cell (${r}, ${c}) references a discarded tile`);
			} else if (!rectContains(tile, r, c)) {
				violations.push(`cell (${r}, ${c}) is owned by tile ${tile.id} ${formatRect(tile)} which does not cover it`);
			}
		}
	}

	return violations;
}
