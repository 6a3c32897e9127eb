/**
 * Placement Engine
 *
 * Places, removes and moves items on top of the grid index. An item always
 * owns exactly one filled tile; placing merges the covered cells into that
 * tile and removing splits it back into unit tiles.
 */

import { TileGridError } from './errors';
import {
	cellsOf,
	isValidRect,
	rectOf,
	snapshotTile,
	type GridIndex,
	type Tile,
} from './grid-index';
import type { ItemRegistry } from './registry';
import type { CellCoord, GridRect, ItemRectDetail, TileSnapshot } from './types';

export interface HardSplitResult<T> {
	/** The unit tile now at the requested cell */
	tile: TileSnapshot;
	/** Items whose tiles were split apart, with the rectangles they occupied */
	released: ItemRectDetail<T>[];
}

export interface PlacementEngine<T> {
	/** False when the rectangle leaves the grid or covers a filled tile */
	isAreaEmpty(row: number, column: number, rowSpan: number, columnSpan: number): boolean;
	place(item: T, row: number, column: number, rowSpan?: number, columnSpan?: number): GridRect;
	/** @returns The rectangle the item occupied */
	remove(item: T): GridRect;
	/** Relocate an item, keeping its span. The target may overlap the item's own tile. */
	move(item: T, row: number, column: number): GridRect;
	/** Whether `move` would succeed */
	canMove(item: T, row: number, column: number): boolean;
	/**
	 * Split every listed cell into a fresh unit tile. The list must include
	 * `(row, column)` and cover each tile it touches completely.
	 */
	hardSplit(row: number, column: number, cells: readonly CellCoord[]): HardSplitResult<T>;
}

export function createPlacementEngine<T>(index: GridIndex, registry: ItemRegistry<T>): PlacementEngine<T> {
	function requireItemTile(item: T): Tile {
		const tileId = registry.tileOf(item);
		const tile = tileId === undefined ? undefined : index.getTile(tileId);
		if (!tile) {
			throw new TileGridError('UnknownItem', 'item is not placed on this grid', { item });
		}
		return tile;
	}

	function assertPlaceable(rect: GridRect): void {
		if (!isValidRect(rect)) {
			throw new TileGridError(
				'InvalidArgument',
				`spans must be positive integers, got ${rect.rowSpan}×${rect.columnSpan} at (${rect.row}, ${rect.column})`,
			);
		}
		if (!index.containsRect(rect)) {
			throw new TileGridError(
				'OutOfBounds',
				`area (${rect.row}, ${rect.column}) ${rect.rowSpan}×${rect.columnSpan} leaves the ${index.rowCount}×${index.columnCount} grid`,
				{ ...rect },
			);
		}
	}

	/**
	 * First cell of `target` held by a filled tile other than `tile`
	 */
	function findBlockedCell(tile: Tile, target: GridRect): CellCoord | undefined {
		return cellsOf(target).find((cell) => {
			const owner = index.tileAt(cell.row, cell.column);
			return owner.id !== tile.id && owner.filled;
		});
	}

	/**
	 * Collapse the cells of `rect` into the tile at its origin and mark it filled
	 */
	function occupy(rect: GridRect): Tile {
		const anchor = index.tileAt(rect.row, rect.column);
		const alreadyShaped =
			anchor.row === rect.row &&
			anchor.column === rect.column &&
			anchor.rowSpan === rect.rowSpan &&
			anchor.columnSpan === rect.columnSpan;
		if (!alreadyShaped) {
			index.mergeInto(anchor.id, rect, cellsOf(rect));
		}
		index.setFilled(anchor.id, true);
		return anchor;
	}

	const engine: PlacementEngine<T> = {
		isAreaEmpty(row: number, column: number, rowSpan: number, columnSpan: number): boolean {
			const rect = { row, column, rowSpan, columnSpan };
			if (!index.containsRect(rect)) {
				return false;
			}
			return cellsOf(rect).every((cell) => !index.isFilled(cell.row, cell.column));
		},

		place(item: T, row: number, column: number, rowSpan = 1, columnSpan = 1): GridRect {
			if (registry.has(item)) {
				throw new TileGridError('DuplicateItem', 'item is already placed on this grid', { item });
			}
			const rect = { row, column, rowSpan, columnSpan };
			assertPlaceable(rect);
			if (!engine.isAreaEmpty(row, column, rowSpan, columnSpan)) {
				throw new TileGridError(
					'AreaOccupied',
					`area (${row}, ${column}) ${rowSpan}×${columnSpan} overlaps a filled tile`,
					{ ...rect },
				);
			}

			const tile = occupy(rect);
			registry.bind(item, tile.id);
			return rectOf(tile);
		},

		remove(item: T): GridRect {
			const tile = requireItemTile(item);
			const rect = rectOf(tile);
			engine.hardSplit(rect.row, rect.column, cellsOf(rect));
			return rect;
		},

		move(item: T, row: number, column: number): GridRect {
			const tile = requireItemTile(item);
			const target = { row, column, rowSpan: tile.rowSpan, columnSpan: tile.columnSpan };
			assertPlaceable(target);

			const blocked = findBlockedCell(tile, target);
			if (blocked) {
				throw new TileGridError(
					'AreaOccupied',
					`cell (${blocked.row}, ${blocked.column}) of the move target belongs to a filled tile`,
					{ ...target },
				);
			}
			if (tile.row === row && tile.column === column) {
				return rectOf(tile);
			}

			index.splitOut(cellsOf(tile));
			const moved = occupy(target);
			registry.rebind(item, moved.id);
			return rectOf(moved);
		},

		canMove(item: T, row: number, column: number): boolean {
			const tile = requireItemTile(item);
			const target = { row, column, rowSpan: tile.rowSpan, columnSpan: tile.columnSpan };
			return index.containsRect(target) && findBlockedCell(tile, target) === undefined;
		},

		hardSplit(row: number, column: number, cells: readonly CellCoord[]): HardSplitResult<T> {
			if (!cells.some((cell) => cell.row === row && cell.column === column)) {
				throw new TileGridError('InvalidArgument', `cells to split must include (${row}, ${column})`);
			}

			const released: ItemRectDetail<T>[] = [];
			const seen = new Set<Tile>();
			for (const cell of cells) {
				const tile = index.tileAt(cell.row, cell.column);
				if (seen.has(tile)) continue;
				seen.add(tile);
				const item = tile.filled ? registry.itemOf(tile.id) : undefined;
				if (item !== undefined) {
					released.push({ item, rect: rectOf(tile) });
				}
			}

			// splitOut rejects partial splits before touching anything
			index.splitOut(cells);
			for (const { item } of released) {
				registry.unbind(item);
			}

			return { tile: snapshotTile(index.tileAt(row, column)), released };
		},
	};

	return engine;
}

