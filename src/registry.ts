import { TileGridError } from './errors';
import type { TileId } from './types';

/**
 * Bidirectional item ↔ tile lookup. Items are opaque handles compared by
 * identity (`Map` key semantics).
 */
export interface ItemRegistry<T> {
	readonly size: number;
	has(item: T): boolean;
	bind(item: T, tile: TileId): void;
	/** Point an already-bound item at another tile, keeping its position in `items()` */
	rebind(item: T, tile: TileId): void;
	unbind(item: T): TileId;
	tileOf(item: T): TileId | undefined;
	itemOf(tile: TileId): T | undefined;
	/** Bound items in the order they were first bound */
	items(): T[];
}

export function createItemRegistry<T>(): ItemRegistry<T> {
	const tileByItem = new Map<T, TileId>();
	const itemByTile = new Map<TileId, T>();

	function requireTile(item: T): TileId {
		const tile = tileByItem.get(item);
		if (tile === undefined) {
			throw new TileGridError('UnknownItem', 'item is not placed on this grid', { item });
		}
		return tile;
	}

	return {
		get size() {
			return tileByItem.size;
		},

		has(item: T): boolean {
			return tileByItem.has(item);
		},

		bind(item: T, tile: TileId): void {
			if (tileByItem.has(item)) {
				throw new TileGridError('DuplicateItem', 'item is already placed on this grid', { item });
			}
			tileByItem.set(item, tile);
			itemByTile.set(tile, item);
		},

		rebind(item: T, tile: TileId): void {
			const previous = requireTile(item);
			itemByTile.delete(previous);
			tileByItem.set(item, tile);
			itemByTile.set(tile, item);
		},

		unbind(item: T): TileId {
			const tile = requireTile(item);
			tileByItem.delete(item);
			itemByTile.delete(tile);
			return tile;
		},

		tileOf(item: T): TileId | undefined {
			return tileByItem.get(item);
		},

		itemOf(tile: TileId): T | undefined {
			return itemByTile.get(tile);
		},

		items(): T[] {
			return Array.from(tileByItem.keys());
		},
	};
}
