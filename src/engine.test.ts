/**
 * Tests for the tile grid facade: the public operations, events, display
 * values and interaction sessions, plus a seeded random walk that checks
 * the partition after every step.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { createTileGrid } from './engine';
import { TileGridError, type TileGridErrorCode } from './errors';
import { cellsOf } from './grid-index';
import { DIRECTIONS } from './resize';
import type { ItemRectDetail } from './types';

// ============================================================================
// Test Helpers
// ============================================================================

function errorCode(fn: () => unknown): TileGridErrorCode | 'none' | 'other' {
	try {
		fn();
	} catch (error) {
		return error instanceof TileGridError ? error.code : 'other';
	}
	return 'none';
}

/**
 * Small deterministic PRNG so the random walk is reproducible
 */
function mulberry32(seed: number): () => number {
	let a = seed;
	return () => {
		a = (a + 0x6d2b79f5) | 0;
		let t = Math.imul(a ^ (a >>> 15), 1 | a);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

afterEach(() => {
	vi.restoreAllMocks();
});

// ============================================================================
// Configuration and display values
// ============================================================================

describe('createTileGrid', () => {
	it('applies display defaults', () => {
		const grid = createTileGrid<string>({ rowCount: 6, columnCount: 4 });

		expect(grid.rowCount).toBe(6);
		expect(grid.columnCount).toBe(4);
		expect(grid.rowMinimumHeight()).toBe(100);
		expect(grid.columnMinimumWidth()).toBe(150);
		expect(grid.verticalSpacing()).toBe(5);
		expect(grid.horizontalSpacing()).toBe(5);
		expect(grid.dragAndDropEnabled).toBe(true);
		expect(grid.resizingEnabled).toBe(true);
		expect(grid.tiles()).toHaveLength(24);
	});

	it('rejects invalid dimensions', () => {
		expect(() => createTileGrid({ rowCount: 0, columnCount: 4 })).toThrow(ZodError);
		expect(() => createTileGrid({ rowCount: 2, columnCount: 2.5 })).toThrow(ZodError);
	});

	it('computes pixel rectangles from unit spans and spacing', () => {
		const grid = createTileGrid<string>({ rowCount: 6, columnCount: 4 });
		grid.place('B', 4, 1, 2, 2);

		expect(grid.tilePixelRect(5, 2)).toEqual({ x: 155, y: 420, width: 305, height: 205 });
		expect(grid.tilePixelRect(0, 0)).toEqual({ x: 0, y: 0, width: 150, height: 100 });
	});

	it('validates and announces display changes', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2, verticalSpacing: 0 });
		const changes: unknown[] = [];
		grid.on('geometry-change', (detail) => changes.push(detail));

		grid.setVerticalSpacing(8);
		grid.setColumnWidth(40);

		expect(changes).toEqual([
			{ rowHeight: 100, columnWidth: 150, verticalSpacing: 8, horizontalSpacing: 5 },
			{ rowHeight: 100, columnWidth: 40, verticalSpacing: 8, horizontalSpacing: 5 },
		]);
		expect(() => grid.setHorizontalSpacing(-1)).toThrow(ZodError);
		expect(() => grid.setRowHeight(0)).toThrow(ZodError);
		expect(grid.horizontalSpacing()).toBe(5);
		expect(changes).toHaveLength(2);
	});
});

// ============================================================================
// Operations
// ============================================================================

describe('operations', () => {
	it('builds the demo layout', () => {
		const grid = createTileGrid<string>({ rowCount: 6, columnCount: 4, rowHeight: 100, columnWidth: 150 });
		for (let row = 0; row < 4; row++) {
			for (let column = 0; column < 4; column++) {
				grid.place(`label-${row}-${column}`, row, column);
			}
		}
		grid.place('big', 4, 1, 2, 2);
		grid.place('last', 5, 0, 1, 1);
		grid.remove('last');

		expect(grid.items()).toHaveLength(17);
		expect(grid.items().at(-1)).toBe('big');
		expect(grid.tileRect(5, 1)).toEqual({ row: 4, column: 1, rowSpan: 2, columnSpan: 2 });
		expect(grid.isAreaEmpty(4, 0, 2, 1)).toBe(true);
		expect(grid.validate()).toEqual([]);
	});

	it('finds items by cell and cells by item', () => {
		const grid = createTileGrid<string>({ rowCount: 3, columnCount: 3 });
		grid.place('block', 1, 1, 2, 2);

		expect(grid.itemAt(2, 2)).toBe('block');
		expect(grid.itemAt(0, 0)).toBeUndefined();
		expect(grid.tileOf('block')).toEqual({ row: 1, column: 1, rowSpan: 2, columnSpan: 2 });
		expect(grid.tileOf('ghost')).toBeUndefined();
		expect(grid.tileAt(1, 2)).toMatchObject({ row: 1, column: 1, filled: true });
		expect(errorCode(() => grid.itemAt(3, 0))).toBe('OutOfBounds');
	});

	it('resizes by cell and by item', () => {
		const grid = createTileGrid<string>({ rowCount: 4, columnCount: 4 });
		grid.place('block', 0, 0, 2, 2);

		// Any cell of the tile addresses it
		expect(grid.resizeTile(1, 1, 'south', 1).rect).toEqual({ row: 0, column: 0, rowSpan: 3, columnSpan: 2 });
		expect(grid.resizeItem('block', 'east', -1).rect).toEqual({ row: 0, column: 0, rowSpan: 3, columnSpan: 1 });
		expect(errorCode(() => grid.resizeItem('ghost', 'east', 1))).toBe('UnknownItem');
		expect(grid.validate()).toEqual([]);
	});

	it('unbinds items whose tiles are hard split', () => {
		const grid = createTileGrid<string>({ rowCount: 3, columnCount: 3 });
		grid.place('block', 0, 0, 1, 2);
		const removed: ItemRectDetail<string>[] = [];
		grid.on('removed', (detail) => removed.push(detail));

		const tile = grid.hardSplit(0, 1, [
			{ row: 0, column: 0 },
			{ row: 0, column: 1 },
		]);

		expect(tile).toMatchObject({ row: 0, column: 1, rowSpan: 1, columnSpan: 1, filled: false });
		expect(removed).toEqual([{ item: 'block', rect: { row: 0, column: 0, rowSpan: 1, columnSpan: 2 } }]);
		expect(grid.items()).toEqual([]);
		expect(grid.validate()).toEqual([]);
	});

	it('keeps the partition when a hard split repeats a cell', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });

		grid.hardSplit(0, 0, [
			{ row: 0, column: 0 },
			{ row: 0, column: 0 },
		]);

		expect(grid.tiles()).toHaveLength(4);
		expect(grid.validate()).toEqual([]);
	});
});

// ============================================================================
// Events
// ============================================================================

describe('events', () => {
	it('reports placement, resize, move and removal', () => {
		const grid = createTileGrid<string>({ rowCount: 4, columnCount: 4 });
		const log: string[] = [];
		grid.on('placed', ({ item, rect }) => log.push(`placed ${item} ${rect.rowSpan}x${rect.columnSpan}`));
		grid.on('resized', ({ item, rect }) => log.push(`resized ${item} ${rect.rowSpan}x${rect.columnSpan}`));
		grid.on('moved', ({ item, rect }) => log.push(`moved ${item} ${rect.row},${rect.column}`));
		grid.on('removed', ({ item }) => log.push(`removed ${item}`));

		grid.place('a', 0, 0);
		grid.resizeItem('a', 'east', 2);
		grid.move('a', 2, 1);
		grid.remove('a');

		expect(log).toEqual(['placed a 1x1', 'resized a 1x3', 'moved a 2,1', 'removed a']);
	});

	it('stays silent when a resize grants nothing', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		grid.place('left', 0, 0);
		grid.place('right', 0, 1);
		const listener = vi.fn();
		grid.on('resized', listener);

		expect(grid.resizeItem('left', 'east', 1).granted).toBe(0);
		expect(listener).not.toHaveBeenCalled();
	});

	it('stops delivering after unsubscribe', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		const listener = vi.fn();
		const unsubscribe = grid.on('placed', listener);

		grid.place('a', 0, 0);
		unsubscribe();
		grid.place('b', 1, 1);

		expect(listener).toHaveBeenCalledTimes(1);
	});

	it('hands listeners a copy of the returned rectangle', () => {
		const grid = createTileGrid<string>({ rowCount: 4, columnCount: 4 });
		const stretch = ({ rect }: ItemRectDetail<string>) => {
			rect.rowSpan = 9;
		};
		grid.on('placed', stretch);
		grid.on('resized', stretch);
		grid.on('moved', stretch);

		expect(grid.place('a', 0, 0)).toEqual({ row: 0, column: 0, rowSpan: 1, columnSpan: 1 });
		expect(grid.resizeItem('a', 'east', 1).rect).toEqual({ row: 0, column: 0, rowSpan: 1, columnSpan: 2 });
		expect(grid.move('a', 1, 0)).toEqual({ row: 1, column: 0, rowSpan: 1, columnSpan: 2 });
		expect(grid.tileOf('a')).toEqual({ row: 1, column: 0, rowSpan: 1, columnSpan: 2 });
	});

	it('ends every released session before a listener can throw', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		grid.place('a', 0, 0);
		grid.place('b', 0, 1);
		grid.startDrag('b');
		grid.on('removed', () => {
			throw new Error('listener failed');
		});

		expect(() =>
			grid.hardSplit(0, 0, [
				{ row: 0, column: 0 },
				{ row: 0, column: 1 },
			]),
		).toThrow('listener failed');
		expect(grid.draggedItem()).toBeNull();
		expect(grid.interactionState().phase).toBe('idle');
	});
});

// ============================================================================
// Interaction sessions
// ============================================================================

describe('drag and drop', () => {
	it('moves the dragged item to a free target', () => {
		const grid = createTileGrid<string>({ rowCount: 3, columnCount: 3 });
		grid.place('card', 0, 0, 1, 2);

		expect(grid.startDrag('card')).toBe(true);
		expect(grid.draggedItem()).toBe('card');
		expect(grid.drop(2, 1)).toEqual({ row: 2, column: 1, rowSpan: 1, columnSpan: 2 });
		expect(grid.interactionState().phase).toBe('idle');
		expect(grid.isFilled(0, 0)).toBe(false);
	});

	it('leaves the item in place when the target is taken', () => {
		const grid = createTileGrid<string>({ rowCount: 3, columnCount: 3 });
		grid.place('card', 0, 0);
		grid.place('other', 2, 2);

		grid.startDrag('card');

		expect(grid.drop(2, 2)).toBeNull();
		expect(grid.tileOf('card')).toEqual({ row: 0, column: 0, rowSpan: 1, columnSpan: 1 });
		expect(grid.draggedItem()).toBeNull();
	});

	it('refuses to start while disabled', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2, acceptDragAndDrop: false });
		grid.place('card', 0, 0);

		expect(grid.startDrag('card')).toBe(false);
		expect(warn).toHaveBeenCalledWith('[tile-grid] startDrag: drag and drop is disabled');

		grid.acceptDragAndDrop(true);
		expect(grid.startDrag('card')).toBe(true);
	});

	it('warns on a drop without a drag', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });

		expect(grid.drop(0, 0)).toBeNull();
		expect(warn).toHaveBeenCalledWith('[tile-grid] drop: no item is being dragged');
	});

	it('requires a placed item', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		expect(errorCode(() => grid.startDrag('ghost'))).toBe('UnknownItem');
	});

	it('ends the session when the dragged item is removed', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		grid.place('card', 0, 0);
		grid.startDrag('card');

		grid.remove('card');

		expect(grid.interactionState().phase).toBe('idle');
	});

	it('cancels without moving', () => {
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		grid.place('card', 0, 0);
		grid.startDrag('card');

		grid.cancelDrag();

		expect(grid.draggedItem()).toBeNull();
		expect(grid.tileOf('card')).toEqual({ row: 0, column: 0, rowSpan: 1, columnSpan: 1 });
	});
});

describe('resize sessions', () => {
	it('applies coordinate-space edge offsets', () => {
		const grid = createTileGrid<string>({ rowCount: 1, columnCount: 4 });
		grid.place('card', 0, 2);

		expect(grid.startResize('card', 'west')).toBe(true);
		expect(grid.resizeBy(-2)?.rect).toEqual({ row: 0, column: 0, rowSpan: 1, columnSpan: 3 });
		expect(grid.resizeBy(1)?.rect).toEqual({ row: 0, column: 1, rowSpan: 1, columnSpan: 2 });

		grid.endResize();
		expect(grid.interactionState()).toEqual({ phase: 'idle', item: null, direction: null });
	});

	it('refuses to start while disabled or while dragging', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });
		grid.place('card', 0, 0);

		grid.acceptResizing(false);
		expect(grid.startResize('card', 'east')).toBe(false);

		grid.acceptResizing(true);
		grid.startDrag('card');
		expect(grid.startResize('card', 'east')).toBe(false);
		expect(warn).toHaveBeenLastCalledWith('[tile-grid] startResize: a dragging session is already open');
	});

	it('ignores offsets outside a session', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
		const grid = createTileGrid<string>({ rowCount: 2, columnCount: 2 });

		expect(grid.resizeBy(1)).toBeNull();
		expect(warn).toHaveBeenCalledWith('[tile-grid] resizeBy: no resize session is open');
	});
});

// ============================================================================
// Invariant under random operation sequences
// ============================================================================

describe('partition invariant', () => {
	it('holds after every step of a random walk', () => {
		const random = mulberry32(20240611);
		const pick = (n: number) => Math.floor(random() * n);
		const grid = createTileGrid<number>({ rowCount: 6, columnCount: 5 });
		let nextItem = 0;
		let applied = 0;

		for (let step = 0; step < 400; step++) {
			const items = grid.items();
			const item = items.length > 0 ? items[pick(items.length)] : undefined;
			const op = pick(5);

			try {
				if (op === 0 || item === undefined) {
					grid.place(nextItem++, pick(6), pick(5), 1 + pick(3), 1 + pick(3));
				} else if (op === 1) {
					grid.remove(item);
				} else if (op === 2) {
					const direction = DIRECTIONS[pick(DIRECTIONS.length)] ?? 'east';
					grid.resizeItem(item, direction, pick(7) - 3);
				} else if (op === 3) {
					grid.move(item, pick(6), pick(5));
				} else {
					const rect = grid.tileOf(item);
					if (rect !== undefined) {
						// Split the whole tile, naming one cell twice
						const cells = cellsOf(rect);
						const repeated = cells[pick(cells.length)] ?? { row: rect.row, column: rect.column };
						grid.hardSplit(rect.row, rect.column, [...cells, repeated]);
					}
				}
				applied++;
			} catch (error) {
				if (!(error instanceof TileGridError)) throw error;
			}

			expect(grid.validate()).toEqual([]);
		}

		expect(applied).toBeGreaterThan(50);
	});
});
