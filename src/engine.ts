import { parsePixelSpan, parseSpacing, resolveTileGridOptions, type TileGridOptions } from './config';
import { TileGridError } from './errors';
import { createGridIndex, findPartitionViolations, rectOf, snapshotTile } from './grid-index';
import { createPlacementEngine, type HardSplitResult } from './placement';
import { createItemRegistry } from './registry';
import { edgeOffsetToUnits, resizeTile as resizeGridTile } from './resize';
import { createStateMachine, type InteractionState } from './state-machine';
import type {
	CellCoord,
	Direction,
	GridRect,
	PixelRect,
	ResizePlan,
	TileGridEventMap,
	TileGridListener,
	TileId,
	TileSnapshot,
} from './types';

export interface TileGrid<T> {
	readonly rowCount: number;
	readonly columnCount: number;

	/** Unit cell height in pixels */
	rowMinimumHeight(): number;
	/** Unit cell width in pixels */
	columnMinimumWidth(): number;
	verticalSpacing(): number;
	horizontalSpacing(): number;
	setRowHeight(pixels: number): void;
	setColumnWidth(pixels: number): void;
	setVerticalSpacing(pixels: number): void;
	setHorizontalSpacing(pixels: number): void;

	readonly dragAndDropEnabled: boolean;
	readonly resizingEnabled: boolean;
	acceptDragAndDrop(value: boolean): void;
	acceptResizing(value: boolean): void;

	// Queries
	isFilled(row: number, column: number): boolean;
	isAreaEmpty(row: number, column: number, rowSpan: number, columnSpan: number): boolean;
	tileAt(row: number, column: number): TileSnapshot;
	/** Rectangle, in grid units, of the tile covering the cell */
	tileRect(row: number, column: number): GridRect;
	/** Pixel rectangle of the tile covering the cell, from the configured unit spans and spacing */
	tilePixelRect(row: number, column: number): PixelRect;
	itemAt(row: number, column: number): T | undefined;
	tileOf(item: T): GridRect | undefined;
	items(): T[];
	tiles(): TileSnapshot[];
	/** Partition and binding violations; empty when the grid is consistent */
	validate(): string[];

	// Mutations
	place(item: T, row: number, column: number, rowSpan?: number, columnSpan?: number): GridRect;
	remove(item: T): GridRect;
	move(item: T, row: number, column: number): GridRect;
	hardSplit(row: number, column: number, cells: readonly CellCoord[]): TileSnapshot;
	resizeTile(row: number, column: number, direction: Direction, units: number): ResizePlan;
	resizeItem(item: T, direction: Direction, units: number): ResizePlan;

	// Interaction sessions
	interactionState(): InteractionState<T>;
	startDrag(item: T): boolean;
	draggedItem(): T | null;
	/** Move the dragged item to the cell; returns null when the target is not free */
	drop(row: number, column: number): GridRect | null;
	cancelDrag(): void;
	startResize(item: T, direction: Direction): boolean;
	/** Apply a coordinate-space offset of the session's edge */
	resizeBy(offset: number): ResizePlan | null;
	endResize(): void;

	on<K extends keyof TileGridEventMap<T>>(event: K, listener: TileGridListener<T, K>): () => void;
}

type ListenerSets<T> = {
	[K in keyof TileGridEventMap<T>]: Set<TileGridListener<T, K>>;
};

/**
 * Create a tile grid
 *
 * @param options - Grid dimensions plus display values handed back to the renderer
 */
export function createTileGrid<T>(options: TileGridOptions): TileGrid<T> {
	const config = resolveTileGridOptions(options);
	const { rowCount, columnCount } = config;

	const index = createGridIndex(rowCount, columnCount);
	const registry = createItemRegistry<T>();
	const placement = createPlacementEngine(index, registry);
	const session = createStateMachine<T>();

	let rowHeight = config.rowHeight;
	let columnWidth = config.columnWidth;
	let verticalSpacing = config.verticalSpacing;
	let horizontalSpacing = config.horizontalSpacing;
	let dragAndDropEnabled = config.acceptDragAndDrop;
	let resizingEnabled = config.acceptResizing;

	const listeners: ListenerSets<T> = {
		placed: new Set(),
		removed: new Set(),
		resized: new Set(),
		moved: new Set(),
		'geometry-change': new Set(),
	};

	function emit<K extends keyof TileGridEventMap<T>>(event: K, detail: TileGridEventMap<T>[K]): void {
		for (const listener of Array.from(listeners[event])) {
			listener(detail);
		}
	}

	function emitGeometryChange(): void {
		emit('geometry-change', { rowHeight, columnWidth, verticalSpacing, horizontalSpacing });
	}

	function releaseItems(released: HardSplitResult<T>['released']): void {
		for (const detail of released) {
			session.transition({ type: 'ITEM_REMOVED', item: detail.item });
		}
		for (const detail of released) {
			emit('removed', { item: detail.item, rect: rectOf(detail.rect) });
		}
	}

	function requireTileId(item: T): TileId {
		const tileId = registry.tileOf(item);
		if (tileId === undefined) {
			throw new TileGridError('UnknownItem', 'item is not placed on this grid', { item });
		}
		return tileId;
	}

	function applyResize(tileId: TileId, direction: Direction, units: number): ResizePlan {
		const plan = resizeGridTile(index, tileId, direction, units);
		const item = registry.itemOf(tileId);
		if (plan.granted > 0 && item !== undefined) {
			emit('resized', { item, rect: rectOf(plan.rect) });
		}
		return plan;
	}

	const grid: TileGrid<T> = {
		get rowCount() {
			return rowCount;
		},
		get columnCount() {
			return columnCount;
		},

		rowMinimumHeight: () => rowHeight,
		columnMinimumWidth: () => columnWidth,
		verticalSpacing: () => verticalSpacing,
		horizontalSpacing: () => horizontalSpacing,

		setRowHeight(pixels: number): void {
			rowHeight = parsePixelSpan(pixels);
			emitGeometryChange();
		},
		setColumnWidth(pixels: number): void {
			columnWidth = parsePixelSpan(pixels);
			emitGeometryChange();
		},
		setVerticalSpacing(pixels: number): void {
			verticalSpacing = parseSpacing(pixels);
			emitGeometryChange();
		},
		setHorizontalSpacing(pixels: number): void {
			horizontalSpacing = parseSpacing(pixels);
			emitGeometryChange();
		},

		get dragAndDropEnabled() {
			return dragAndDropEnabled;
		},
		get resizingEnabled() {
			return resizingEnabled;
		},
		acceptDragAndDrop(value: boolean): void {
			dragAndDropEnabled = value;
		},
		acceptResizing(value: boolean): void {
			resizingEnabled = value;
		},

		isFilled(row: number, column: number): boolean {
			return index.isFilled(row, column);
		},

		isAreaEmpty(row: number, column: number, rowSpan: number, columnSpan: number): boolean {
			return placement.isAreaEmpty(row, column, rowSpan, columnSpan);
		},

		tileAt(row: number, column: number): TileSnapshot {
			return snapshotTile(index.tileAt(row, column));
		},

		tileRect(row: number, column: number): GridRect {
			return rectOf(index.tileAt(row, column));
		},

		tilePixelRect(row: number, column: number): PixelRect {
			const rect = index.tileAt(row, column);
			// n cells span n * cell + (n - 1) * spacing pixels
			return {
				x: rect.column * (columnWidth + horizontalSpacing),
				y: rect.row * (rowHeight + verticalSpacing),
				width: rect.columnSpan * columnWidth + (rect.columnSpan - 1) * horizontalSpacing,
				height: rect.rowSpan * rowHeight + (rect.rowSpan - 1) * verticalSpacing,
			};
		},

		itemAt(row: number, column: number): T | undefined {
			return registry.itemOf(index.ownerOf(row, column));
		},

		tileOf(item: T): GridRect | undefined {
			const tileId = registry.tileOf(item);
			const tile = tileId === undefined ? undefined : index.getTile(tileId);
			return tile ? rectOf(tile) : undefined;
		},

		items(): T[] {
			return registry.items();
		},

		tiles(): TileSnapshot[] {
			return index.tiles().map(snapshotTile);
		},

		validate(): string[] {
			const violations = findPartitionViolations(index);
			for (const item of registry.items()) {
				const tileId = registry.tileOf(item);
				const tile = tileId === undefined ? undefined : index.getTile(tileId);
				if (!tile) {
					violations.push(`item ${String(item)} is bound to discarded tile ${tileId}`);
				} else if (!tile.filled) {
					violations.push(`item ${String(item)} is bound to unfilled tile ${tile.id}`);
				}
			}
			for (const tile of index.tiles()) {
				if (tile.filled && registry.itemOf(tile.id) === undefined) {
					violations.push(`filled tile ${tile.id} has no item`);
				}
			}
			return violations;
		},

		place(item: T, row: number, column: number, rowSpan = 1, columnSpan = 1): GridRect {
			const rect = placement.place(item, row, column, rowSpan, columnSpan);
			emit('placed', { item, rect: rectOf(rect) });
			return rect;
		},

		remove(item: T): GridRect {
			const rect = placement.remove(item);
			releaseItems([{ item, rect }]);
			return rect;
		},

		move(item: T, row: number, column: number): GridRect {
			const rect = placement.move(item, row, column);
			emit('moved', { item, rect: rectOf(rect) });
			return rect;
		},

		hardSplit(row: number, column: number, cells: readonly CellCoord[]): TileSnapshot {
			const { tile, released } = placement.hardSplit(row, column, cells);
			releaseItems(released);
			return tile;
		},

		resizeTile(row: number, column: number, direction: Direction, units: number): ResizePlan {
			return applyResize(index.ownerOf(row, column), direction, units);
		},

		resizeItem(item: T, direction: Direction, units: number): ResizePlan {
			return applyResize(requireTileId(item), direction, units);
		},

		interactionState(): InteractionState<T> {
			return session.getState();
		},

		startDrag(item: T): boolean {
			requireTileId(item);
			if (!dragAndDropEnabled) {
				console.warn('[tile-grid] startDrag: drag and drop is disabled');
				return false;
			}
			if (!session.canTransition({ type: 'START_DRAG', item })) {
				console.warn(`[tile-grid] startDrag: a ${session.getState().phase} session is already open`);
				return false;
			}
			session.transition({ type: 'START_DRAG', item });
			return true;
		},

		draggedItem(): T | null {
			const state = session.getState();
			return state.phase === 'dragging' ? state.item : null;
		},

		drop(row: number, column: number): GridRect | null {
			const state = session.getState();
			if (state.phase !== 'dragging' || state.item === null) {
				console.warn('[tile-grid] drop: no item is being dragged');
				return null;
			}
			const item = state.item;
			session.transition({ type: 'FINISH' });
			if (!placement.canMove(item, row, column)) {
				return null;
			}
			return grid.move(item, row, column);
		},

		cancelDrag(): void {
			if (session.getState().phase === 'dragging') {
				session.transition({ type: 'CANCEL' });
			}
		},

		startResize(item: T, direction: Direction): boolean {
			requireTileId(item);
			if (!resizingEnabled) {
				console.warn('[tile-grid] startResize: resizing is disabled');
				return false;
			}
			if (!session.canTransition({ type: 'START_RESIZE', item, direction })) {
				console.warn(`[tile-grid] startResize: a ${session.getState().phase} session is already open`);
				return false;
			}
			session.transition({ type: 'START_RESIZE', item, direction });
			return true;
		},

		resizeBy(offset: number): ResizePlan | null {
			const state = session.getState();
			if (state.phase !== 'resizing' || state.item === null || state.direction === null) {
				console.warn('[tile-grid] resizeBy: no resize session is open');
				return null;
			}
			return grid.resizeItem(state.item, state.direction, edgeOffsetToUnits(state.direction, offset));
		},

		endResize(): void {
			if (session.getState().phase === 'resizing') {
				session.transition({ type: 'FINISH' });
			}
		},

		on<K extends keyof TileGridEventMap<T>>(event: K, listener: TileGridListener<T, K>): () => void {
			listeners[event].add(listener);
			return () => {
				listeners[event].delete(listener);
			};
		},
	};

	return grid;
}
