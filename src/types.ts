// ============================================================================
// Geometry Types
// ============================================================================

export interface CellCoord {
	row: number;
	column: number;
}

/**
 * A rectangle in grid units. `row`/`column` is always the upper-left corner.
 */
export interface GridRect {
	row: number;
	column: number;
	rowSpan: number;
	columnSpan: number;
}

/**
 * A rectangle in pixels, for the rendering collaborator
 */
export interface PixelRect {
	x: number;
	y: number;
	width: number;
	height: number;
}

export type TileId = number;

/**
 * Read-only copy of a tile handed out to callers
 */
export interface TileSnapshot extends GridRect {
	id: TileId;
	filled: boolean;
}

// ============================================================================
// Resize Types
// ============================================================================

/**
 * The edge of a tile being moved by a resize
 */
export type Direction = 'north' | 'south' | 'east' | 'west';

export type ResizeKind = 'grow' | 'shrink' | 'none';

/**
 * Outcome of a resize request after bounding and collision checks.
 * Nothing in the grid has changed yet when a plan is produced.
 */
export interface ResizePlan {
	tileId: TileId;
	direction: Direction;
	kind: ResizeKind;
	/** Units asked for (positive grows, negative shrinks) */
	requested: number;
	/** Magnitude left after clamping to the grid edge or the minimum span */
	bounded: number;
	/** Magnitude actually applied; below `bounded` when a filled neighbour blocks growth */
	granted: number;
	/** Cells absorbed (grow) or released (shrink) */
	cells: CellCoord[];
	/** Tile rectangle once the plan is applied */
	rect: GridRect;
}

// ============================================================================
// Events
// ============================================================================

export interface ItemRectDetail<T> {
	item: T;
	rect: GridRect;
}

export interface GeometryChangeDetail {
	rowHeight: number;
	columnWidth: number;
	verticalSpacing: number;
	horizontalSpacing: number;
}

export interface TileGridEventMap<T> {
	placed: ItemRectDetail<T>;
	removed: ItemRectDetail<T>;
	resized: ItemRectDetail<T>;
	moved: ItemRectDetail<T>;
	'geometry-change': GeometryChangeDetail;
}

export type TileGridListener<T, K extends keyof TileGridEventMap<T>> = (
	detail: TileGridEventMap<T>[K],
) => void;

// Re-export option and session types for convenience
import type { TileGridConfig, TileGridOptions } from './config';
import type { InteractionState, InteractionPhase, SessionTransition } from './state-machine';
export type { TileGridConfig, TileGridOptions, InteractionState, InteractionPhase, SessionTransition };
