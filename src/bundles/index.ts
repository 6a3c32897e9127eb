// Full bundle - the tile grid facade plus the building blocks it is made of

// Core exports
export { createTileGrid, type TileGrid } from '../engine';
export type * from '../types';

// Configuration
export { resolveTileGridOptions, tileGridOptionsSchema } from '../config';

// Errors
export { TileGridError, isTileGridError, type TileGridErrorCode } from '../errors';

// Building blocks for hosts that drive the index directly
export {
	cellsOf,
	createGridIndex,
	findPartitionViolations,
	rectContains,
	type GridIndex,
	type Tile,
} from '../grid-index';
export { createItemRegistry, type ItemRegistry } from '../registry';
export { createPlacementEngine, type HardSplitResult, type PlacementEngine } from '../placement';
export {
	DIRECTIONS,
	applyResizePlan,
	directionFromVector,
	edgeOffsetToUnits,
	isDirection,
	planResize,
	resizeTile,
} from '../resize';
export { createStateMachine, isDragging, isResizing, type InteractionStateMachine } from '../state-machine';
