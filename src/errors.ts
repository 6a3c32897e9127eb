export type TileGridErrorCode =
	| 'OutOfBounds'
	| 'AreaOccupied'
	| 'DuplicateItem'
	| 'UnknownItem'
	| 'InvalidArgument';

/**
 * Raised for any rejected request. Every check runs before the grid is
 * touched, so a thrown error means nothing changed.
 */
export class TileGridError extends Error {
	readonly code: TileGridErrorCode;
	readonly details: Record<string, unknown> | undefined;

	constructor(code: TileGridErrorCode, message: string, details?: Record<string, unknown>) {
		super(message);
		this.name = 'TileGridError';
		this.code = code;
		this.details = details;
	}
}

export function isTileGridError(error: unknown, code?: TileGridErrorCode): error is TileGridError {
	return error instanceof TileGridError && (code === undefined || error.code === code);
}
