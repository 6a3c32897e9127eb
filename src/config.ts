import { z } from 'zod';

const countSchema = z.number().int().positive();
const pixelSpanSchema = z.number().int().positive();
const spacingSchema = z.number().int().min(0, 'spacing must be non-negative');

export const tileGridOptionsSchema = z.object({
	rowCount: countSchema,
	columnCount: countSchema,
	/** Unit cell height in pixels */
	rowHeight: pixelSpanSchema.default(100),
	/** Unit cell width in pixels */
	columnWidth: pixelSpanSchema.default(150),
	verticalSpacing: spacingSchema.default(5),
	horizontalSpacing: spacingSchema.default(5),
	acceptDragAndDrop: z.boolean().default(true),
	acceptResizing: z.boolean().default(true),
});

/** Options as accepted by `createTileGrid` */
export type TileGridOptions = z.input<typeof tileGridOptionsSchema>;

/** Options after defaults are applied */
export type TileGridConfig = z.infer<typeof tileGridOptionsSchema>;

/**
 * Validate construction options and fill in defaults.
 * Throws a `ZodError` when an option is out of range.
 */
export function resolveTileGridOptions(options: TileGridOptions): TileGridConfig {
	return tileGridOptionsSchema.parse(options);
}

export function parsePixelSpan(value: number): number {
	return pixelSpanSchema.parse(value);
}

export function parseSpacing(value: number): number {
	return spacingSchema.parse(value);
}
