import { DecodeError, DecodeErrorKind } from './errors'

/**
 * Surface pixel formats
 */
export const PixelFormat = {
	/** 1 byte per pixel, palette index */
	INDEX8: 'index8',
	/** 3 bytes per pixel, R G B */
	RGB24: 'rgb24',
} as const

export type PixelFormatType = (typeof PixelFormat)[keyof typeof PixelFormat]

/**
 * RGB color
 */
export interface Color {
	r: number
	g: number
	b: number
}

/**
 * Color table attached to an indexed surface
 */
export interface Palette {
	/** Entries in use, length <= MAX_PALETTE_COLORS */
	readonly colors: Color[]
}

/**
 * Pixel surface produced by decoders
 */
export interface Surface {
	readonly width: number
	readonly height: number
	readonly format: PixelFormatType
	/** Bytes per row, >= width * bytesPerPixel */
	readonly pitch: number
	readonly pixels: Uint8Array
	/** Set for indexed surfaces */
	palette: Palette | null
}

/**
 * Minimal logger; `console` satisfies it
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void
	warn(message: string, ...args: unknown[]): void
}

export const MAX_PALETTE_COLORS = 256

/**
 * Bytes per pixel for a format
 */
export function bytesPerPixel(format: PixelFormatType): number {
	return format === PixelFormat.RGB24 ? 3 : 1
}

/**
 * Row pitch, padded to a 4-byte boundary
 */
export function computePitch(width: number, format: PixelFormatType): number {
	return (width * bytesPerPixel(format) + 3) & ~3
}

/**
 * Allocate a zeroed surface
 */
export function createSurface(width: number, height: number, format: PixelFormatType): Surface {
	if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
		throw new DecodeError(DecodeErrorKind.ALLOCATION_FAILED, "couldn't create surface")
	}

	const pitch = computePitch(width, format)
	return {
		width,
		height,
		format,
		pitch,
		pixels: allocatePixels(pitch * height),
		palette: null,
	}
}

function allocatePixels(size: number): Uint8Array {
	try {
		return new Uint8Array(size)
	} catch (error) {
		if (error instanceof RangeError) {
			throw new DecodeError(DecodeErrorKind.OUT_OF_MEMORY, 'out of memory')
		}
		throw error
	}
}

/**
 * Attach a black palette of `ncolors` entries to an indexed surface
 */
export function createSurfacePalette(surface: Surface, ncolors: number = MAX_PALETTE_COLORS): Palette {
	if (surface.format !== PixelFormat.INDEX8) {
		throw new DecodeError(DecodeErrorKind.ALLOCATION_FAILED, "couldn't create palette")
	}

	const count = Math.max(0, Math.min(ncolors, MAX_PALETTE_COLORS))
	const colors: Color[] = []
	for (let i = 0; i < count; i++) {
		colors.push({ r: 0, g: 0, b: 0 })
	}

	const palette: Palette = { colors }
	surface.palette = palette
	return palette
}

/**
 * View of row `y` (pitch bytes)
 */
export function getRow(surface: Surface, y: number): Uint8Array {
	const start = y * surface.pitch
	return surface.pixels.subarray(start, start + surface.pitch)
}

/**
 * Palette index at (x, y) of an indexed surface
 */
export function getPixelIndex(surface: Surface, x: number, y: number): number {
	return surface.pixels[y * surface.pitch + x] ?? 0
}

/**
 * Expand a surface to tightly packed RGB (width * height * 3).
 * Indices outside the palette map to black.
 */
export function surfaceToRgb(surface: Surface): Uint8Array {
	const { width, height, pitch, pixels } = surface
	const output = new Uint8Array(width * height * 3)

	for (let y = 0; y < height; y++) {
		const rowStart = y * pitch
		for (let x = 0; x < width; x++) {
			const outIdx = (y * width + x) * 3

			if (surface.format === PixelFormat.RGB24) {
				output[outIdx] = pixels[rowStart + x * 3] ?? 0
				output[outIdx + 1] = pixels[rowStart + x * 3 + 1] ?? 0
				output[outIdx + 2] = pixels[rowStart + x * 3 + 2] ?? 0
				continue
			}

			const color = surface.palette?.colors[pixels[rowStart + x] ?? 0]
			if (color) {
				output[outIdx] = color.r
				output[outIdx + 1] = color.g
				output[outIdx + 2] = color.b
			}
		}
	}

	return output
}
