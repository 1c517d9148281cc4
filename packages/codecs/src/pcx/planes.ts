/**
 * Scanline to surface row conversion
 */

import { DecodeError, DecodeErrorKind } from '@rasterkit/core'

/**
 * Expand 1-bit planes to one byte per pixel.
 * Plane p contributes bit p of each pixel; bits past `width` are padding.
 */
export function unpackPlanarBits(
	scanline: Uint8Array,
	row: Uint8Array,
	width: number,
	numPlanes: number,
	bytesPerLine: number
): void {
	let srcPos = 0
	for (let plane = 0; plane < numPlanes; plane++) {
		for (let j = 0; j < bytesPerLine; j++) {
			const byte = scanline[srcPos++] ?? 0
			for (let k = 7; k >= 0; k--) {
				const x = j * 8 + (7 - k)
				if (x >= width) continue
				row[x] = (row[x] ?? 0) | (((byte >> k) & 1) << plane)
			}
		}
	}
}

/**
 * 8-bit single plane: copy the row directly
 */
export function copyIndexed8(scanline: Uint8Array, row: Uint8Array, width: number): void {
	row.set(scanline.subarray(0, Math.min(width, scanline.length, row.length)))
}

/**
 * De-interleave R, G, B planes into packed RGB
 */
export function unpackRgb24(
	scanline: Uint8Array,
	row: Uint8Array,
	width: number,
	numPlanes: number,
	bytesPerLine: number
): void {
	for (let plane = 0; plane < numPlanes; plane++) {
		const srcStart = plane * bytesPerLine
		for (let x = 0; x < width; x++) {
			const src = srcStart + x
			const dst = plane + x * numPlanes
			if (src >= scanline.length || dst >= row.length) {
				throw new DecodeError(DecodeErrorKind.CORRUPT, 'decoding out of bounds (corrupt?)')
			}
			row[dst] = scanline[src] ?? 0
		}
	}
}
