import {
	type ByteStream,
	type Color,
	DecodeError,
	DecodeErrorKind,
	type Logger,
	MAX_PALETTE_COLORS,
	SeekWhence,
} from '@rasterkit/core'
import { PCX_PALETTE_MARKER, PCX_VGA_PALETTE_SIZE, type PcxHeader } from './types'

/**
 * Palette size for a source depth
 */
export function getPaletteSize(srcBits: number): number {
	return Math.min(2 ** srcBits, MAX_PALETTE_COLORS)
}

/**
 * Colors for an indexed PCX image.
 *
 * 8-bit images carry a 256-entry table after the pixel data, introduced by
 * the marker byte 12. Some writers leave the marker out, in which case the
 * last 768 bytes of the stream are taken. Lower depths use the header palette.
 */
export function resolvePalette(
	stream: ByteStream,
	header: PcxHeader,
	srcBits: number,
	logger?: Logger
): Color[] {
	const ncolors = getPaletteSize(srcBits)

	if (srcBits === 8) {
		const table = readVgaPalette(stream, logger)
		return toColors(table, ncolors)
	}

	return toColors(header.palette, ncolors)
}

function readVgaPalette(stream: ByteStream, logger?: Logger): Uint8Array {
	const single = new Uint8Array(1)

	let found = false
	while (stream.read(single) === 1) {
		if (single[0] === PCX_PALETTE_MARKER) {
			found = true
			break
		}
	}

	if (!found) {
		logger?.warn('PCX palette marker not found, reading palette from end of stream')
		if (stream.seek(-PCX_VGA_PALETTE_SIZE, SeekWhence.END) < 0) {
			throw new DecodeError(DecodeErrorKind.TRUNCATED, 'file truncated')
		}
	}

	const table = new Uint8Array(PCX_VGA_PALETTE_SIZE)
	if (stream.read(table) !== table.length) {
		throw new DecodeError(DecodeErrorKind.TRUNCATED, 'file truncated')
	}
	return table
}

function toColors(table: Uint8Array, ncolors: number): Color[] {
	const colors: Color[] = []
	for (let i = 0; i < ncolors; i++) {
		colors.push({
			r: table[i * 3] ?? 0,
			g: table[i * 3 + 1] ?? 0,
			b: table[i * 3 + 2] ?? 0,
		})
	}
	return colors
}
