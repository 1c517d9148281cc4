/**
 * PCX (PC Paintbrush) format types and constants
 */

import { PixelFormat, type PixelFormatType } from '@rasterkit/core'

// PCX manufacturer byte (ZSoft)
export const PCX_SIGNATURE = 0x0a

// Fixed header size in bytes
export const PCX_HEADER_SIZE = 128

// Marker byte preceding the trailing 256-color palette
export const PCX_PALETTE_MARKER = 0x0c

// Trailing palette size (256 RGB triples)
export const PCX_VGA_PALETTE_SIZE = 768

// Header version byte; only 3.0 is accepted
export enum PcxVersion {
	WINDOWS = 4,
	V30 = 5,
}

// PCX encoding
export enum PcxEncoding {
	NONE = 0,
	RLE = 1,
}

/**
 * PCX header structure (128 bytes)
 */
export interface PcxHeader {
	signature: number // 0x0A
	version: number
	encoding: number
	bitsPerPixel: number // bits per pixel per plane
	xMin: number
	yMin: number
	xMax: number
	yMax: number
	hDpi: number
	vDpi: number
	palette: Uint8Array // 16-color palette (48 bytes)
	reserved1: number
	numPlanes: number
	bytesPerLine: number // Bytes per scanline plane
	paletteType: number // 1 = color, 2 = grayscale
	hScreenSize: number
	vScreenSize: number
}

/**
 * Scanline layout, picked from bits per pixel and plane count
 */
export type PcxLayout =
	/** 1 bit per plane, 1-4 planes */
	| 'planar'
	/** 8 bits, 1 plane */
	| 'indexed8'
	/** 8 bits, 3 planes */
	| 'rgb24'

/**
 * Header fields without decoding pixels
 */
export interface PcxInfo {
	width: number
	height: number
	version: number
	encoding: number
	bitsPerPixel: number
	numPlanes: number
	/** bitsPerPixel * numPlanes */
	srcBits: number
	bytesPerLine: number
	hDpi: number
	vDpi: number
	paletteType: number
	/** null when the layout is not supported */
	layout: PcxLayout | null
	format: PixelFormatType | null
}

/**
 * Calculate image dimensions from header
 */
export function getDimensions(header: PcxHeader): { width: number; height: number } {
	return {
		width: header.xMax - header.xMin + 1,
		height: header.yMax - header.yMin + 1,
	}
}

/**
 * Calculate color depth
 */
export function getColorDepth(header: PcxHeader): number {
	return header.bitsPerPixel * header.numPlanes
}

/**
 * Scanline layout, or null when unsupported
 */
export function getLayout(header: PcxHeader): PcxLayout | null {
	const { bitsPerPixel, numPlanes } = header
	if (bitsPerPixel === 1 && numPlanes >= 1 && numPlanes <= 4) return 'planar'
	if (bitsPerPixel === 8 && numPlanes === 1) return 'indexed8'
	if (bitsPerPixel === 8 && numPlanes === 3) return 'rgb24'
	return null
}

/**
 * Output surface format for a layout
 */
export function getPixelFormat(layout: PcxLayout): PixelFormatType {
	return layout === 'rgb24' ? PixelFormat.RGB24 : PixelFormat.INDEX8
}
