import { PCX_HEADER_SIZE, PCX_SIGNATURE, PcxEncoding, type PcxHeader, PcxVersion } from './types'

/**
 * Parse the 128-byte header. Multi-byte fields are little-endian int16.
 */
export function parsePcxHeader(data: Uint8Array): PcxHeader {
	if (data.length < PCX_HEADER_SIZE) {
		throw new RangeError(`PCX header needs ${PCX_HEADER_SIZE} bytes, got ${data.length}`)
	}

	return {
		signature: readU8(data, 0),
		version: readU8(data, 1),
		encoding: readU8(data, 2),
		bitsPerPixel: readU8(data, 3),
		xMin: readI16LE(data, 4),
		yMin: readI16LE(data, 6),
		xMax: readI16LE(data, 8),
		yMax: readI16LE(data, 10),
		hDpi: readI16LE(data, 12),
		vDpi: readI16LE(data, 14),
		palette: data.slice(16, 64),
		reserved1: readU8(data, 64),
		numPlanes: readU8(data, 65),
		bytesPerLine: readI16LE(data, 66),
		paletteType: readI16LE(data, 68),
		hScreenSize: readI16LE(data, 70),
		vScreenSize: readI16LE(data, 72),
	}
}

/**
 * Write a header back to its 128-byte layout (filler zeroed)
 */
export function serializePcxHeader(header: PcxHeader): Uint8Array {
	const output = new Uint8Array(PCX_HEADER_SIZE)

	output[0] = header.signature
	output[1] = header.version
	output[2] = header.encoding
	output[3] = header.bitsPerPixel
	writeI16LE(output, 4, header.xMin)
	writeI16LE(output, 6, header.yMin)
	writeI16LE(output, 8, header.xMax)
	writeI16LE(output, 10, header.yMax)
	writeI16LE(output, 12, header.hDpi)
	writeI16LE(output, 14, header.vDpi)
	output.set(header.palette.subarray(0, 48), 16)
	output[64] = header.reserved1
	output[65] = header.numPlanes
	writeI16LE(output, 66, header.bytesPerLine)
	writeI16LE(output, 68, header.paletteType)
	writeI16LE(output, 70, header.hScreenSize)
	writeI16LE(output, 72, header.vScreenSize)

	return output
}

/**
 * Header defaults: version 3.0, RLE, one 8-bit plane, zeroed geometry
 */
export function createPcxHeader(fields: Partial<PcxHeader> = {}): PcxHeader {
	return {
		signature: PCX_SIGNATURE,
		version: PcxVersion.V30,
		encoding: PcxEncoding.RLE,
		bitsPerPixel: 8,
		xMin: 0,
		yMin: 0,
		xMax: 0,
		yMax: 0,
		hDpi: 0,
		vDpi: 0,
		palette: new Uint8Array(48),
		reserved1: 0,
		numPlanes: 1,
		bytesPerLine: 0,
		paletteType: 1,
		hScreenSize: 0,
		vScreenSize: 0,
		...fields,
	}
}

// Binary helpers
function readU8(data: Uint8Array, offset: number): number {
	return data[offset] ?? 0
}

function readI16LE(data: Uint8Array, offset: number): number {
	const u = readU8(data, offset) | (readU8(data, offset + 1) << 8)
	return u > 0x7fff ? u - 0x10000 : u
}

function writeI16LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}
