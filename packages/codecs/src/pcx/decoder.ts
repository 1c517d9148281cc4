import {
	type ByteStream,
	checkLimits,
	createSurface,
	createSurfacePalette,
	DecodeError,
	DecodeErrorKind,
	type DecodeOptions,
	getRow,
	PixelFormat,
	resolveLimits,
	SeekWhence,
	type Surface,
} from '@rasterkit/core'
import { parsePcxHeader } from './header'
import { resolvePalette } from './palette'
import { copyIndexed8, unpackPlanarBits, unpackRgb24 } from './planes'
import { readRawScanline, RleDecoder } from './rle'
import {
	getColorDepth,
	getDimensions,
	getLayout,
	getPixelFormat,
	PCX_HEADER_SIZE,
	PCX_SIGNATURE,
	PcxEncoding,
	type PcxHeader,
	type PcxInfo,
	PcxVersion,
} from './types'

/**
 * Check if a header carries the ZSoft signature, version 3.0 and a known encoding
 */
export function isPcxHeader(header: PcxHeader): boolean {
	return (
		header.signature === PCX_SIGNATURE &&
		header.version === PcxVersion.V30 &&
		(header.encoding === PcxEncoding.RLE || header.encoding === PcxEncoding.NONE)
	)
}

/**
 * Check if the stream holds a PCX image. The stream position is left unchanged.
 */
export function isPcx(stream: ByteStream): boolean {
	const start = stream.tell()
	try {
		const block = new Uint8Array(PCX_HEADER_SIZE)
		if (stream.read(block) !== PCX_HEADER_SIZE) return false
		return isPcxHeader(parsePcxHeader(block))
	} finally {
		stream.seek(start, SeekWhence.SET)
	}
}

/**
 * Read header information without decoding pixels. The stream position is left unchanged.
 */
export function readPcxInfo(stream: ByteStream): PcxInfo {
	const start = stream.tell()
	try {
		const header = readHeader(stream)
		if (!isPcxHeader(header)) {
			throw new DecodeError(DecodeErrorKind.UNSUPPORTED_FORMAT, 'not a PCX image')
		}

		const layout = getLayout(header)
		return {
			...getDimensions(header),
			version: header.version,
			encoding: header.encoding,
			bitsPerPixel: header.bitsPerPixel,
			numPlanes: header.numPlanes,
			srcBits: getColorDepth(header),
			bytesPerLine: header.bytesPerLine,
			hDpi: header.hDpi,
			vDpi: header.vDpi,
			paletteType: header.paletteType,
			layout,
			format: layout ? getPixelFormat(layout) : null,
		}
	} finally {
		stream.seek(start, SeekWhence.SET)
	}
}

/**
 * Decode PCX to a Surface.
 * On failure the stream is rewound to where decoding began and a DecodeError is thrown.
 */
export function decodePcx(stream: ByteStream, options: DecodeOptions = {}): Surface {
	const start = stream.tell()
	try {
		return decodeFromStream(stream, options)
	} catch (error) {
		stream.seek(start, SeekWhence.SET)
		throw error
	}
}

function decodeFromStream(stream: ByteStream, options: DecodeOptions): Surface {
	const { logger } = options
	const header = readHeader(stream)

	logger?.debug('PCX header', {
		version: header.version,
		encoding: header.encoding,
		bitsPerPixel: header.bitsPerPixel,
		xMin: header.xMin,
		yMin: header.yMin,
		xMax: header.xMax,
		yMax: header.yMax,
		numPlanes: header.numPlanes,
		bytesPerLine: header.bytesPerLine,
		paletteType: header.paletteType,
	})

	if (!isPcxHeader(header)) {
		throw new DecodeError(DecodeErrorKind.UNSUPPORTED_FORMAT, 'not a PCX image')
	}

	const layout = getLayout(header)
	if (!layout) {
		throw new DecodeError(DecodeErrorKind.UNSUPPORTED_FORMAT, 'unsupported PCX format')
	}

	const { width, height } = getDimensions(header)
	if (width < 1 || height < 1) {
		throw new DecodeError(DecodeErrorKind.CORRUPT, 'invalid PCX dimensions')
	}
	if (header.bytesPerLine < 1) {
		throw new DecodeError(DecodeErrorKind.CORRUPT, 'invalid PCX bytes per line')
	}
	checkLimits(width, height, resolveLimits(options.limits))

	const srcBits = getColorDepth(header)
	const surface = createSurface(width, height, getPixelFormat(layout))

	// One scanline group: every plane of one row
	const scanline = new Uint8Array(header.numPlanes * header.bytesPerLine)
	const rle = header.encoding === PcxEncoding.RLE ? new RleDecoder(stream) : null

	for (let y = 0; y < height; y++) {
		if (rle) {
			rle.fill(scanline)
		} else {
			readRawScanline(stream, scanline)
		}

		const row = getRow(surface, y)
		if (layout === 'planar') {
			unpackPlanarBits(scanline, row, width, header.numPlanes, header.bytesPerLine)
		} else if (layout === 'indexed8') {
			copyIndexed8(scanline, row, width)
		} else {
			unpackRgb24(scanline, row, width, header.numPlanes, header.bytesPerLine)
		}
	}

	if (surface.format === PixelFormat.INDEX8) {
		const colors = resolvePalette(stream, header, srcBits, logger)
		const palette = createSurfacePalette(surface, colors.length)
		colors.forEach((color, i) => {
			palette.colors[i] = color
		})
	}

	return surface
}

function readHeader(stream: ByteStream): PcxHeader {
	const block = new Uint8Array(PCX_HEADER_SIZE)
	if (stream.read(block) !== PCX_HEADER_SIZE) {
		throw new DecodeError(DecodeErrorKind.TRUNCATED, 'file truncated')
	}
	return parsePcxHeader(block)
}
