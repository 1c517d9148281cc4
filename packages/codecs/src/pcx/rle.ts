/**
 * PCX run-length scanline decoding
 *
 * A byte below 0xC0 is a literal. Otherwise its low 6 bits are a repeat
 * count and the next byte is the value. Runs are not bounded by scanlines,
 * so the remaining count survives between fill() calls.
 */

import { type ByteStream, DecodeError, DecodeErrorKind } from '@rasterkit/core'

const RUN_FLAG = 0xc0
const COUNT_MASK = 0x3f

export class RleDecoder {
	private readonly stream: ByteStream
	private readonly single = new Uint8Array(1)
	private count = 0
	private value = 0

	constructor(stream: ByteStream) {
		this.stream = stream
	}

	/** Bytes still owed by the current run */
	get pending(): number {
		return this.count
	}

	/**
	 * Fill `buffer` completely
	 */
	fill(buffer: Uint8Array): void {
		for (let i = 0; i < buffer.length; i++) {
			while (this.count === 0) {
				const control = this.readByte()
				if (control < RUN_FLAG) {
					this.count = 1
					this.value = control
				} else {
					// 0xC0 gives an empty run: the value byte is consumed, nothing is written
					this.count = control & COUNT_MASK
					this.value = this.readByte()
				}
			}

			buffer[i] = this.value
			this.count--
		}
	}

	private readByte(): number {
		if (this.stream.read(this.single) !== 1) {
			throw new DecodeError(DecodeErrorKind.TRUNCATED, 'file truncated')
		}
		return this.single[0] ?? 0
	}
}

/**
 * Uncompressed scanline: one read of buffer.length bytes
 */
export function readRawScanline(stream: ByteStream, buffer: Uint8Array): void {
	if (stream.read(buffer) !== buffer.length) {
		throw new DecodeError(DecodeErrorKind.TRUNCATED, 'file truncated')
	}
}
