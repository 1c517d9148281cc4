/**
 * Seek origin
 */
export const SeekWhence = {
	SET: 'set',
	CUR: 'cur',
	END: 'end',
} as const

export type SeekWhenceType = (typeof SeekWhence)[keyof typeof SeekWhence]

/**
 * Seekable byte source consumed by decoders
 */
export interface ByteStream {
	/** Current absolute position */
	tell(): number
	/**
	 * Move the read position. Returns the new position, or -1 when the target
	 * lies before the start of the stream (the position is then unchanged).
	 * Targets past the end are clamped to the end.
	 */
	seek(offset: number, whence?: SeekWhenceType): number
	/**
	 * Read up to `buffer.length` bytes into `buffer`.
	 * Returns the number of bytes read; fewer means end of stream.
	 */
	read(buffer: Uint8Array): number
}

/**
 * ByteStream over an in-memory buffer
 */
export class MemoryStream implements ByteStream {
	private readonly data: Uint8Array
	private position = 0

	constructor(data: Uint8Array) {
		this.data = data
	}

	tell(): number {
		return this.position
	}

	seek(offset: number, whence: SeekWhenceType = SeekWhence.SET): number {
		let base = 0
		if (whence === SeekWhence.CUR) base = this.position
		else if (whence === SeekWhence.END) base = this.data.length

		const target = base + offset
		if (!Number.isFinite(target) || target < 0) return -1

		this.position = Math.min(target, this.data.length)
		return this.position
	}

	read(buffer: Uint8Array): number {
		const count = Math.min(buffer.length, this.data.length - this.position)
		if (count <= 0) return 0

		buffer.set(this.data.subarray(this.position, this.position + count))
		this.position += count
		return count
	}
}
