/**
 * Decode failure kinds
 */
export const DecodeErrorKind = {
	/** Stream ended before the expected bytes were available */
	TRUNCATED: 'Truncated',
	/** Bit depth / plane layout outside the supported set */
	UNSUPPORTED_FORMAT: 'UnsupportedFormat',
	/** Data is inconsistent with the header */
	CORRUPT: 'Corrupt',
	/** Buffer or surface too large to allocate */
	OUT_OF_MEMORY: 'OutOfMemory',
	/** Surface or palette object could not be created */
	ALLOCATION_FAILED: 'AllocationFailed',
} as const

export type DecodeErrorKindType = (typeof DecodeErrorKind)[keyof typeof DecodeErrorKind]

/**
 * Error thrown by decoders. The message is the human readable reason.
 */
export class DecodeError extends Error {
	readonly kind: DecodeErrorKindType

	constructor(kind: DecodeErrorKindType, message: string) {
		super(message)
		this.name = 'DecodeError'
		this.kind = kind
	}
}

export function isDecodeError(error: unknown): error is DecodeError {
	return error instanceof DecodeError
}
