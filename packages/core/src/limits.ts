import { DecodeError, DecodeErrorKind } from './errors'

/**
 * Size limits applied before allocating a surface
 */
export interface DecodeLimits {
	/** Maximum width or height in pixels */
	maxDimension: number
	/** Maximum width * height */
	maxPixels: number
}

export const DEFAULT_LIMITS: Readonly<DecodeLimits> = {
	maxDimension: 65536,
	maxPixels: 268435456,
}

export function resolveLimits(limits?: Partial<DecodeLimits>): DecodeLimits {
	return { ...DEFAULT_LIMITS, ...limits }
}

/**
 * Throws OutOfMemory when the dimensions exceed the limits
 */
export function checkLimits(width: number, height: number, limits: DecodeLimits): void {
	if (
		width > limits.maxDimension ||
		height > limits.maxDimension ||
		width * height > limits.maxPixels
	) {
		throw new DecodeError(DecodeErrorKind.OUT_OF_MEMORY, 'image too large')
	}
}
