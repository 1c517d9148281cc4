import type { DecodeLimits } from './limits'
import type { ByteStream } from './stream'
import type { Logger, Surface } from './types'

/**
 * Per-call decode options
 */
export interface DecodeOptions {
	/** Receives debug output and recoverable anomalies */
	logger?: Logger
	limits?: Partial<DecodeLimits>
}

/**
 * Decoder entry points exposed to the registry
 */
export interface ImageCodec {
	/** Format name, e.g. 'pcx' */
	readonly name: string
	/** File extensions without the dot */
	readonly extensions: readonly string[]
	/** Non-destructive signature check; must restore the stream position */
	sniff(stream: ByteStream): boolean
	/** Full decode; throws DecodeError and restores the stream position on failure */
	decode(stream: ByteStream, options?: DecodeOptions): Surface
}

/**
 * Ordered set of codecs tried by detectFormat / loadImage
 */
export class FormatRegistry {
	private readonly codecs: ImageCodec[] = []
	private lastError: string | null = null

	register(codec: ImageCodec): void {
		const existing = this.codecs.findIndex((c) => c.name === codec.name)
		if (existing >= 0) {
			this.codecs[existing] = codec
		} else {
			this.codecs.push(codec)
		}
	}

	list(): readonly ImageCodec[] {
		return this.codecs
	}

	get(name: string): ImageCodec | undefined {
		return this.codecs.find((c) => c.name === name)
	}

	/**
	 * Find a codec by file extension (case insensitive, with or without dot)
	 */
	getByExtension(extension: string): ImageCodec | undefined {
		const ext = extension.replace(/^\./, '').toLowerCase()
		return this.codecs.find((c) => c.extensions.includes(ext))
	}

	/**
	 * First codec whose sniff accepts the stream
	 */
	detect(stream: ByteStream): ImageCodec | null {
		for (const codec of this.codecs) {
			if (codec.sniff(stream)) return codec
		}
		return null
	}

	/**
	 * Detect and decode. The failure reason is kept for getLastError().
	 */
	load(stream: ByteStream, options?: DecodeOptions): Surface {
		try {
			const codec = this.detect(stream)
			if (!codec) {
				throw new Error('unknown image format')
			}
			const surface = codec.decode(stream, options)
			this.lastError = null
			return surface
		} catch (error) {
			this.lastError = error instanceof Error ? error.message : String(error)
			throw error
		}
	}

	getLastError(): string | null {
		return this.lastError
	}
}

/**
 * Shared registry
 */
export const defaultRegistry = new FormatRegistry()

export function registerFormat(codec: ImageCodec): void {
	defaultRegistry.register(codec)
}

export function detectFormat(stream: ByteStream): string | null {
	return defaultRegistry.detect(stream)?.name ?? null
}

export function loadImage(stream: ByteStream, options?: DecodeOptions): Surface {
	return defaultRegistry.load(stream, options)
}

export function getLastError(): string | null {
	return defaultRegistry.getLastError()
}
