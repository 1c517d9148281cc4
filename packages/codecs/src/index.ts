import { defaultRegistry, type FormatRegistry } from '@rasterkit/core'
import { PcxCodec } from './pcx'

export * from './pcx'

/**
 * Every codec in this package, in detection order
 */
export const codecs = [PcxCodec] as const

/**
 * Add this package's codecs to a registry
 */
export function registerCodecs(registry: FormatRegistry = defaultRegistry): void {
	for (const codec of codecs) {
		registry.register(codec)
	}
}
