import type { ImageCodec } from '@rasterkit/core'
import { decodePcx, isPcx } from './decoder'

/**
 * PCX (PC Paintbrush) codec, decode only
 */
export const PcxCodec: ImageCodec = {
	name: 'pcx',
	extensions: ['pcx'],

	sniff(stream) {
		return isPcx(stream)
	},

	decode(stream, options) {
		return decodePcx(stream, options)
	},
}
