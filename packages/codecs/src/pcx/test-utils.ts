/**
 * Fixture builders for PCX tests
 */

import { createPcxHeader, serializePcxHeader } from './header'
import type { PcxHeader } from './types'

/**
 * Encode bytes with the PCX run-length scheme (runs capped at 63).
 * Values >= 0xC0 are always written as a run.
 */
export function encodeRle(data: ArrayLike<number>): number[] {
	const output: number[] = []
	let x = 0

	while (x < data.length) {
		const value = data[x] ?? 0
		let count = 1

		while (x + count < data.length && data[x + count] === value && count < 63) {
			count++
		}

		if (count > 1 || value >= 0xc0) {
			output.push(0xc0 | count, value)
		} else {
			output.push(value)
		}

		x += count
	}

	return output
}

/**
 * Header bytes followed by body and trailer bytes
 */
export function buildPcx(
	fields: Partial<PcxHeader>,
	body: ArrayLike<number>,
	trailer: ArrayLike<number> = []
): Uint8Array {
	const header = serializePcxHeader(createPcxHeader(fields))
	const output = new Uint8Array(header.length + body.length + trailer.length)
	output.set(header, 0)
	output.set(body, header.length)
	output.set(trailer, header.length + body.length)
	return output
}

/**
 * 768-byte palette table built from a color function
 */
export function buildVgaTable(color: (index: number) => [number, number, number]): number[] {
	const table: number[] = []
	for (let i = 0; i < 256; i++) {
		table.push(...color(i))
	}
	return table
}

/**
 * Run a function and return what it throws
 */
export function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	throw new Error('expected function to throw')
}
