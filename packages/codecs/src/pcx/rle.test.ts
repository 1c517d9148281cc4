import { DecodeError, DecodeErrorKind, MemoryStream } from '@rasterkit/core'
import { describe, expect, test } from 'vitest'
import { readRawScanline, RleDecoder } from './rle'
import { catchError, encodeRle } from './test-utils'

const decode = (bytes: number[], length: number) => {
	const stream = new MemoryStream(new Uint8Array(bytes))
	const buffer = new Uint8Array(length)
	new RleDecoder(stream).fill(buffer)
	return { buffer: Array.from(buffer), position: stream.tell() }
}

describe('RleDecoder', () => {
	test('emits bytes below 0xC0 as literals', () => {
		expect(decode([0x01, 0x02, 0x3f, 0xbf], 4)).toEqual({
			buffer: [0x01, 0x02, 0x3f, 0xbf],
			position: 4,
		})
	})

	test('decodes a run of length 1', () => {
		expect(decode([0xc1, 0xc5], 1)).toEqual({ buffer: [0xc5], position: 2 })
	})

	test('decodes the longest single-control run (63)', () => {
		const { buffer, position } = decode([0xff, 0x07], 63)
		expect(buffer).toEqual(new Array(63).fill(0x07))
		expect(position).toBe(2)
	})

	test('decodes a run split across two control bytes', () => {
		const { buffer, position } = decode([0xff, 0x09, 0xe5, 0x09], 100)
		expect(buffer).toEqual(new Array(100).fill(0x09))
		expect(position).toBe(4)
	})

	test('carries an unfinished run into the next fill', () => {
		const stream = new MemoryStream(new Uint8Array([0xc4, 0x55, 0x01]))
		const decoder = new RleDecoder(stream)
		const first = new Uint8Array(2)
		const second = new Uint8Array(3)

		decoder.fill(first)
		expect(decoder.pending).toBe(2)
		decoder.fill(second)

		expect(Array.from(first)).toEqual([0x55, 0x55])
		expect(Array.from(second)).toEqual([0x55, 0x55, 0x01])
		expect(decoder.pending).toBe(0)
	})

	test('treats 0xC0 as an empty run that consumes its value byte', () => {
		expect(decode([0xc0, 0xaa, 0x11], 1)).toEqual({ buffer: [0x11], position: 3 })
	})

	test('fails with Truncated when the control byte is missing', () => {
		const error = catchError(() => decode([0x01], 2))
		expect(error).toBeInstanceOf(DecodeError)
		expect(error).toMatchObject({ kind: DecodeErrorKind.TRUNCATED, message: 'file truncated' })
	})

	test('fails with Truncated when the value byte is missing', () => {
		const error = catchError(() => decode([0xc3], 1))
		expect(error).toMatchObject({ kind: DecodeErrorKind.TRUNCATED })
	})

	test('stops on a stream of empty runs instead of looping', () => {
		const error = catchError(() => decode([0xc0, 0x00, 0xc0, 0x00], 1))
		expect(error).toMatchObject({ kind: DecodeErrorKind.TRUNCATED })
	})

	test('reproduces encoded runs exactly', () => {
		const source = [...new Array(63).fill(0x20), 0xd0, 0x01, 0x01, ...new Array(70).fill(0xee)]
		const encoded = encodeRle(source)

		expect(encoded.slice(0, 2)).toEqual([0xff, 0x20])
		expect(decode(encoded, source.length)).toEqual({ buffer: source, position: encoded.length })
	})
})

describe('readRawScanline', () => {
	test('reads the whole buffer', () => {
		const stream = new MemoryStream(new Uint8Array([5, 6, 7, 8]))
		const buffer = new Uint8Array(3)
		readRawScanline(stream, buffer)
		expect(Array.from(buffer)).toEqual([5, 6, 7])
		expect(stream.tell()).toBe(3)
	})

	test('fails with Truncated on a short read', () => {
		const stream = new MemoryStream(new Uint8Array([5, 6]))
		const error = catchError(() => readRawScanline(stream, new Uint8Array(3)))
		expect(error).toMatchObject({ kind: DecodeErrorKind.TRUNCATED })
	})
})
