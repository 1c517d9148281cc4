import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createPcxHeader, serializePcxHeader } from '@rasterkit/codecs'
import { FormatRegistry } from '@rasterkit/core'
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { parseArgs, run } from './index'

// 2x1, 24-bit, uncompressed
const rgbPcx = new Uint8Array([
	...serializePcxHeader(createPcxHeader({ encoding: 0, numPlanes: 3, xMax: 1, yMax: 0, bytesPerLine: 2 })),
	10, 11, 20, 21, 30, 31,
])

describe('cli', () => {
	let dir: string
	const io = { log: vi.fn(), error: vi.fn() }

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'rasterkit-'))
		io.log.mockReset()
		io.error.mockReset()
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('parses flags and inputs', () => {
		expect(parseArgs(['a.pcx', '-o', 'out', '--verbose', '--dry-run'])).toEqual({
			inputs: ['a.pcx'],
			options: { out: 'out', verbose: true, dryRun: true },
		})
	})

	test('rejects unknown options', () => {
		expect(run(['--bogus'], io, new FormatRegistry())).toBe(1)
		expect(io.error).toHaveBeenCalledWith('Error: Unknown option: --bogus')
	})

	test('converts a PCX file to PPM', () => {
		const input = join(dir, 'pic.pcx')
		const output = join(dir, 'pic.ppm')
		writeFileSync(input, rgbPcx)

		expect(run([input, output], io, new FormatRegistry())).toBe(0)

		const ppm = readFileSync(output)
		expect(ppm.subarray(0, 11).toString('latin1')).toBe('P6\n2 1\n255\n')
		expect(Array.from(ppm.subarray(11))).toEqual([10, 20, 30, 11, 21, 31])
	})

	test('names the output after the input', () => {
		const input = join(dir, 'title.pcx')
		writeFileSync(input, rgbPcx)

		expect(run([input, '--quiet'], io, new FormatRegistry())).toBe(0)
		expect(readFileSync(join(dir, 'title.ppm')).length).toBe(17)
		expect(io.log).not.toHaveBeenCalled()
	})

	test('creates a missing output directory', () => {
		const input = join(dir, 'pic.pcx')
		writeFileSync(input, rgbPcx)

		expect(run([input, '-o', join(dir, 'nested', 'out'), '--quiet'], io, new FormatRegistry())).toBe(0)
		expect(readFileSync(join(dir, 'nested', 'out', 'pic.ppm')).length).toBe(17)
	})

	test('refuses to overwrite without --overwrite', () => {
		const input = join(dir, 'pic.pcx')
		writeFileSync(input, rgbPcx)
		writeFileSync(join(dir, 'pic.ppm'), 'old')

		expect(run([input], io, new FormatRegistry())).toBe(1)
		expect(readFileSync(join(dir, 'pic.ppm'), 'utf8')).toBe('old')
	})

	test('reports decode failures per file', () => {
		const input = join(dir, 'bad.pcx')
		writeFileSync(input, rgbPcx.subarray(0, 130))

		expect(run([input], io, new FormatRegistry())).toBe(1)
		expect(io.error).toHaveBeenCalledWith(`${input}: file truncated`)
	})

	test('prints header info', () => {
		const input = join(dir, 'pic.pcx')
		writeFileSync(input, rgbPcx)

		expect(run(['--info', input], io, new FormatRegistry())).toBe(0)
		expect(io.log).toHaveBeenCalledWith('Dimensions: 2x1')
		expect(io.log).toHaveBeenCalledWith('Output:     rgb24')
	})

	test('lists formats', () => {
		expect(run(['--formats'], io, new FormatRegistry())).toBe(0)
		expect(io.log).toHaveBeenCalledWith('  pcx (.pcx)')
	})
})
