/**
 * rasterkit CLI - inspect and convert legacy raster images
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import {
	defaultRegistry,
	type FormatRegistry,
	MemoryStream,
	type Surface,
	surfaceToRgb,
} from '@rasterkit/core'
import { readPcxInfo, registerCodecs } from '@rasterkit/codecs'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	out?: string
	overwrite?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	dryRun?: boolean

	// Commands
	info?: boolean
	formats?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Where output goes; `console` by default
 */
export interface CliIO {
	log(message: string): void
	error(message: string): void
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const HELP = `
rasterkit - Legacy raster image decoder

USAGE:
  rasterkit <input> [output.ppm]      Convert to binary PPM
  rasterkit <inputs...> -o <dir>      Convert several files into a directory
  rasterkit --info <file>             Show header info
  rasterkit --formats                 List supported formats

OPTIONS:
  -o, --out <dir>       Output directory
  -i, --info            Show header info instead of converting
  --overwrite           Overwrite existing files
  --dry-run             Show what would be done without doing it
  -v, --verbose         Verbose output (includes decoder diagnostics)
  --quiet               Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  rasterkit title.pcx                  # Writes title.ppm
  rasterkit title.pcx shot.ppm         # Explicit output name
  rasterkit a.pcx b.pcx -o out/        # Batch into out/
  rasterkit --info title.pcx           # Show header fields
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--formats') {
			options.formats = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--dry-run') {
			options.dryRun = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if ((arg === '--out' || arg === '-o') && args[i + 1]) {
			options.out = args[++i]
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Image Loading/Saving
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Binary PPM (P6) of a surface
 */
export function encodePpm(surface: Surface): Uint8Array {
	const header = new TextEncoder().encode(`P6\n${surface.width} ${surface.height}\n255\n`)
	const rgb = surfaceToRgb(surface)
	const output = new Uint8Array(header.length + rgb.length)
	output.set(header, 0)
	output.set(rgb, header.length)
	return output
}

function loadSurface(registry: FormatRegistry, path: string, verbose: boolean): Surface {
	const stream = new MemoryStream(readFileSync(path))
	return registry.load(stream, verbose ? { logger: console } : {})
}

function outputPathFor(input: string, options: CliOptions): string {
	const name = `${basename(input, extname(input))}.ppm`
	return join(options.out ?? dirname(input), name)
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function showFormats(registry: FormatRegistry, io: CliIO): void {
	io.log('Decode:')
	for (const codec of registry.list()) {
		io.log(`  ${codec.name} (.${codec.extensions.join(', .')})`)
	}
	io.log('Encode:')
	io.log('  ppm')
}

function showInfo(path: string, io: CliIO): void {
	const info = readPcxInfo(new MemoryStream(readFileSync(path)))
	io.log(`File:       ${path}`)
	io.log(`Format:     PCX v${info.version} (${info.encoding === 1 ? 'RLE' : 'uncompressed'})`)
	io.log(`Dimensions: ${info.width}x${info.height}`)
	io.log(`Depth:      ${info.bitsPerPixel} bit x ${info.numPlanes} plane(s) = ${info.srcBits} bit`)
	io.log(`Line bytes: ${info.bytesPerLine}`)
	io.log(`DPI:        ${info.hDpi}x${info.vDpi}`)
	io.log(`Output:     ${info.format ?? 'unsupported'}`)
}

function convertFile(
	registry: FormatRegistry,
	input: string,
	output: string,
	options: CliOptions,
	io: CliIO
): void {
	if (existsSync(output) && !options.overwrite) {
		throw new Error(`Output exists: ${output} (use --overwrite)`)
	}

	if (options.dryRun) {
		io.log(`Would convert ${input} -> ${output}`)
		return
	}

	const surface = loadSurface(registry, input, options.verbose ?? false)
	mkdirSync(dirname(output), { recursive: true })
	writeFileSync(output, encodePpm(surface))

	if (!options.quiet) {
		io.log(`${input} -> ${output} (${surface.width}x${surface.height} ${surface.format})`)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI; returns the exit code
 */
export function run(args: string[], io: CliIO = console, registry: FormatRegistry = defaultRegistry): number {
	try {
		const { inputs, options } = parseArgs(args)
		registerCodecs(registry)

		if (options.help) {
			io.log(HELP)
			return 0
		}
		if (options.version) {
			io.log(VERSION)
			return 0
		}
		if (options.formats) {
			showFormats(registry, io)
			return 0
		}
		if (inputs.length === 0) {
			io.error('No input files. Use --help for usage.')
			return 1
		}

		if (options.info) {
			for (const input of inputs) showInfo(input, io)
			return 0
		}

		// A second positional argument ending in .ppm names the output of a single input
		const [first, second] = inputs
		if (first && second && inputs.length === 2 && extname(second).toLowerCase() === '.ppm' && !options.out) {
			convertFile(registry, first, second, options, io)
			return 0
		}

		let failed = 0
		for (const input of inputs) {
			try {
				convertFile(registry, input, outputPathFor(input, options), options, io)
			} catch (error) {
				failed++
				io.error(`${input}: ${error instanceof Error ? error.message : String(error)}`)
			}
		}
		return failed > 0 ? 1 : 0
	} catch (error) {
		io.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
		return 1
	}
}
