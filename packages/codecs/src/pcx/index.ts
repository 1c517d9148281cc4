export { PcxCodec } from './codec'
export { decodePcx, isPcx, isPcxHeader, readPcxInfo } from './decoder'
export { createPcxHeader, parsePcxHeader, serializePcxHeader } from './header'
export { getPaletteSize, resolvePalette } from './palette'
export { copyIndexed8, unpackPlanarBits, unpackRgb24 } from './planes'
export { readRawScanline, RleDecoder } from './rle'
export * from './types'
