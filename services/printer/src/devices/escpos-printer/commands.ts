// services/printer/src/devices/escpos-printer/commands.ts
//
// Pure ESC/POS byte builders. Nothing here touches a transport or the
// in-memory style state.

import { CommandError } from './errors.js'
import { BarcodeSystem, type Alignment, type FontName, type LangCode, type RasterBitmap } from './types.js'

/** ASCII DLE (Data Link Escape) */
export const DLE = 0x10
/** ASCII EOT (End Of Transmission) */
export const EOT = 0x04
export const ESC = 0x1b
export const FS = 0x1c
/** ASCII GS (Group Separator) */
export const GS = 0x1d
export const NUL = 0x00

/** Printer-side end-of-job marker */
export const END_MARKER = 0xfa

export const MAX_FONT_SCALE = 7
export const MAX_MARGIN_LEFT = 47

/** 16-bit length field, which also counts the m and fn bytes */
export const MAX_GRAPHICS_PAYLOAD = 0xffff - 2

/** Graphics function bytes used with gSend (m = 0x30) */
export const GRAPHICS_MODE = 0x30
/** ESC ( L */
export const GRAPHICS_PREFIX_LENGTH = 3
export const FN_STORE_RASTER = 0x70
export const FN_PRINT_STORED = 0x32

/* -------------------------------------------------------------------------- */
/*  Enumerated lookups                                                         */
/* -------------------------------------------------------------------------- */

export const FONT_INDEX: Record<FontName, number> = { A: 0, B: 1, C: 2 }

export const ALIGN_INDEX: Record<Alignment, number> = { left: 0, center: 1, right: 2 }

export const LANG_INDEX: Record<LangCode, number> = {
    en: 0,
    fr: 1,
    de: 2,
    uk: 3,
    da: 4,
    sv: 5,
    it: 6,
    es: 7,
    ja: 8,
    no: 9,
}

/** GS k type byte per barcode format number; the type byte is the format itself. */
export const BARCODE_TYPE: ReadonlyMap<number, number> = new Map(
    Object.values(BarcodeSystem).map((format): [number, number] => [format, format])
)

function lookup(table: Readonly<Record<string, number>>, key: string): number {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] ?? 0 : 0
}

/** Unknown names select font A. */
export function resolveFont(name: string): number {
    return lookup(FONT_INDEX, name)
}

/** Unknown names align left. */
export function resolveAlign(name: string): number {
    return lookup(ALIGN_INDEX, name)
}

/** Unknown codes select the USA character set. */
export function resolveLang(code: string): number {
    return lookup(LANG_INDEX, code)
}

/* -------------------------------------------------------------------------- */
/*  Byte helpers                                                               */
/* -------------------------------------------------------------------------- */

export function toByte(v: number): number {
    return Math.trunc(v) & 0xff
}

/** Little-endian low/high pair, each truncated to a byte. */
export function lowHigh(v: number): [number, number] {
    const n = Math.trunc(v)
    return [toByte(n % 256), toByte(Math.floor(n / 256))]
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
    const total = parts.reduce((sum, p) => sum + p.length, 0)
    const out = new Uint8Array(total)
    let offset = 0
    for (const p of parts) {
        out.set(p, offset)
        offset += p.length
    }
    return out
}

function seq(...bytes: number[]): Uint8Array {
    return Uint8Array.from(bytes, toByte)
}

/* -------------------------------------------------------------------------- */
/*  Fixed control sequences                                                    */
/* -------------------------------------------------------------------------- */

export const cmd = {
    init: (): Uint8Array => seq(ESC, 0x40),
    end: (): Uint8Array => seq(END_MARKER),
    cut: (): Uint8Array => seq(GS, 0x56, 0x41, 0x30),
    cutPartial: (): Uint8Array => seq(GS, 0x56, 0x01),
    openDrawer: (): Uint8Array => seq(ESC, 0x70, 0x00, 0x0a, 0x0a),
    cash: (): Uint8Array => seq(ESC, 0x70, 0x00, 0x0a, 0xff),
    // t=2, i.e. 2 × 2 ms on pin 2
    pulse: (): Uint8Array => seq(ESC, 0x70, 0x02),
    formfeedN: (n: number): Uint8Array => seq(ESC, 0x64, n),
    font: (index: number): Uint8Array => seq(ESC, 0x4d, index),
    fontSize: (width: number, height: number): Uint8Array => seq(GS, 0x21, (width << 4) | height),
    fontStyle: (style: number): Uint8Array => seq(ESC, 0x21, style),
    letterSpace: (n: number): Uint8Array => seq(ESC, 0x20, n),
    fontColor: (color: number): Uint8Array => seq(ESC, 0x72, color),
    underline: (v: number): Uint8Array => seq(ESC, 0x2d, v),
    emphasize: (v: number): Uint8Array => seq(ESC, 0x47, v),
    upsideDown: (v: number): Uint8Array => seq(ESC, 0x7b, v),
    rotate: (v: number): Uint8Array => seq(ESC, 0x52, v),
    reverse: (v: number): Uint8Array => seq(GS, 0x42, v),
    smooth: (v: number): Uint8Array => seq(GS, 0x62, v),
    moveX: (x: number): Uint8Array => seq(ESC, 0x24, ...lowHigh(x)),
    moveY: (y: number): Uint8Array => seq(GS, 0x24, ...lowHigh(y)),
    marginLeft: (size: number): Uint8Array => seq(GS, 0x4c, ...lowHigh(size)),
    align: (index: number): Uint8Array => seq(ESC, 0x61, index),
    // same ESC R as rotate; the printer reads it as the character set
    lang: (index: number): Uint8Array => seq(ESC, 0x52, index),
    chineseOn: (): Uint8Array => seq(FS, 0x26),
    status: (n: number): Uint8Array => seq(DLE, EOT, n),
    graphicsPrefix: (): Uint8Array => seq(ESC, 0x28, 0x4c),
    barcodePrefix: (): Uint8Array => seq(GS, 0x6b),
} as const

/* -------------------------------------------------------------------------- */
/*  Framed commands                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Four-byte graphics header: 16-bit little-endian length (data + m + fn),
 * then the mode and function bytes.
 */
export function graphicsHeader(m: number, fn: number, dataLength: number): Uint8Array {
    if (dataLength > MAX_GRAPHICS_PAYLOAD) {
        throw new CommandError(
            `graphics payload of ${dataLength} bytes exceeds ${MAX_GRAPHICS_PAYLOAD}`
        )
    }
    const l = dataLength + 2
    return seq(l % 256, Math.floor(l / 256), m, fn)
}

/** `ESC ( L pL pH m fn data…` as one buffer. */
export function frameGraphics(m: number, fn: number, data: Uint8Array): Uint8Array {
    return concatBytes(cmd.graphicsPrefix(), graphicsHeader(m, fn, data.length), data)
}

/**
 * Parameter block for "store raster graphics" (fn 0x70):
 * tone a=0x30, scale bx=by=1, colour c=0x31, then width and height in dots.
 */
export function rasterPayload(bitmap: RasterBitmap): Uint8Array {
    const { width, height, data } = bitmap
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
        throw new CommandError(`invalid raster size ${width}x${height}`)
    }
    const expected = Math.ceil(width / 8) * height
    if (data.length !== expected) {
        throw new CommandError(
            `raster data is ${data.length} bytes, expected ${expected} for ${width}x${height}`
        )
    }
    return concatBytes(seq(0x30, 0x01, 0x01, 0x31, ...lowHigh(width), ...lowHigh(height)), data)
}
