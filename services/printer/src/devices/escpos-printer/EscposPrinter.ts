// services/printer/src/devices/escpos-printer/EscposPrinter.ts

import {
    BARCODE_TYPE,
    GRAPHICS_PREFIX_LENGTH,
    FN_PRINT_STORED,
    FN_STORE_RASTER,
    GRAPHICS_MODE,
    MAX_FONT_SCALE,
    MAX_MARGIN_LEFT,
    NUL,
    cmd,
    concatBytes,
    frameGraphics,
    rasterPayload,
    resolveAlign,
    resolveFont,
    resolveLang,
    toByte,
} from './commands.js'
import { TransportError, errorMessage } from './errors.js'
import { decodeStatus } from './status.js'
import { TextCodec, decodeTextEntities } from './text.js'
import type {
    Alignment,
    BarcodeFormat,
    DecodedStatus,
    EscposEvent,
    EscposEventSink,
    EscposStyleState,
    FeedMode,
    FontName,
    LangCode,
    PrinterTransport,
    RasterBitmap,
    StatusKind,
} from './types.js'

interface EscposPrinterDeps {
    transport: PrinterTransport
    events?: EscposEventSink
    /** Defaults to GB18030 */
    codec?: TextCodec
}

const NOOP_SINK: EscposEventSink = { publish: () => undefined }

function defaultStyle(): EscposStyleState {
    return {
        width: 1,
        height: 1,
        underline: 0,
        emphasize: 0,
        upsideDown: 0,
        rotate: 0,
        reverse: 0,
        smooth: 0,
    }
}

/**
 * EscposPrinter
 *
 * Stateful ESC/POS encoder over a caller-owned transport. Style setters
 * update the in-memory mirror and transmit the matching command in the same
 * call; nothing is buffered, batched or retried.
 *
 * Every write or read failure rejects with a TransportError. When a setter
 * rejects, its state change has already been applied, so the mirror may be
 * ahead of the printer until the caller calls init() again.
 *
 * Not safe for concurrent use: mutation and transmission are separate steps.
 * Use one instance per connection and await each call before the next.
 * Nothing stops calls after end(); that is the caller's responsibility.
 */
export class EscposPrinter {
    private readonly transport: PrinterTransport
    private readonly events: EscposEventSink
    private readonly codec: TextCodec

    private style: EscposStyleState = defaultStyle()

    constructor(deps: EscposPrinterDeps) {
        this.transport = deps.transport
        this.events = deps.events ?? NOOP_SINK
        this.codec = deps.codec ?? new TextCodec()
        this.reset()
    }

    /* ---------------------------------------------------------------------- */
    /*  State & lifecycle                                                      */
    /* ---------------------------------------------------------------------- */

    /** Restore power-on defaults in memory only; transmits nothing. */
    public reset(): void {
        this.style = defaultStyle()
    }

    /** Snapshot of the style state the printer is believed to hold. */
    public getStyle(): EscposStyleState {
        return { ...this.style }
    }

    public get encoding(): string {
        return this.codec.encoding
    }

    /** Reset, then send ESC @. Call this before anything else. */
    public async init(): Promise<void> {
        this.reset()
        await this.send('init', cmd.init())
    }

    public async end(): Promise<void> {
        await this.send('end', cmd.end())
    }

    /* ---------------------------------------------------------------------- */
    /*  Output primitives                                                      */
    /* ---------------------------------------------------------------------- */

    /** Forward bytes untouched. Empty input is not written. */
    public async writeRaw(data: Uint8Array): Promise<number> {
        return this.send('writeRaw', data)
    }

    /** Transcode text into the printer charset and write it. */
    public async write(text: string): Promise<number> {
        return this.send('write', this.codec.encode(text))
    }

    public async readRaw(buffer: Uint8Array): Promise<number> {
        try {
            return await this.transport.read(buffer)
        } catch (err) {
            this.publish({ kind: 'transport-error', at: Date.now(), operation: 'read', error: errorMessage(err) })
            throw new TransportError('transport-read', `transport read failed: ${errorMessage(err)}`, err)
        }
    }

    /** Write text after decoding &lt; &gt; &amp; &quot; &apos; and tab/linefeed entities. */
    public async printText(text: string): Promise<number> {
        return this.send('printText', this.codec.encode(decodeTextEntities(text)))
    }

    /* ---------------------------------------------------------------------- */
    /*  Paper handling & peripherals                                           */
    /* ---------------------------------------------------------------------- */

    public async cut(): Promise<void> {
        await this.send('cut', cmd.cut())
    }

    public async cutPartial(): Promise<void> {
        await this.send('cutPartial', cmd.cutPartial())
    }

    public async openDrawer(): Promise<void> {
        await this.send('openDrawer', cmd.openDrawer())
    }

    public async cash(): Promise<void> {
        await this.send('cash', cmd.cash())
    }

    public async pulse(): Promise<void> {
        await this.send('pulse', cmd.pulse())
    }

    public async linefeed(): Promise<void> {
        await this.send('linefeed', this.codec.encode('\n'))
    }

    /** ESC d n; n wraps to a single byte. */
    public async formfeedN(n: number): Promise<void> {
        await this.send('formfeedN', cmd.formfeedN(n))
    }

    public async formfeed(): Promise<void> {
        await this.formfeedN(1)
    }

    public async feedAndCut(mode: FeedMode = 'cut'): Promise<void> {
        if (mode === 'feed') {
            await this.formfeed()
        }
        await this.cut()
    }

    public async moveX(x: number): Promise<void> {
        await this.send('moveX', cmd.moveX(x))
    }

    public async moveY(y: number): Promise<void> {
        await this.send('moveY', cmd.moveY(y))
    }

    /* ---------------------------------------------------------------------- */
    /*  Font & style                                                           */
    /* ---------------------------------------------------------------------- */

    /** Unknown names fall back to font A. */
    public async setFont(font: FontName | string): Promise<void> {
        await this.send('setFont', cmd.font(resolveFont(font)))
    }

    /** Both axes must be integers in 0..7, otherwise nothing happens. */
    public async setFontSize(width: number, height: number): Promise<void> {
        if (!isScale(width) || !isScale(height)) return
        this.style.width = width
        this.style.height = height
        await this.sendFontSize()
    }

    public async sendFontSize(): Promise<void> {
        await this.send('setFontSize', cmd.fontSize(this.style.width, this.style.height))
    }

    /** ESC ! n print mode byte; does not touch width/height. */
    public async setFontStyle(style: number): Promise<void> {
        await this.send('setFontStyle', cmd.fontStyle(style))
    }

    public async setLetterSpace(n: number): Promise<void> {
        await this.send('setLetterSpace', cmd.letterSpace(n))
    }

    public async setFontColor(color: number): Promise<void> {
        await this.send('setFontColor', cmd.fontColor(color))
    }

    public async setUnderline(v: number): Promise<void> {
        this.style.underline = toByte(v)
        await this.send('setUnderline', cmd.underline(this.style.underline))
    }

    public async setEmphasize(v: number): Promise<void> {
        this.style.emphasize = toByte(v)
        await this.send('setEmphasize', cmd.emphasize(this.style.emphasize))
    }

    public async setUpsideDown(v: number): Promise<void> {
        this.style.upsideDown = toByte(v)
        await this.send('setUpsideDown', cmd.upsideDown(this.style.upsideDown))
    }

    public async setRotate(v: number): Promise<void> {
        this.style.rotate = toByte(v)
        await this.send('setRotate', cmd.rotate(this.style.rotate))
    }

    public async setReverse(v: number): Promise<void> {
        this.style.reverse = toByte(v)
        await this.send('setReverse', cmd.reverse(this.style.reverse))
    }

    public async setSmooth(v: number): Promise<void> {
        this.style.smooth = toByte(v)
        await this.send('setSmooth', cmd.smooth(this.style.smooth))
    }

    /* ---------------------------------------------------------------------- */
    /*  Layout & character set                                                 */
    /* ---------------------------------------------------------------------- */

    /** Unknown names align left. */
    public async setAlign(align: Alignment | string): Promise<void> {
        await this.send('setAlign', cmd.align(resolveAlign(align)))
    }

    /** Sizes above 47 (or negative/fractional) are ignored. */
    public async setMarginLeft(size: number): Promise<void> {
        if (!Number.isInteger(size) || size < 0 || size > MAX_MARGIN_LEFT) return
        await this.send('setMarginLeft', cmd.marginLeft(size))
    }

    /** Unknown codes select the USA set (index 0). */
    public async setLang(lang: LangCode | string): Promise<void> {
        await this.send('setLang', cmd.lang(resolveLang(lang)))
    }

    public async setChineseOn(): Promise<void> {
        await this.send('setChineseOn', cmd.chineseOn())
    }

    /* ---------------------------------------------------------------------- */
    /*  Barcodes & graphics                                                    */
    /* ---------------------------------------------------------------------- */

    /**
     * Print a barcode with GS k.
     *
     * Formats above 69 use the length-prefixed form (length as decimal text),
     * formats below 69 the NUL-terminated form, and 69 sends no frame. The
     * value is always written once more as plain text after the frame.
     *
     * Style is reset in memory only (not retransmitted) and alignment is
     * switched to center.
     */
    public async barcode(value: string, format: BarcodeFormat | number): Promise<void> {
        const type = BARCODE_TYPE.get(format)
        if (type === undefined) {
            this.publish({ kind: 'unknown-barcode-format', at: Date.now(), format })
        }
        const code = type === undefined ? new Uint8Array(0) : Uint8Array.of(type)

        this.reset()
        await this.setAlign('center')

        if (format > 69) {
            const length = Buffer.byteLength(value, 'utf8')
            await this.send(
                'barcode',
                concatBytes(cmd.barcodePrefix(), code, this.codec.encode(`${length}${value}`))
            )
        } else if (format < 69) {
            await this.send(
                'barcode',
                concatBytes(cmd.barcodePrefix(), code, this.codec.encode(value), Uint8Array.of(NUL))
            )
        }

        await this.write(value)
    }

    /**
     * Send one graphics sub-command: ESC ( L, then pL pH m fn, then `data`
     * untransformed. Oversized payloads throw CommandError before any byte
     * is written.
     */
    public async gSend(m: number, fn: number, data: Uint8Array): Promise<void> {
        const frame = frameGraphics(m, fn, data)
        const headerEnd = GRAPHICS_PREFIX_LENGTH + 4
        await this.send('gSend', frame.subarray(0, GRAPHICS_PREFIX_LENGTH))
        await this.send('gSend', frame.subarray(GRAPHICS_PREFIX_LENGTH, headerEnd))
        await this.writeRaw(frame.subarray(headerEnd))
    }

    /** Store a rasterized bitmap in the print buffer (fn 0x70). */
    public async storeRasterGraphics(bitmap: RasterBitmap): Promise<void> {
        await this.gSend(GRAPHICS_MODE, FN_STORE_RASTER, rasterPayload(bitmap))
    }

    /** Print whatever storeRasterGraphics buffered (fn 0x32). */
    public async printStoredGraphics(): Promise<void> {
        await this.gSend(GRAPHICS_MODE, FN_PRINT_STORED, new Uint8Array(0))
    }

    /* ---------------------------------------------------------------------- */
    /*  Status                                                                 */
    /* ---------------------------------------------------------------------- */

    /**
     * Send DLE EOT n and read exactly one status byte. Unread bytes left on
     * the transport are discarded first so a late reply to an earlier request
     * is not taken as this one. Rejects with a TransportError when the read
     * fails or yields nothing.
     */
    public async readStatus(n: number): Promise<number> {
        this.transport.discardBuffered?.()
        await this.send('readStatus', cmd.status(n))

        const data = new Uint8Array(1)
        const read = await this.readRaw(data)
        if (read < 1) {
            this.publish({ kind: 'transport-error', at: Date.now(), operation: 'read', error: 'no status byte' })
            throw new TransportError('transport-read', `printer returned no status byte for n=${n}`)
        }

        const status = data[0]
        this.publish({ kind: 'status-read', at: Date.now(), n, status })
        return status
    }

    public async queryStatus(n: StatusKind): Promise<DecodedStatus> {
        return decodeStatus(n, await this.readStatus(n))
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                              */
    /* ---------------------------------------------------------------------- */

    private async send(command: string, data: Uint8Array): Promise<number> {
        if (data.length === 0) return 0

        let written: number
        try {
            written = await this.transport.write(data)
        } catch (err) {
            this.publish({ kind: 'transport-error', at: Date.now(), operation: 'write', error: errorMessage(err) })
            throw new TransportError('transport-write', `${command}: transport write failed: ${errorMessage(err)}`, err)
        }

        this.publish({ kind: 'command-sent', at: Date.now(), command, bytes: written })
        return written
    }

    private publish(event: EscposEvent): void {
        this.events.publish(event)
    }
}

function isScale(v: number): boolean {
    return Number.isInteger(v) && v >= 0 && v <= MAX_FONT_SCALE
}
