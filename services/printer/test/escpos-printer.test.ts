import { beforeEach, describe, expect, it } from 'vitest'

import { EscposPrinter } from '../src/devices/escpos-printer/EscposPrinter.js'
import { frameGraphics } from '../src/devices/escpos-printer/commands.js'
import { CommandError, TransportError } from '../src/devices/escpos-printer/errors.js'
import { BarcodeSystem, type EscposEvent } from '../src/devices/escpos-printer/types.js'
import { ascii, MemoryTransport } from './helpers/memory-transport.js'

const CUT = [0x1d, 0x56, 0x41, 0x30]

describe('EscposPrinter', () => {
    let transport: MemoryTransport
    let events: EscposEvent[]
    let printer: EscposPrinter

    beforeEach(() => {
        transport = new MemoryTransport()
        events = []
        printer = new EscposPrinter({ transport, events: { publish: evt => { events.push(evt) } } })
    })

    describe('lifecycle', () => {
        it('starts from power-on defaults', () => {
            expect(printer.getStyle()).toEqual({
                width: 1,
                height: 1,
                underline: 0,
                emphasize: 0,
                upsideDown: 0,
                rotate: 0,
                reverse: 0,
                smooth: 0,
            })
            expect(transport.writes).toEqual([])
        })

        it('init resets state and sends ESC @', async () => {
            await printer.setEmphasize(1)
            await printer.setFontSize(3, 4)
            transport.clear()

            await printer.init()

            expect(transport.writes).toEqual([[0x1b, 0x40]])
            expect(printer.getStyle().emphasize).toBe(0)
            expect(printer.getStyle().width).toBe(1)
        })

        it('reset transmits nothing', async () => {
            await printer.setUnderline(1)
            transport.clear()

            printer.reset()

            expect(transport.writes).toEqual([])
            expect(printer.getStyle().underline).toBe(0)
        })

        it('produces identical bytes for repeated reset + init', async () => {
            printer.reset()
            await printer.init()
            const first = transport.bytes()
            transport.clear()

            printer.reset()
            await printer.init()

            expect(transport.bytes()).toEqual(first)
        })

        it('end sends the 0xFA marker as a single raw byte', async () => {
            await printer.end()
            expect(transport.writes).toEqual([[0xfa]])
        })
    })

    describe('font size', () => {
        it('packs every valid width/height pair into one byte', async () => {
            for (let w = 0; w <= 7; w += 1) {
                for (let h = 0; h <= 7; h += 1) {
                    transport.clear()
                    await printer.setFontSize(w, h)
                    expect(transport.writes).toEqual([[0x1d, 0x21, (w << 4) | h]])
                    expect(printer.getStyle()).toMatchObject({ width: w, height: h })
                }
            }
        })

        it('ignores out-of-range sizes without sending or mutating', async () => {
            await printer.setFontSize(2, 3)
            transport.clear()

            await printer.setFontSize(8, 1)
            await printer.setFontSize(1, 8)
            await printer.setFontSize(-1, 1)
            await printer.setFontSize(1.5, 1)

            expect(transport.writes).toEqual([])
            expect(printer.getStyle()).toMatchObject({ width: 2, height: 3 })
        })

        it('setFontStyle sends ESC ! without touching width/height', async () => {
            await printer.setFontStyle(0x38)
            expect(transport.writes).toEqual([[0x1b, 0x21, 0x38]])
            expect(printer.getStyle()).toMatchObject({ width: 1, height: 1 })
        })
    })

    describe('toggles', () => {
        const cases = [
            ['setUnderline', 'underline', [0x1b, 0x2d]],
            ['setEmphasize', 'emphasize', [0x1b, 0x47]],
            ['setUpsideDown', 'upsideDown', [0x1b, 0x7b]],
            ['setRotate', 'rotate', [0x1b, 0x52]],
            ['setReverse', 'reverse', [0x1d, 0x42]],
            ['setSmooth', 'smooth', [0x1d, 0x62]],
        ] as const

        for (const [method, field, prefix] of cases) {
            it(`${method} stores the value and embeds it in the command`, async () => {
                await printer[method](2)
                expect(transport.writes).toEqual([[...prefix, 2]])
                expect(printer.getStyle()[field]).toBe(2)

                transport.clear()
                await printer[method](0)
                expect(transport.writes).toEqual([[...prefix, 0]])
                expect(printer.getStyle()[field]).toBe(0)
            })
        }

        it('masks toggle values to a byte so state matches what was sent', async () => {
            await printer.setUnderline(300)
            expect(transport.writes).toEqual([[0x1b, 0x2d, 44]])
            expect(printer.getStyle().underline).toBe(44)
        })

        it('keeps values above 0x7f as single bytes', async () => {
            await printer.setReverse(0xff)
            expect(transport.writes).toEqual([[0x1d, 0x42, 0xff]])
        })
    })

    describe('enumerated settings', () => {
        it('selects fonts and falls back to A', async () => {
            await printer.setFont('B')
            await printer.setFont('C')
            await printer.setFont('Z')
            expect(transport.writes).toEqual([
                [0x1b, 0x4d, 1],
                [0x1b, 0x4d, 2],
                [0x1b, 0x4d, 0],
            ])
        })

        it('aligns and falls back to left', async () => {
            await printer.setAlign('right')
            await printer.setAlign('center')
            await printer.setAlign('middle')
            expect(transport.writes).toEqual([
                [0x1b, 0x61, 2],
                [0x1b, 0x61, 1],
                [0x1b, 0x61, 0],
            ])
        })

        it('selects character sets and falls back to en', async () => {
            await printer.setLang('ja')
            await printer.setLang('no')
            await printer.setLang('xx')
            expect(transport.writes).toEqual([
                [0x1b, 0x52, 8],
                [0x1b, 0x52, 9],
                [0x1b, 0x52, 0],
            ])
        })
    })

    describe('layout', () => {
        it('sends the left margin as a little-endian pair up to 47', async () => {
            await printer.setMarginLeft(47)
            await printer.setMarginLeft(0)
            expect(transport.writes).toEqual([
                [0x1d, 0x4c, 47, 0],
                [0x1d, 0x4c, 0, 0],
            ])
        })

        it('ignores margins above 47', async () => {
            await printer.setMarginLeft(48)
            await printer.setMarginLeft(-1)
            expect(transport.writes).toEqual([])
        })

        it('moves the cursor with low/high bytes', async () => {
            await printer.moveX(300)
            await printer.moveY(5)
            expect(transport.writes).toEqual([
                [0x1b, 0x24, 44, 1],
                [0x1d, 0x24, 5, 0],
            ])
        })

        it('sends letter spacing and colour raw', async () => {
            await printer.setLetterSpace(4)
            await printer.setFontColor(1)
            expect(transport.writes).toEqual([
                [0x1b, 0x20, 4],
                [0x1b, 0x72, 1],
            ])
        })

        it('switches to Chinese character mode with FS &', async () => {
            await printer.setChineseOn()
            expect(transport.writes).toEqual([[0x1c, 0x26]])
        })
    })

    describe('paper and drawer', () => {
        it('sends fixed control sequences', async () => {
            await printer.cut()
            await printer.cutPartial()
            await printer.openDrawer()
            await printer.cash()
            await printer.pulse()
            await printer.linefeed()
            await printer.formfeed()
            expect(transport.writes).toEqual([
                CUT,
                [0x1d, 0x56, 0x01],
                [0x1b, 0x70, 0x00, 0x0a, 0x0a],
                [0x1b, 0x70, 0x00, 0x0a, 0xff],
                [0x1b, 0x70, 0x02],
                [0x0a],
                [0x1b, 0x64, 1],
            ])
        })

        it('wraps formfeed counts above 255', async () => {
            await printer.formfeedN(259)
            expect(transport.writes).toEqual([[0x1b, 0x64, 3]])
        })

        it('cuts only when not asked to feed', async () => {
            await printer.feedAndCut('cut')
            expect(transport.writes).toEqual([CUT])
        })

        it('feeds before cutting when asked to', async () => {
            await printer.feedAndCut('feed')
            expect(transport.writes).toEqual([[0x1b, 0x64, 1], CUT])
        })
    })

    describe('text', () => {
        it('transcodes text to GB18030', async () => {
            const written = await printer.write('中A')
            expect(written).toBe(3)
            expect(transport.writes).toEqual([[0xd6, 0xd0, 0x41]])
        })

        it('does not write empty payloads', async () => {
            expect(await printer.writeRaw(new Uint8Array(0))).toBe(0)
            expect(await printer.write('')).toBe(0)
            expect(transport.writes).toEqual([])
        })

        it('forwards raw bytes untouched', async () => {
            await printer.writeRaw(Uint8Array.of(0x80, 0xff, 0x00))
            expect(transport.writes).toEqual([[0x80, 0xff, 0x00]])
        })

        it('decodes entities before printing, ampersand last', async () => {
            await printer.printText('a &amp;lt; b&#10;')
            expect(transport.bytes()).toEqual(ascii('a &lt; b\n'))
        })
    })

    describe('barcode', () => {
        it('frames formats below 69 with a trailing NUL, then repeats the text', async () => {
            await printer.barcode('12345', BarcodeSystem.EAN8)
            expect(transport.writes).toEqual([
                [0x1b, 0x61, 1],
                [0x1d, 0x6b, 0x03, ...ascii('12345'), 0x00],
                ascii('12345'),
            ])
        })

        it('frames formats above 69 with a decimal length, then repeats the text', async () => {
            await printer.barcode('12345', BarcodeSystem.CODE128)
            expect(transport.writes).toEqual([
                [0x1b, 0x61, 1],
                [0x1d, 0x6b, 0x49, ...ascii('5'), ...ascii('12345')],
                ascii('12345'),
            ])
        })

        it('sends no frame for format 69', async () => {
            await printer.barcode('987', 69)
            expect(transport.writes).toEqual([[0x1b, 0x61, 1], ascii('987')])
        })

        it('emits an empty type code for unknown formats and reports them', async () => {
            await printer.barcode('42', 5)
            expect(transport.writes).toEqual([
                [0x1b, 0x61, 1],
                [0x1d, 0x6b, ...ascii('42'), 0x00],
                ascii('42'),
            ])
            expect(events.filter(e => e.kind === 'unknown-barcode-format')).toEqual([
                expect.objectContaining({ kind: 'unknown-barcode-format', format: 5 }),
            ])
        })

        it('resets style in memory without retransmitting defaults', async () => {
            await printer.setUnderline(1)
            await printer.setFontSize(4, 4)
            transport.clear()

            await printer.barcode('1', BarcodeSystem.UPC_A)

            expect(printer.getStyle()).toMatchObject({ underline: 0, width: 1, height: 1 })
            expect(transport.writes[0]).toEqual([0x1b, 0x61, 1])
            expect(transport.writes).toHaveLength(3)
        })
    })

    describe('graphics', () => {
        it('sends prefix, length header and untouched data', async () => {
            await printer.gSend(0x30, 0x70, Uint8Array.of(0x01, 0x80, 0xff))
            expect(transport.writes).toEqual([
                [0x1b, 0x28, 0x4c],
                [5, 0, 0x30, 0x70],
                [0x01, 0x80, 0xff],
            ])
        })

        it('writes exactly the bytes of the framed command', async () => {
            const data = Uint8Array.of(0x10, 0x20, 0x30, 0x40)
            await printer.gSend(0x30, 0x45, data)
            expect(transport.bytes()).toEqual(Array.from(frameGraphics(0x30, 0x45, data)))
        })

        it('carries lengths above 255 in the high byte', async () => {
            await printer.gSend(0x30, 0x70, new Uint8Array(300))
            expect(transport.writes[1]).toEqual([46, 1, 0x30, 0x70])
        })

        it('rejects payloads that overflow the length field before writing', async () => {
            await expect(printer.gSend(0x30, 0x70, new Uint8Array(0xffff))).rejects.toBeInstanceOf(CommandError)
            expect(transport.writes).toEqual([])
        })

        it('stores a raster bitmap with its parameter block', async () => {
            await printer.storeRasterGraphics({ width: 10, height: 2, data: Uint8Array.of(0xff, 0xc0, 0x80, 0x40) })
            expect(transport.writes).toEqual([
                [0x1b, 0x28, 0x4c],
                [14, 0, 0x30, 0x70],
                [0x30, 0x01, 0x01, 0x31, 10, 0, 2, 0, 0xff, 0xc0, 0x80, 0x40],
            ])
        })

        it('rejects raster data of the wrong size', async () => {
            await expect(
                printer.storeRasterGraphics({ width: 10, height: 2, data: new Uint8Array(3) })
            ).rejects.toThrow('raster data is 3 bytes, expected 4 for 10x2')
        })

        it('prints stored graphics with an empty payload', async () => {
            await printer.printStoredGraphics()
            expect(transport.writes).toEqual([
                [0x1b, 0x28, 0x4c],
                [2, 0, 0x30, 0x32],
            ])
        })
    })

    describe('status', () => {
        it('sends DLE EOT n and returns the next byte read', async () => {
            transport.reply(0x16)
            expect(await printer.readStatus(1)).toBe(0x16)
            expect(transport.writes).toEqual([[0x10, 0x04, 1]])
            expect(events.at(-1)).toMatchObject({ kind: 'status-read', n: 1, status: 0x16 })
        })

        it('decodes the reply for the requested kind', async () => {
            transport.reply(0x1e)
            const status = await printer.queryStatus(1)
            expect(status).toEqual({ kind: 1, raw: 0x1e, flags: { drawerOpen: true, offline: true } })
        })

        it('propagates read failures as TransportError', async () => {
            const cause = new Error('EIO')
            transport.readError = cause

            const err = await printer.readStatus(2).catch((e: unknown) => e)

            expect(err).toBeInstanceOf(TransportError)
            expect(err).toMatchObject({ code: 'transport-read', cause })
        })

        it('rejects when the printer sends nothing back', async () => {
            await expect(printer.readStatus(4)).rejects.toThrow('printer returned no status byte for n=4')
        })
    })

    describe('transport failures', () => {
        it('rejects with TransportError and leaves the state change applied', async () => {
            const cause = new Error('cable unplugged')
            transport.writeError = cause

            const err = await printer.setUnderline(1).catch((e: unknown) => e)

            expect(err).toBeInstanceOf(TransportError)
            expect(err).toMatchObject({ code: 'transport-write', retryable: true, cause })
            expect(printer.getStyle().underline).toBe(1)
            expect(events.at(-1)).toMatchObject({ kind: 'transport-error', operation: 'write', error: 'cable unplugged' })
        })
    })

    describe('events', () => {
        it('reports each command with its byte count', async () => {
            await printer.cut()
            expect(events).toEqual([expect.objectContaining({ kind: 'command-sent', command: 'cut', bytes: 4 })])
        })
    })
})
