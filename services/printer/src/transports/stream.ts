// services/printer/src/transports/stream.ts

import type { Duplex } from 'node:stream'
import type { PrinterTransport } from '../devices/escpos-printer/types.js'

export interface StreamTransportOptions {
    /** Reject a read that waits longer than this; 0 or undefined waits forever. */
    readTimeoutMs?: number
}

interface PendingRead {
    resolve: () => void
    reject: (err: Error) => void
    timer: NodeJS.Timeout | null
}

/**
 * PrinterTransport over any Node Duplex (serialport's SerialPort, net.Socket,
 * a PassThrough in tests).
 *
 * Incoming bytes are queued from the moment the transport is created, so a
 * status reply that arrives before read() is called is not lost. Only one
 * read may wait at a time.
 */
export class StreamTransport implements PrinterTransport {
    protected readonly stream: Duplex
    private readonly readTimeoutMs: number

    private chunks: Buffer[] = []
    private pending: PendingRead | null = null
    private ended = false
    private failure: Error | null = null

    constructor(stream: Duplex, opts: StreamTransportOptions = {}) {
        this.stream = stream
        this.readTimeoutMs = opts.readTimeoutMs ?? 0

        stream.on('data', this.onData)
        stream.on('end', this.onEnd)
        stream.on('close', this.onEnd)
        stream.on('error', this.onError)
    }

    public write(data: Uint8Array): Promise<number> {
        if (this.failure) return Promise.reject(this.failure)

        return new Promise<number>((resolve, reject) => {
            this.stream.write(data, (err?: Error | null) =>
                err ? reject(err) : resolve(data.length)
            )
        })
    }

    public async read(buffer: Uint8Array): Promise<number> {
        if (buffer.length === 0) return 0
        if (this.chunks.length === 0) {
            await this.waitForData()
        }
        return this.drainInto(buffer)
    }

    /** Bytes received but not yet read. */
    public get buffered(): number {
        return this.chunks.reduce((sum, c) => sum + c.length, 0)
    }

    public discardBuffered(): number {
        const dropped = this.buffered
        this.chunks = []
        return dropped
    }

    /** Stop listening to the stream; the stream itself is left open. */
    public dispose(): void {
        this.stream.off('data', this.onData)
        this.stream.off('end', this.onEnd)
        this.stream.off('close', this.onEnd)
        this.stream.off('error', this.onError)
        this.settle(new Error('transport disposed'))
    }

    /* ---------------------------------------------------------------------- */
    /*  Stream events                                                          */
    /* ---------------------------------------------------------------------- */

    private readonly onData = (chunk: Buffer | string): void => {
        const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk
        if (buf.length === 0) return
        this.chunks.push(buf)
        this.settle(null)
    }

    private readonly onEnd = (): void => {
        this.ended = true
        this.settle(new Error('stream ended'))
    }

    private readonly onError = (err: Error): void => {
        this.failure = err
        this.settle(err)
    }

    /* ---------------------------------------------------------------------- */
    /*  Read queue                                                             */
    /* ---------------------------------------------------------------------- */

    private waitForData(): Promise<void> {
        if (this.failure) return Promise.reject(this.failure)
        if (this.ended) return Promise.reject(new Error('stream ended'))
        if (this.pending) return Promise.reject(new Error('a read is already pending'))

        return new Promise<void>((resolve, reject) => {
            const pending: PendingRead = { resolve, reject, timer: null }
            if (this.readTimeoutMs > 0) {
                const ms = this.readTimeoutMs
                pending.timer = setTimeout(() => {
                    if (this.pending !== pending) return
                    this.pending = null
                    reject(new Error(`read timed out after ${ms}ms`))
                }, ms)
            }
            this.pending = pending
        })
    }

    private settle(err: Error | null): void {
        const pending = this.pending
        if (!pending) return
        this.pending = null
        if (pending.timer) clearTimeout(pending.timer)
        if (err) pending.reject(err)
        else pending.resolve()
    }

    private drainInto(buffer: Uint8Array): number {
        let offset = 0
        while (offset < buffer.length && this.chunks.length > 0) {
            const head = this.chunks[0]
            const take = Math.min(head.length, buffer.length - offset)
            buffer.set(head.subarray(0, take), offset)
            offset += take
            if (take === head.length) this.chunks.shift()
            else this.chunks[0] = head.subarray(take)
        }
        return offset
    }
}
