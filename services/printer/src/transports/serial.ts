// services/printer/src/transports/serial.ts

import type { Duplex } from 'node:stream'
import { SerialPort } from 'serialport'
import { TransportError, errorMessage } from '../devices/escpos-printer/errors.js'
import type { EscposSerialConfig } from '../devices/escpos-printer/types.js'
import { StreamTransport } from './stream.js'

/** The slice of serialport's stream API the transport needs. */
export interface OpenablePort extends Duplex {
    readonly isOpen: boolean
    open(callback?: (err: Error | null) => void): void
    close(callback?: (err: Error | null) => void): void
}

export interface SerialPortOptions {
    path: string
    baudRate: number
    autoOpen: false
}

export type SerialPortFactory = (opts: SerialPortOptions) => OpenablePort

const defaultFactory: SerialPortFactory = opts =>
    new SerialPort({ ...opts, dataBits: 8, parity: 'none', stopBits: 1 })

/**
 * On macOS the enumerated /dev/tty.* node blocks on carrier detect; the
 * /dev/cu.* twin is the one to use for outgoing connections.
 */
export function preferCalloutDevice(path: string): string {
    if (process.platform === 'darwin' && path.startsWith('/dev/tty.')) {
        return '/dev/cu.' + path.slice('/dev/tty.'.length)
    }
    return path
}

/** A StreamTransport that owns the port it opened and can close it. */
export class SerialTransport extends StreamTransport {
    private readonly port: OpenablePort
    readonly path: string

    constructor(port: OpenablePort, path: string, readTimeoutMs: number) {
        super(port, { readTimeoutMs })
        this.port = port
        this.path = path
    }

    public async close(): Promise<void> {
        this.dispose()
        if (!this.port.isOpen) return

        await new Promise<void>((resolve, reject) => {
            this.port.close(err =>
                err
                    ? reject(new TransportError('transport-open', `failed to close ${this.path}: ${err.message}`, err))
                    : resolve()
            )
        })
    }
}

/**
 * Open the configured serial port once. There is no discovery and no
 * reconnect: an open failure rejects with a TransportError.
 */
export async function openSerialTransport(
    config: EscposSerialConfig,
    createPort: SerialPortFactory = defaultFactory
): Promise<SerialTransport> {
    if (!config.portPath) {
        throw new TransportError('transport-open', 'no serial port configured (set ESCPOS_SERIAL_PORT)')
    }

    const path = preferCalloutDevice(config.portPath)
    const port = createPort({ path, baudRate: config.baudRate, autoOpen: false })

    await new Promise<void>((resolve, reject) => {
        port.open(err =>
            err
                ? reject(new TransportError('transport-open', `failed to open ${path}: ${errorMessage(err)}`, err))
                : resolve()
        )
    })

    return new SerialTransport(port, path, config.readTimeoutMs)
}
