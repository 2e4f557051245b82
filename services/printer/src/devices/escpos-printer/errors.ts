// services/printer/src/devices/escpos-printer/errors.ts

export type EscposErrorCode =
    | 'transport-open'
    | 'transport-write'
    | 'transport-read'
    | 'encoding'
    | 'command'

export type EscposErrorShape = {
    message: string
    code?: string
    retryable?: boolean
}

export class EscposError extends Error {
    readonly code: EscposErrorCode
    readonly retryable: boolean

    constructor(code: EscposErrorCode, message: string, opts: { cause?: unknown; retryable?: boolean } = {}) {
        super(message, opts.cause === undefined ? undefined : { cause: opts.cause })
        this.name = 'EscposError'
        this.code = code
        this.retryable = opts.retryable ?? false
    }
}

/**
 * The transport rejected a write or read. In-memory style state may no
 * longer match the printer; the caller decides whether to re-init.
 */
export class TransportError extends EscposError {
    constructor(
        code: 'transport-open' | 'transport-write' | 'transport-read',
        message: string,
        cause?: unknown
    ) {
        super(code, message, { cause, retryable: true })
        this.name = 'TransportError'
    }
}

export class EncodingError extends EscposError {
    readonly encoding: string

    constructor(encoding: string, message: string, cause?: unknown) {
        super('encoding', message, { cause })
        this.name = 'EncodingError'
        this.encoding = encoding
    }
}

/** A command could not be framed (payload too large, malformed raster data). */
export class CommandError extends EscposError {
    constructor(message: string) {
        super('command', message)
        this.name = 'CommandError'
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

export function toErrorShape(err: unknown): EscposErrorShape {
    if (err instanceof EscposError) {
        return { message: err.message, code: err.code, retryable: err.retryable }
    }
    if (err instanceof Error) {
        const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
        return { message: err.message, code }
    }
    return { message: String(err) }
}
