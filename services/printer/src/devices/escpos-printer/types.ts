// services/printer/src/devices/escpos-printer/types.ts

/* -------------------------------------------------------------------------- */
/*  Transport contract                                                         */
/* -------------------------------------------------------------------------- */

/**
 * Bidirectional byte channel to the printer (serial, socket, USB, file).
 *
 * The encoder never opens, closes or flushes a transport; the caller owns
 * its lifetime. Both methods reject on I/O failure.
 */
export interface PrinterTransport {
    /** Write every byte of `data`; resolves with the number of bytes accepted. */
    write(data: Uint8Array): Promise<number>
    /** Fill up to `buffer.length` bytes; resolves with the number read. */
    read(buffer: Uint8Array): Promise<number>
    /**
     * Drop bytes received but not yet read, such as the late reply to a
     * timed-out status request. Returns the number dropped.
     */
    discardBuffered?(): number
}

/* -------------------------------------------------------------------------- */
/*  Closed variants                                                            */
/* -------------------------------------------------------------------------- */

export type FontName = 'A' | 'B' | 'C'

export type Alignment = 'left' | 'center' | 'right'

/** International character sets selectable with ESC R. */
export type LangCode = 'en' | 'fr' | 'de' | 'uk' | 'da' | 'sv' | 'it' | 'es' | 'ja' | 'no'

/**
 * - 'feed' → formfeed before the cut
 * - 'cut'  → cut only
 */
export type FeedMode = 'feed' | 'cut'

/** Barcode systems understood by GS k (format number → type byte). */
export const BarcodeSystem = {
    UPC_A: 0,
    UPC_E: 1,
    EAN13: 2,
    EAN8: 3,
    CODE39: 4,
    CODE128: 73,
} as const

export type BarcodeFormat = (typeof BarcodeSystem)[keyof typeof BarcodeSystem]

/* -------------------------------------------------------------------------- */
/*  Style state                                                                */
/* -------------------------------------------------------------------------- */

/**
 * Persistent printer-side style, mirrored in memory.
 *
 * Toggles are stored verbatim (masked to a byte) and are not limited to 0/1.
 */
export interface EscposStyleState {
    width: number
    height: number
    underline: number
    emphasize: number
    upsideDown: number
    rotate: number
    reverse: number
    smooth: number
}

/* -------------------------------------------------------------------------- */
/*  Graphics                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * An already-rasterized 1-bit image: `height` rows of `ceil(width / 8)` bytes,
 * most significant bit leftmost, 1 = black dot.
 */
export interface RasterBitmap {
    width: number
    height: number
    data: Uint8Array
}

/* -------------------------------------------------------------------------- */
/*  Real-time status (DLE EOT n)                                               */
/* -------------------------------------------------------------------------- */

export type StatusKind = 1 | 2 | 3 | 4

export interface PrinterStatusFlags {
    drawerOpen: boolean
    offline: boolean
}

export interface OfflineStatusFlags {
    coverOpen: boolean
    paperFeedButton: boolean
    paperEndStop: boolean
    errorOccurred: boolean
}

export interface ErrorStatusFlags {
    mechanicalError: boolean
    autoCutterError: boolean
    unrecoverableError: boolean
    autoRecoverableError: boolean
}

export interface PaperStatusFlags {
    paperNearEnd: boolean
    paperEnd: boolean
}

export type DecodedStatus =
    | { kind: 1; raw: number; flags: PrinterStatusFlags }
    | { kind: 2; raw: number; flags: OfflineStatusFlags }
    | { kind: 3; raw: number; flags: ErrorStatusFlags }
    | { kind: 4; raw: number; flags: PaperStatusFlags }

/* -------------------------------------------------------------------------- */
/*  Config                                                                     */
/* -------------------------------------------------------------------------- */

export interface EscposSerialConfig {
    /** OS device path (e.g., /dev/ttyUSB0); empty when not configured */
    portPath: string
    baudRate: number
    /** 0 disables the read timeout */
    readTimeoutMs: number
}

export interface EscposConfig {
    /** iconv-lite charset name for text payloads */
    encoding: string
    serial: EscposSerialConfig
    /** Per-command debug logging (ESCPOS_DEBUG=1) */
    debug: boolean
}

/* -------------------------------------------------------------------------- */
/*  Events                                                                     */
/* -------------------------------------------------------------------------- */

export type EscposEventKind =
    | 'command-sent'
    | 'status-read'
    | 'transport-error'
    | 'unknown-barcode-format'

export interface EscposEventBase {
    kind: EscposEventKind
    at: number
}

export interface EscposCommandSentEvent extends EscposEventBase {
    kind: 'command-sent'
    /** Operation name, e.g. 'cut' or 'setFontSize' */
    command: string
    bytes: number
}

export interface EscposStatusReadEvent extends EscposEventBase {
    kind: 'status-read'
    n: number
    status: number
}

export interface EscposTransportErrorEvent extends EscposEventBase {
    kind: 'transport-error'
    operation: 'write' | 'read'
    error: string
}

export interface EscposUnknownBarcodeFormatEvent extends EscposEventBase {
    kind: 'unknown-barcode-format'
    format: number
}

export type EscposEvent =
    | EscposCommandSentEvent
    | EscposStatusReadEvent
    | EscposTransportErrorEvent
    | EscposUnknownBarcodeFormatEvent

export interface EscposEventSink {
    publish(event: EscposEvent): void
}
