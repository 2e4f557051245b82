// services/printer/src/index.ts

export { EscposPrinter } from './devices/escpos-printer/EscposPrinter.js'
export {
    BARCODE_TYPE,
    cmd,
    concatBytes,
    frameGraphics,
    graphicsHeader,
    rasterPayload,
    resolveAlign,
    resolveFont,
    resolveLang,
} from './devices/escpos-printer/commands.js'
export {
    CommandError,
    EncodingError,
    EscposError,
    TransportError,
    toErrorShape,
    type EscposErrorCode,
    type EscposErrorShape,
} from './devices/escpos-printer/errors.js'
export { decodeStatus, describeStatus, isStatusKind } from './devices/escpos-printer/status.js'
export { DEFAULT_TEXT_ENCODING, TextCodec, decodeTextEntities } from './devices/escpos-printer/text.js'
export {
    buildEscposConfigFromEnv,
    feedModeFromParams,
    loadEnvFiles,
} from './devices/escpos-printer/utils.js'
export {
    BarcodeSystem,
    type Alignment,
    type BarcodeFormat,
    type DecodedStatus,
    type EscposConfig,
    type EscposEvent,
    type EscposEventSink,
    type EscposSerialConfig,
    type EscposStyleState,
    type FeedMode,
    type FontName,
    type LangCode,
    type PrinterTransport,
    type RasterBitmap,
    type StatusKind,
} from './devices/escpos-printer/types.js'
export { EscposLoggerEventSink, FanoutEscposEventSink } from './adapters/escposLogger.adapter.js'
export { StreamTransport, type StreamTransportOptions } from './transports/stream.js'
export {
    SerialTransport,
    openSerialTransport,
    preferCalloutDevice,
    type OpenablePort,
    type SerialPortFactory,
} from './transports/serial.js'
export { runProbe, type ProbeCommand } from './probe.js'
