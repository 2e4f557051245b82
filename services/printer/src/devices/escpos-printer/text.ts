// services/printer/src/devices/escpos-printer/text.ts

import iconv from 'iconv-lite'
import { EncodingError, errorMessage } from './errors.js'

export const DEFAULT_TEXT_ENCODING = 'GB18030'

/**
 * Transcodes text payloads into the printer's character set.
 *
 * Bytes below 0x80 are identical in every charset we accept here, so ASCII
 * control codes survive the transform unchanged.
 */
export class TextCodec {
    readonly encoding: string

    constructor(encoding: string = DEFAULT_TEXT_ENCODING) {
        if (!iconv.encodingExists(encoding)) {
            throw new EncodingError(encoding, `unsupported text encoding "${encoding}"`)
        }
        this.encoding = encoding
    }

    encode(text: string): Uint8Array {
        try {
            return iconv.encode(text, this.encoding)
        } catch (err) {
            throw new EncodingError(
                this.encoding,
                `failed to encode text as ${this.encoding}: ${errorMessage(err)}`,
                err
            )
        }
    }
}

// Ampersand must stay last so "&amp;lt;" decodes to "&lt;" and not "<".
const TEXT_ENTITIES: ReadonlyArray<readonly [string, string]> = [
    // horizontal tab
    ['&#9;', '\t'],
    ['&#x9;', '\t'],
    // linefeed
    ['&#10;', '\n'],
    ['&#xA;', '\n'],
    ['&apos;', "'"],
    ['&quot;', '"'],
    ['&gt;', '>'],
    ['&lt;', '<'],
    ['&amp;', '&'],
]

/** Decode the XML-style entities receipt markup commonly carries. */
export function decodeTextEntities(data: string): string {
    let out = data
    for (const [entity, value] of TEXT_ENTITIES) {
        out = out.split(entity).join(value)
    }
    return out
}
