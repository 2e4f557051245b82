// services/printer/src/adapters/escposLogger.adapter.ts

import { type ChannelLogger } from '@tallyroll/logging'
import { errorMessage } from '../devices/escpos-printer/errors.js'
import type { EscposEvent, EscposEventSink } from '../devices/escpos-printer/types.js'

/**
 * Writes encoder events to a channel logger.
 *
 * command-sent fires for every write, so it is only logged (at debug) when
 * `debug` is on.
 */
export class EscposLoggerEventSink implements EscposEventSink {
    private readonly log: ChannelLogger
    private readonly debugEnabled: boolean

    constructor(log: ChannelLogger, opts: { debug?: boolean } = {}) {
        this.log = log
        this.debugEnabled = opts.debug ?? false
    }

    publish(evt: EscposEvent): void {
        const ts = new Date(evt.at).toISOString()

        switch (evt.kind) {
            case 'command-sent': {
                if (!this.debugEnabled) break
                this.log.debug(`kind=command-sent ts=${ts} command=${evt.command} bytes=${evt.bytes}`)
                break
            }

            case 'status-read': {
                const hex = evt.status.toString(16).padStart(2, '0')
                this.log.info(`kind=status-read ts=${ts} n=${evt.n} status=0x${hex}`)
                break
            }

            case 'transport-error': {
                this.log.error(`kind=transport-error ts=${ts} op=${evt.operation} error=${evt.error}`)
                break
            }

            case 'unknown-barcode-format': {
                this.log.warn(`kind=unknown-barcode-format ts=${ts} format=${evt.format}`)
                break
            }
        }
    }
}

/** Fan events out to several sinks; one failing sink does not stop the rest. */
export class FanoutEscposEventSink implements EscposEventSink {
    private readonly sinks: EscposEventSink[]
    private readonly log: ChannelLogger

    constructor(sinks: EscposEventSink[], log: ChannelLogger) {
        this.sinks = sinks
        this.log = log
    }

    publish(evt: EscposEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                this.log.warn(`event sink failed kind=${evt.kind} error=${errorMessage(err)}`)
            }
        }
    }
}
