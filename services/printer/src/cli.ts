#!/usr/bin/env node
// services/printer/src/cli.ts

import { createLogger, LogChannel } from '@tallyroll/logging'
import { EscposLoggerEventSink } from './adapters/escposLogger.adapter.js'
import { EscposPrinter } from './devices/escpos-printer/EscposPrinter.js'
import { errorMessage, toErrorShape } from './devices/escpos-printer/errors.js'
import { TextCodec } from './devices/escpos-printer/text.js'
import { buildEscposConfigFromEnv, loadEnvFiles } from './devices/escpos-printer/utils.js'
import { runProbe } from './probe.js'
import { openSerialTransport } from './transports/serial.js'

const loadedEnvFiles = loadEnvFiles()

const { channel } = createLogger('tallyroll-probe')
const logApp = channel(LogChannel.app)
const logTransport = channel(LogChannel.transport)

async function main(argv: string[]): Promise<void> {
    const config = buildEscposConfigFromEnv(process.env)
    const [command = 'status', ...args] = argv

    logApp.info(
        `probe config envFiles=${loadedEnvFiles.length} port=${config.serial.portPath || '<none>'} baudRate=${config.serial.baudRate} encoding=${config.encoding} readTimeoutMs=${config.serial.readTimeoutMs}`
    )

    const codec = new TextCodec(config.encoding)
    const transport = await openSerialTransport(config.serial)
    logTransport.info(`opened ${transport.path}`)

    try {
        const printer = new EscposPrinter({
            transport,
            codec,
            events: new EscposLoggerEventSink(channel(LogChannel.escpos), { debug: config.debug }),
        })
        const summary = await runProbe(printer, command, args)
        logApp.info(`probe ${command}: ${summary}`)
    } finally {
        await transport.close()
        logTransport.info(`closed ${transport.path}`)
    }
}

main(process.argv.slice(2)).catch((err: unknown) => {
    logApp.error(`probe failed: ${errorMessage(err)}`, { err: toErrorShape(err) })
    process.exitCode = 1
})
