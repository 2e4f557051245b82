// services/printer/src/probe.ts

import type { EscposPrinter } from './devices/escpos-printer/EscposPrinter.js'
import { describeStatus, isStatusKind } from './devices/escpos-printer/status.js'

export const PROBE_COMMANDS = ['status', 'test', 'drawer', 'cut'] as const

export type ProbeCommand = (typeof PROBE_COMMANDS)[number]

export function isProbeCommand(value: string): value is ProbeCommand {
    return PROBE_COMMANDS.some((command) => command === value)
}

async function printTestPage(printer: EscposPrinter): Promise<void> {
    await printer.init()
    await printer.setAlign('center')
    await printer.setEmphasize(1)
    await printer.printText('tallyroll test page')
    await printer.linefeed()
    await printer.setEmphasize(0)
    await printer.setAlign('left')
    await printer.write(`encoding: ${printer.encoding}`)
    await printer.linefeed()
    await printer.feedAndCut('feed')
}

/**
 * Run one probe command against an initialised transport and return a
 * one-line summary for the log.
 */
export async function runProbe(printer: EscposPrinter, command: string, args: string[] = []): Promise<string> {
    if (!isProbeCommand(command)) {
        throw new Error(`unknown probe command "${command}" (expected ${PROBE_COMMANDS.join(', ')})`)
    }

    switch (command) {
        case 'status': {
            const raw = args[0] ?? '1'
            const n = Number.parseInt(raw, 10)
            if (!isStatusKind(n)) {
                throw new Error(`status kind must be 1-4, got "${raw}"`)
            }
            return describeStatus(await printer.queryStatus(n))
        }

        case 'test': {
            await printTestPage(printer)
            return 'test page sent'
        }

        case 'drawer': {
            await printer.openDrawer()
            return 'drawer pulse sent'
        }

        case 'cut': {
            await printer.feedAndCut('feed')
            return 'feed and cut sent'
        }
    }
}
