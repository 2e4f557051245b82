import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.app]:       { emoji: '📦', color: 'blue' },
    [LogChannel.escpos]:    { emoji: '🖨️', color: 'white' },
    [LogChannel.transport]: { emoji: '🔌', color: 'yellow' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// pino rejects custom levels that reuse a built-in value, so each channel
// sits on its own slot between info (30) and warn (40).
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.app]:       31,
    [LogChannel.escpos]:    32,
    [LogChannel.transport]: 33,
}

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, value)
}
