import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

const DEFAULT_CLIENT_LOGS_TO_KEEP = 500

function limitFromEnv(): number {
    const n = Number.parseInt(process.env.CLIENT_LOGS_TO_KEEP ?? '', 10)
    return Number.isFinite(n) && n > 0 ? n : DEFAULT_CLIENT_LOGS_TO_KEEP
}

export function makeClientBuffer(limit: number = limitFromEnv()): ClientLogBuffer {
    const buf: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        buf.push(log)
        if (buf.length > limit) buf.shift()
        // notify subscribers
        for (const l of listeners) {
            l(log)
        }
    }

    const getLatest = (n: number): ClientLog[] => {
        return n > 0 ? buf.slice(-n) : []
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe }
}
