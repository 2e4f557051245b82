// services/printer/src/devices/escpos-printer/utils.ts

import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { EscposConfig, EscposSerialConfig, FeedMode } from './types.js'
import { DEFAULT_TEXT_ENCODING } from './text.js'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers                                                        */
/* -------------------------------------------------------------------------- */

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const raw = env[name]
    if (raw === undefined) return undefined
    const t = raw.trim()
    return t.length === 0 ? undefined : t
}

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = envString(env, name)
    if (!raw) return fallback
    const n = Number.parseInt(raw, 10)
    return Number.isFinite(n) ? n : fallback
}

function envBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = envString(env, name)
    if (!raw) return fallback
    const v = raw.toLowerCase()
    if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true
    if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false
    return fallback
}

function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    return Math.max(min, Math.min(max, n))
}

/* -------------------------------------------------------------------------- */
/*  Config builders                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones. Returns the files that were loaded.
 */
export function loadEnvFiles(cwd: string = process.cwd()): string[] {
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local'),
    ]

    const loaded: string[] = []
    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
            loaded.push(file)
        }
    }
    return loaded
}

function buildSerialConfigFromEnv(env: NodeJS.ProcessEnv): EscposSerialConfig {
    return {
        portPath: envString(env, 'ESCPOS_SERIAL_PORT') ?? '',
        baudRate: clampInt(envInt(env, 'ESCPOS_SERIAL_BAUD', 9600), 300, 2_000_000),
        readTimeoutMs: clampInt(envInt(env, 'ESCPOS_READ_TIMEOUT_MS', 2000), 0, 60_000),
    }
}

/**
 * Build the encoder config from environment variables.
 *
 * Missing or invalid values fall back to defaults; this never throws. The
 * charset name is validated later, when the TextCodec is constructed.
 */
export function buildEscposConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EscposConfig {
    return {
        encoding: envString(env, 'ESCPOS_ENCODING') ?? DEFAULT_TEXT_ENCODING,
        serial: buildSerialConfigFromEnv(env),
        debug: envBool(env, 'ESCPOS_DEBUG', false),
    }
}

/**
 * Map the legacy `{ type: "feed" }` parameter bag onto a FeedMode.
 * Only the exact value "feed" selects feeding.
 */
export function feedModeFromParams(params: Readonly<Record<string, string | undefined>>): FeedMode {
    return params.type === 'feed' ? 'feed' : 'cut'
}
