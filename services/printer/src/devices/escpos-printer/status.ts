// services/printer/src/devices/escpos-printer/status.ts
//
// DLE EOT n replies are a single byte. Bits 1 and 4 are always set and bits
// 0 and 7 always clear; the remaining bits depend on n:
//
//   n=1  printer  bit2 drawer connector pin 3 high, bit3 offline
//   n=2  offline  bit2 cover open, bit3 feed button, bit5 paper end stop,
//                 bit6 error occurred
//   n=3  error    bit2 mechanical, bit3 autocutter, bit5 unrecoverable,
//                 bit6 auto-recoverable
//   n=4  paper    bits2-3 near end, bits5-6 end

import type { DecodedStatus, StatusKind } from './types.js'

const bit = (value: number, n: number): boolean => (value & (1 << n)) !== 0

export function isStatusKind(n: number): n is StatusKind {
    return n === 1 || n === 2 || n === 3 || n === 4
}

export function decodeStatus(n: StatusKind, status: number): DecodedStatus {
    const raw = status & 0xff
    switch (n) {
        case 1:
            return {
                kind: 1,
                raw,
                flags: { drawerOpen: bit(raw, 2), offline: bit(raw, 3) },
            }
        case 2:
            return {
                kind: 2,
                raw,
                flags: {
                    coverOpen: bit(raw, 2),
                    paperFeedButton: bit(raw, 3),
                    paperEndStop: bit(raw, 5),
                    errorOccurred: bit(raw, 6),
                },
            }
        case 3:
            return {
                kind: 3,
                raw,
                flags: {
                    mechanicalError: bit(raw, 2),
                    autoCutterError: bit(raw, 3),
                    unrecoverableError: bit(raw, 5),
                    autoRecoverableError: bit(raw, 6),
                },
            }
        case 4:
            return {
                kind: 4,
                raw,
                flags: {
                    paperNearEnd: (raw & 0x0c) !== 0,
                    paperEnd: (raw & 0x60) !== 0,
                },
            }
    }
}

/** One-line summary of the flags that are set, for logs. */
export function describeStatus(status: DecodedStatus): string {
    const set = Object.entries(status.flags)
        .filter(([, on]) => on)
        .map(([name]) => name)
    const hex = `0x${status.raw.toString(16).padStart(2, '0')}`
    return set.length > 0 ? `n=${status.kind} ${hex} ${set.join(',')}` : `n=${status.kind} ${hex} ok`
}
