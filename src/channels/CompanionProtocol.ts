/**
 * Wire vocabulary shared with the companion host.
 *
 * Serial lines are newline-terminated ASCII:
 *   "<N>"    focus session of N whole minutes started
 *   "reset"  session finished by the user
 *   "move"   companion control pressed
 * The broker topic carries "true" when a session starts and "false" when it
 * is finished.
 */

export const SerialCommand = {
    RESET: 'reset',
    MOVE: 'move'
} as const;

export const BrokerPayload = {
    SESSION_STARTED: 'true',
    SESSION_ENDED: 'false'
} as const;

export type CompanionSignal =
    | { kind: 'session-start'; minutes: number }
    | { kind: 'reset' }
    | { kind: 'move' }
    | { kind: 'broker-flag'; active: boolean }
    | { kind: 'unknown'; raw: string };

export function encodeSessionStart(minutes: number): string {
    return String(Math.max(0, Math.trunc(minutes)));
}

export function parseCompanionLine(line: string): CompanionSignal {
    const text = line.trim();
    if (/^\d+$/.test(text)) return { kind: 'session-start', minutes: Number(text) };
    if (text === SerialCommand.RESET) return { kind: 'reset' };
    if (text === SerialCommand.MOVE) return { kind: 'move' };
    if (text === BrokerPayload.SESSION_STARTED) return { kind: 'broker-flag', active: true };
    if (text === BrokerPayload.SESSION_ENDED) return { kind: 'broker-flag', active: false };
    return { kind: 'unknown', raw: text };
}

export function describeCompanionLine(line: string): string {
    const signal = parseCompanionLine(line);
    switch (signal.kind) {
        case 'session-start':
            return `focus session started (${signal.minutes} min)`;
        case 'reset':
            return 'focus session finished';
        case 'move':
            return 'companion move requested';
        case 'broker-flag':
            return signal.active ? 'session active' : 'session ended';
        case 'unknown':
            return `unrecognized: ${JSON.stringify(signal.raw)}`;
    }
}
