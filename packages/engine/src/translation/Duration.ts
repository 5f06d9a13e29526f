/**
 * Duration — Human-Readable Span Parsing
 *
 * `24h`, `7d`, `1h30m`, `1d 12h`, `2 weeks`, `500ms` → milliseconds.
 *
 * @module
 */

const UNIT_MS: Readonly<Record<string, number>> = {
    ms: 1, msec: 1, millis: 1, millisecond: 1, milliseconds: 1,
    s: 1_000, sec: 1_000, secs: 1_000, second: 1_000, seconds: 1_000,
    m: 60_000, min: 60_000, mins: 60_000, minute: 60_000, minutes: 60_000,
    h: 3_600_000, hr: 3_600_000, hrs: 3_600_000, hour: 3_600_000, hours: 3_600_000,
    d: 86_400_000, day: 86_400_000, days: 86_400_000,
    w: 604_800_000, week: 604_800_000, weeks: 604_800_000,
};

const TERM = /(\d+(?:\.\d+)?)\s*([a-z]+)\s*/gy;

/**
 * Parse a duration expression into milliseconds.
 *
 * @returns Milliseconds, or `undefined` when any part is unparsable
 *
 * @example
 * parseDuration('24h')    → 86_400_000
 * parseDuration('1h 30m') → 5_400_000
 * parseDuration('soon')   → undefined
 */
export function parseDuration(input: string): number | undefined {
    const text = input.trim().toLowerCase();
    if (text.length === 0) return undefined;

    TERM.lastIndex = 0;
    let total = 0;
    let consumed = 0;
    let match: RegExpExecArray | null;

    while ((match = TERM.exec(text)) !== null) {
        const unit = UNIT_MS[match[2] ?? ''];
        if (unit === undefined) return undefined;
        total += Number(match[1]) * unit;
        consumed = TERM.lastIndex;
    }

    return consumed === text.length ? total : undefined;
}
