import { config } from '../config';

/** Injectable time source, epoch milliseconds. */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export class InvalidTimestampError extends RangeError {
    constructor(input: unknown) {
        super(`Invalid timestamp: ${String(input)}`);
        this.name = 'InvalidTimestampError';
    }
}

const NAIVE_ISO = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?))?$/;
const AWARE_ISO = /^(\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?)(Z|[+-]\d{2}:?\d{2})$/i;

function offsetLabel(raw: string): string {
    if (raw.toUpperCase() === 'Z') return 'Z';
    return raw.includes(':') ? raw : `${raw.slice(0, 3)}:${raw.slice(3)}`;
}

const LOCAL_FIELDS = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?/;

// Largest magnitude a Date holds, less the canonical shift applied when formatting
const MAX_EPOCH_MS = 8.64e15 - Math.abs(config.timezone.offsetMinutes) * 60_000;

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
        return leap ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// Date.parse rolls 2026-02-30 over into March instead of failing
function hasValidFields(local: string): boolean {
    const match = LOCAL_FIELDS.exec(local);
    if (!match) return false;
    const [year, month, day, hour, minute] = match.slice(1, 6).map(Number);
    const second = match[6] === undefined ? 0 : Number(match[6]);
    return month >= 1 && month <= 12
        && day >= 1 && day <= daysInMonth(year, month)
        && hour <= 23 && minute <= 59 && second <= 59;
}

function checkRange(ms: number, input: unknown): number {
    if (Number.isNaN(ms) || Math.abs(ms) > MAX_EPOCH_MS) throw new InvalidTimestampError(input);
    return ms;
}

function parseWithOffset(local: string, offset: string, input: unknown): number {
    const normalized = local.replace(' ', 'T');
    if (!hasValidFields(normalized)) throw new InvalidTimestampError(input);
    return checkRange(Date.parse(`${normalized}${offset}`), input);
}

/**
 * Converts any accepted timestamp representation to epoch milliseconds.
 *
 * Strings carrying an offset (or `Z`) are taken at face value. Strings without
 * one are read as wall-clock time in the canonical offset, never in the host's
 * local zone, so stored values and "now" always compare on the same footing.
 */
export function normalizeTimestamp(input: string | number | Date): number {
    if (input instanceof Date) {
        return checkRange(input.getTime(), input);
    }
    if (typeof input === 'number') {
        if (!Number.isFinite(input)) throw new InvalidTimestampError(input);
        return checkRange(Math.trunc(input), input);
    }

    const value = input.trim();
    const aware = AWARE_ISO.exec(value);
    if (aware) {
        return parseWithOffset(aware[1], offsetLabel(aware[2]), input);
    }
    const naive = NAIVE_ISO.exec(value);
    if (naive) {
        const local = naive[2] ? `${naive[1]}T${naive[2]}` : `${naive[1]}T00:00:00`;
        return parseWithOffset(local, config.timezone.label, input);
    }
    throw new InvalidTimestampError(input);
}

/**
 * Renders epoch milliseconds as ISO-8601 in the canonical offset,
 * e.g. `2026-10-19T10:00:00.000+05:30`.
 */
export function formatTimestamp(ms: number): string {
    const shifted = new Date(ms + config.timezone.offsetMinutes * 60_000).toISOString();
    return `${shifted.slice(0, -1)}${config.timezone.label}`;
}
