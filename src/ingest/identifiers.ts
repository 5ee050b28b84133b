import type { DeviceType } from '../types/index.js';

/**
 * Submission number formats, one fixed-width pattern per pathway.
 *
 *   K203456      510(k)
 *   P170019      PMA (supplements: P170019/S001)
 *   DEN200045    De Novo (6 or 7 digits)
 *   N18123       pre-amendment
 */
const BASE_PATTERNS: ReadonlyArray<[DeviceType, RegExp]> = [
    ['510k', /^K\d{6}$/],
    ['pma', /^P\d{6}$/],
    ['de_novo', /^DEN\d{6,7}$/],
    ['pre_amendment', /^N\d{4,5}$/],
];

const KEY_PATTERN = /^(K\d{6}|P\d{6}|DEN\d{6,7}|N\d{4,5})(?:[/-]?S(\d{1,4}))?$/;

export interface ParsedIdentifier {
    baseKey: string;
    /** 0 for the original submission */
    supplementSeq: number;
    deviceType: DeviceType;
}

/**
 * Parse a raw identifier ("k203456", "P170019/S001", "P170019 S001", "P170019S001").
 * Returns null when the value is not a recognizable submission number.
 */
export function parseIdentifier(raw: string): ParsedIdentifier | null {
    const compact = raw.trim().toUpperCase().replace(/\s+/g, '');
    const match = KEY_PATTERN.exec(compact);
    if (!match) return null;

    const baseKey = match[1];
    if (baseKey === undefined) return null;

    const deviceType = detectDeviceType(baseKey);
    if (deviceType === null) return null;

    const supplementSeq = match[2] !== undefined ? parseInt(match[2], 10) : 0;
    return { baseKey, supplementSeq, deviceType };
}

/**
 * Pathway of a base key, or null when it matches none.
 */
export function detectDeviceType(baseKey: string): DeviceType | null {
    for (const [type, pattern] of BASE_PATTERNS) {
        if (pattern.test(baseKey)) return type;
    }
    return null;
}

/**
 * Canonical key for (base, supplement). Supplement 0 is the base key itself.
 */
export function formatCanonicalKey(baseKey: string, supplementSeq: number): string {
    if (supplementSeq === 0) return baseKey;
    return `${baseKey}/S${String(supplementSeq).padStart(3, '0')}`;
}

/**
 * Parse straight to a canonical key, or null.
 */
export function toCanonicalKey(raw: string): string | null {
    const parsed = parseIdentifier(raw);
    return parsed ? formatCanonicalKey(parsed.baseKey, parsed.supplementSeq) : null;
}
