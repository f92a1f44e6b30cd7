// waymark/framework/path-scan.ts — byte classes for RFC 3986 path segments.
// Shared by the pattern parser (compile time) and the matcher (request time).

const SLASH = 0x2f;
const PERCENT = 0x25;

export const isAsciiAlpha = (b: number) => (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a);
export const isAsciiDigit = (b: number) => b >= 0x30 && b <= 0x39;
export const isAsciiAlphanumeric = (b: number) => isAsciiAlpha(b) || isAsciiDigit(b);

export function isHexDigit(b: number): boolean {
    return isAsciiDigit(b) || (b >= 0x41 && b <= 0x46) || (b >= 0x61 && b <= 0x66);
}

/** ALPHA / DIGIT / "-" / "." / "_" / "~" */
export function isUnreserved(b: number): boolean {
    return isAsciiAlphanumeric(b) || b === 0x2d || b === 0x2e || b === 0x5f || b === 0x7e;
}

/** "!" / "$" / "&" / "'" / "(" / ")" / "*" / "+" / "," / ";" / "=" */
export function isSubDelimiter(b: number): boolean {
    switch (b) {
        case 0x21: case 0x24: case 0x26: case 0x27: case 0x28: case 0x29:
        case 0x2a: case 0x2b: case 0x2c: case 0x3b: case 0x3d:
            return true;
        default:
            return false;
    }
}

/** A single-byte pchar, i.e. everything but the percent-encoded form. */
export function isPathChar(b: number): boolean {
    return isUnreserved(b) || isSubDelimiter(b) || b === 0x3a /* : */ || b === 0x40 /* @ */;
}

/** True when `bytes[at]` starts a well-formed `%HEXHEX` triple. */
export function isPercentTriple(bytes: Uint8Array, at: number): boolean {
    return (
        bytes[at] === PERCENT &&
        at + 2 < bytes.length &&
        isHexDigit(bytes[at + 1]) &&
        isHexDigit(bytes[at + 2])
    );
}

/**
 * Scans one segment starting at `start` and returns the index of the first
 * byte that does not belong to it. The scan stops before a `/`, at the end of
 * input, at a byte outside `pchar`, or at a `%` that is not followed by two hex
 * digits. It never throws; callers decide whether the stop is an error.
 */
export function scanSegment(bytes: Uint8Array, start: number): number {
    let i = start;
    while (i < bytes.length) {
        const b = bytes[i];
        if (b === SLASH) break;
        if (b === PERCENT) {
            if (!isPercentTriple(bytes, i)) break;
            i += 3;
            continue;
        }
        if (!isPathChar(b)) break;
        i++;
    }
    return i;
}

/** `'x'` for printable ASCII, `0xNN` otherwise. */
export function describeByte(b: number): string {
    if (b > 0x20 && b < 0x7f) return `'${String.fromCharCode(b)}'`;
    return `0x${b.toString(16).padStart(2, "0")}`;
}
