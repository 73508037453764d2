/**
 * Minimal field scanner for overlay datagrams.
 * @module wire/scanner
 *
 * This is not a JSON parser. Grammar understood:
 * - an object is `{` ... `}`; only its top-level `"key": value` pairs are looked up
 * - values are integers (decimal or `0x` hex), floats, `true`/`false`, `null`,
 *   quoted strings (escapes are passed through verbatim), arrays and objects
 * - nested arrays/objects are skipped by depth counting over `{}`/`[]`
 *
 * Every read is bounded by the span it is given. A value whose syntax does not
 * match the requested type reads as `undefined`.
 */

const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COLON = 0x3a;
const COMMA = 0x2c;
const LBRACE = 0x7b;
const RBRACE = 0x7d;
const LBRACKET = 0x5b;
const RBRACKET = 0x5d;

const NUMBER_PATTERN = /^[+-]?(?:0[xX][0-9a-fA-F]+|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/;
const MAX_NUMBER_TOKEN = 48;

const textDecoder = new TextDecoder('utf-8');
const textEncoder = new TextEncoder();

/** Half-open byte range `[start, end)`. */
export type Span = {
    start: number;
    end: number;
};

/** A value read at some position plus the position right after it. */
export type ReadResult<T> = {
    value: T;
    next: number;
};

const isSpace = (b: number | undefined): boolean => b === 0x20 || b === 0x09 || b === 0x0a || b === 0x0d;

/** Advance past whitespace, never beyond `end`. */
export const skipSpace = (bytes: Uint8Array, pos: number, end: number): number => {
    let i = pos;
    while (i < end && isSpace(bytes[i])) i++;
    return i;
};

/**
 * Skip a quoted string starting at `pos`.
 * @returns Index after the closing quote, or `-1` when unterminated.
 */
export const skipString = (bytes: Uint8Array, pos: number, end: number): number => {
    let i = pos + 1;
    while (i < end) {
        const b = bytes[i];
        if (b === BACKSLASH) {
            i += 2;
            continue;
        }
        if (b === QUOTE) return i + 1;
        i++;
    }
    return -1;
};

/**
 * Skip an object or array starting at `pos` by depth counting.
 * @returns Index after the matching closer, or `-1` when truncated or mismatched.
 */
export const skipComposite = (bytes: Uint8Array, pos: number, end: number): number => {
    const closers: number[] = [];
    let i = pos;
    while (i < end) {
        const b = bytes[i];
        if (b === QUOTE) {
            const next = skipString(bytes, i, end);
            if (next < 0) return -1;
            i = next;
            continue;
        }
        if (b === LBRACE) closers.push(RBRACE);
        else if (b === LBRACKET) closers.push(RBRACKET);
        else if (b === RBRACE || b === RBRACKET) {
            if (closers.pop() !== b) return -1;
            if (closers.length === 0) return i + 1;
        }
        i++;
    }
    return -1;
};

/**
 * Span of the first top-level object in a buffer. A truncated object spans
 * to the end of the buffer so the complete fields before the cut still read.
 */
export const rootSpan = (bytes: Uint8Array): Span | undefined => {
    const start = bytes.indexOf(LBRACE);
    if (start < 0) return undefined;
    const close = skipComposite(bytes, start, bytes.length);
    return {start, end: close < 0 ? bytes.length : close};
};

const keyMatches = (bytes: Uint8Array, from: number, to: number, key: Uint8Array): boolean => {
    if (to - from !== key.length) return false;
    for (let i = 0; i < key.length; i++) {
        if (bytes[from + i] !== key[i]) return false;
    }
    return true;
};

/**
 * Locate the value of `key` among the top-level members of the object in `span`.
 * @returns Position of the first value byte, or `undefined` when absent.
 */
export const findFieldValue = (bytes: Uint8Array, key: string, span: Span): number | undefined => {
    const keyBytes = textEncoder.encode(key);
    const end = Math.min(span.end, bytes.length);
    let i = span.start + 1;
    while (i < end) {
        const b = bytes[i];
        if (b === QUOTE) {
            const close = skipString(bytes, i, end);
            if (close < 0) return undefined;
            if (keyMatches(bytes, i + 1, close - 1, keyBytes)) {
                const colon = skipSpace(bytes, close, end);
                if (colon < end && bytes[colon] === COLON) {
                    const value = skipSpace(bytes, colon + 1, end);
                    return value < end ? value : undefined;
                }
            }
            i = close;
            continue;
        }
        if (b === LBRACE || b === LBRACKET) {
            const next = skipComposite(bytes, i, end);
            if (next < 0) return undefined;
            i = next;
            continue;
        }
        if (b === RBRACE) return undefined;
        i++;
    }
    return undefined;
};

const asciiSlice = (bytes: Uint8Array, pos: number, end: number): string => {
    let out = '';
    const limit = Math.min(end, pos + MAX_NUMBER_TOKEN);
    for (let i = pos; i < limit; i++) {
        out += String.fromCharCode(bytes[i] ?? 0);
    }
    return out;
};

/** Read a number token (decimal, float or `0x` hex) at `pos`. */
export const readNumber = (bytes: Uint8Array, pos: number, end: number): ReadResult<number> | undefined => {
    const match = NUMBER_PATTERN.exec(asciiSlice(bytes, pos, end));
    if (!match) return undefined;
    const token = match[0];
    const negative = token.startsWith('-');
    const unsigned = token.replace(/^[+-]/, '');
    const magnitude = /^0[xX]/.test(unsigned) ? parseInt(unsigned.slice(2), 16) : Number(unsigned);
    if (!Number.isFinite(magnitude)) return undefined;
    return {value: negative ? -magnitude : magnitude, next: pos + token.length};
};

/** Read a number and truncate it toward zero. */
export const readInt = (bytes: Uint8Array, pos: number, end: number): ReadResult<number> | undefined => {
    const result = readNumber(bytes, pos, end);
    if (!result) return undefined;
    return {value: Math.trunc(result.value), next: result.next};
};

const literalAt = (bytes: Uint8Array, pos: number, end: number, literal: string): boolean => {
    if (pos + literal.length > end) return false;
    for (let i = 0; i < literal.length; i++) {
        if (bytes[pos + i] !== literal.charCodeAt(i)) return false;
    }
    return true;
};

/** Read `true` or `false` at `pos`. */
export const readBool = (bytes: Uint8Array, pos: number, end: number): ReadResult<boolean> | undefined => {
    if (literalAt(bytes, pos, end, 'true')) return {value: true, next: pos + 4};
    if (literalAt(bytes, pos, end, 'false')) return {value: false, next: pos + 5};
    return undefined;
};

/** Read `null` at `pos`. */
export const readNull = (bytes: Uint8Array, pos: number, end: number): ReadResult<null> | undefined =>
    literalAt(bytes, pos, end, 'null') ? {value: null, next: pos + 4} : undefined;

/**
 * Read a quoted string at `pos`, truncated to `maxLength` characters.
 * Escape sequences are kept as they appear on the wire.
 */
export const readString = (
    bytes: Uint8Array,
    pos: number,
    end: number,
    maxLength: number,
): ReadResult<string> | undefined => {
    if (bytes[pos] !== QUOTE) return undefined;
    const close = skipString(bytes, pos, end);
    if (close < 0) return undefined;
    const raw = textDecoder.decode(bytes.subarray(pos + 1, close - 1));
    const value = raw.length <= maxLength ? raw : Array.from(raw).slice(0, maxLength).join('');
    return {value, next: close};
};

/**
 * Read the elements of an array at `pos` with `readElement`.
 * Reading stops at `max` elements, at the closing bracket, or at the first
 * element that does not parse; elements read so far are kept.
 */
export const readArray = <T>(
    bytes: Uint8Array,
    pos: number,
    end: number,
    max: number,
    readElement: (bytes: Uint8Array, pos: number, end: number) => ReadResult<T> | undefined,
): T[] | undefined => {
    if (bytes[pos] !== LBRACKET) return undefined;
    const out: T[] = [];
    let i = pos + 1;
    while (i < end && out.length < max) {
        i = skipSpace(bytes, i, end);
        if (i >= end || bytes[i] === RBRACKET) break;
        const element = readElement(bytes, i, end);
        if (!element) break;
        out.push(element.value);
        i = skipSpace(bytes, element.next, end);
        if (i < end && bytes[i] === COMMA) {
            i++;
            continue;
        }
        break;
    }
    return out;
};

/**
 * Spans of the objects inside an array at `pos`. An unbalanced object ends
 * the walk; the objects before it are returned.
 */
export const readObjectSpans = (bytes: Uint8Array, pos: number, end: number): Span[] | undefined => {
    if (bytes[pos] !== LBRACKET) return undefined;
    const spans: Span[] = [];
    let i = pos + 1;
    while (i < end) {
        i = skipSpace(bytes, i, end);
        if (i >= end || bytes[i] === RBRACKET) break;
        if (bytes[i] === COMMA) {
            i++;
            continue;
        }
        if (bytes[i] !== LBRACE) break;
        const close = skipComposite(bytes, i, end);
        if (close < 0) break;
        spans.push({start: i, end: close});
        i = close;
    }
    return spans;
};

/** Typed field lookups over one object span. */
export class FieldScanner {
    /**
     * @param bytes Whole datagram.
     * @param span Object to look fields up in.
     */
    constructor(
        public readonly bytes: Uint8Array,
        public readonly span: Span,
    ) {}

    /** Scanner over the first object in `bytes`, if any. */
    public static root(bytes: Uint8Array): FieldScanner | undefined {
        const span = rootSpan(bytes);
        return span ? new FieldScanner(bytes, span) : undefined;
    }

    /** `true` when the key is present, whatever its value. */
    public has(key: string): boolean {
        return this.locate(key) !== undefined;
    }

    public int(key: string): number | undefined {
        return this.read(key, readInt);
    }

    public float(key: string): number | undefined {
        return this.read(key, readNumber);
    }

    public bool(key: string): boolean | undefined {
        return this.read(key, readBool);
    }

    public string(key: string, maxLength: number): string | undefined {
        return this.read(key, (bytes, pos, end) => readString(bytes, pos, end, maxLength));
    }

    public intArray(key: string, max: number): number[] | undefined {
        const pos = this.locate(key);
        if (pos === undefined) return undefined;
        return readArray(this.bytes, pos, this.span.end, max, readInt);
    }

    public array<T>(
        key: string,
        max: number,
        readElement: (bytes: Uint8Array, pos: number, end: number) => ReadResult<T> | undefined,
    ): T[] | undefined {
        const pos = this.locate(key);
        if (pos === undefined) return undefined;
        return readArray(this.bytes, pos, this.span.end, max, readElement);
    }

    /** Scanners for each object of an array field. */
    public objects(key: string): FieldScanner[] | undefined {
        const pos = this.locate(key);
        if (pos === undefined) return undefined;
        const spans = readObjectSpans(this.bytes, pos, this.span.end);
        return spans?.map((span) => new FieldScanner(this.bytes, span));
    }

    /** Scanner for an object field. */
    public object(key: string): FieldScanner | undefined {
        const pos = this.locate(key);
        if (pos === undefined || this.bytes[pos] !== LBRACE) return undefined;
        const close = skipComposite(this.bytes, pos, this.span.end);
        if (close < 0) return undefined;
        return new FieldScanner(this.bytes, {start: pos, end: close});
    }

    private locate(key: string): number | undefined {
        return findFieldValue(this.bytes, key, this.span);
    }

    private read<T>(
        key: string,
        reader: (bytes: Uint8Array, pos: number, end: number) => ReadResult<T> | undefined,
    ): T | undefined {
        const pos = this.locate(key);
        if (pos === undefined) return undefined;
        return reader(this.bytes, pos, this.span.end)?.value;
    }
}
