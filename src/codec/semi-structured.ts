import type { JsonValue } from '../types/index.js';
import { EncodingError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Semi-structured value codec.
 *
 * Values bound for a semi-structured column are flattened into plain JSON
 * before they reach the driver. Anything without a JSON form fails here,
 * at encode time, with the path of the offending value.
 */

/**
 * Objects that know how to flatten themselves. `Date`, `Buffer` and most
 * model classes already implement this.
 */
export interface Flattenable {
    toJSON(): unknown;
}

export type DecodeResult =
    | { status: 'native' | 'parsed'; value: JsonValue }
    | { status: 'raw'; value: string; error: string };

export function isFlattenable(value: unknown): value is Flattenable {
    return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function';
}

function isPlainObject(value: object): boolean {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
    if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
    if (typeof value === 'object' && value !== null) {
        const name = value.constructor?.name;
        return name ? `${name} instance` : 'object';
    }
    return typeof value;
}

function childPath(path: string, key: string | number): string {
    return typeof key === 'number' ? `${path}[${key}]` : `${path}.${key}`;
}

function encodeAt(value: unknown, path: string, ancestors: Set<object>): JsonValue {
    if (value === null || value === undefined) return null;

    switch (typeof value) {
        case 'string':
        case 'boolean':
            return value;
        case 'number':
            if (!Number.isFinite(value)) {
                throw new EncodingError(`Non-finite number ${value} has no JSON form`, path);
            }
            return value;
        case 'bigint':
            if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
                throw new EncodingError(`BigInt ${value} is outside the safe integer range`, path);
            }
            return Number(value);
        case 'function':
        case 'symbol':
            throw new EncodingError(`Unsupported value (${describe(value)})`, path);
        default:
            break;
    }

    if (typeof value !== 'object') {
        throw new EncodingError(`Unsupported value (${describe(value)})`, path);
    }

    if (ancestors.has(value)) {
        throw new EncodingError('Circular reference', path);
    }
    ancestors.add(value);

    try {
        if (isFlattenable(value)) {
            const flattened = value.toJSON();
            if (flattened === value) {
                throw new EncodingError(`${describe(value)} flattens to itself`, path);
            }
            return encodeAt(flattened, path, ancestors);
        }

        if (Array.isArray(value)) {
            return value.map((item, index) => encodeAt(item, childPath(path, index), ancestors));
        }

        if (ArrayBuffer.isView(value)) {
            return encodeTypedArray(value, path);
        }

        if (value instanceof Set) {
            return Array.from(value, (item, index) => encodeAt(item, childPath(path, index), ancestors));
        }

        if (value instanceof Map) {
            const result: { [key: string]: JsonValue } = {};
            for (const [key, item] of value) {
                if (typeof key !== 'string') {
                    throw new EncodingError(`Map key of type ${typeof key} is not a string`, path);
                }
                if (item !== undefined) {
                    result[key] = encodeAt(item, childPath(path, key), ancestors);
                }
            }
            return result;
        }

        if (isPlainObject(value)) {
            const result: { [key: string]: JsonValue } = {};
            for (const [key, item] of Object.entries(value)) {
                if (item !== undefined) {
                    result[key] = encodeAt(item, childPath(path, key), ancestors);
                }
            }
            return result;
        }

        throw new EncodingError(`Unsupported value (${describe(value)})`, path);
    } finally {
        ancestors.delete(value);
    }
}

function encodeTypedArray(view: ArrayBufferView, path: string): JsonValue {
    if (
        view instanceof Uint8Array ||
        view instanceof Int8Array ||
        view instanceof Uint8ClampedArray ||
        view instanceof Int16Array ||
        view instanceof Uint16Array ||
        view instanceof Int32Array ||
        view instanceof Uint32Array ||
        view instanceof Float32Array ||
        view instanceof Float64Array
    ) {
        return Array.from(view, (item, index) => {
            if (!Number.isFinite(item)) {
                throw new EncodingError(`Non-finite number ${item} has no JSON form`, childPath(path, index));
            }
            return item;
        });
    }
    throw new EncodingError(`Unsupported value (${describe(view)})`, path);
}

/**
 * Flatten a value into plain JSON, or throw EncodingError.
 */
export function encode(value: unknown): JsonValue {
    return encodeAt(value, '$', new Set());
}

/**
 * Encode and render as the text a driver binds. SQL NULL for null.
 */
export function serialize(value: unknown): string | null {
    const encoded = encode(value);
    return encoded === null ? null : JSON.stringify(encoded);
}

/**
 * How a store hands back a semi-structured column. `native` drivers return
 * maps, lists and scalars as they were bound; `text` drivers return the
 * JSON text the column holds.
 */
export type StoredForm = 'native' | 'text';

export interface DecodeOptions {
    form?: StoredForm;
    /** Extra log fields when malformed text is kept. */
    context?: Record<string, unknown>;
}

/**
 * Decode a stored column value, reporting how it was obtained.
 * Never throws: malformed text comes back unchanged with `status: 'raw'`.
 * Byte buffers are always treated as UTF-8 JSON text.
 */
export function decodeDetailed(stored: unknown, form: StoredForm = 'native'): DecodeResult {
    if (stored === null || stored === undefined) {
        return { status: 'native', value: null };
    }

    const isBytes = stored instanceof Uint8Array;
    const text = isBytes ? new TextDecoder().decode(stored) : stored;

    if (typeof text === 'string' && (isBytes || form === 'text')) {
        try {
            const parsed: JsonValue = JSON.parse(text);
            return { status: 'parsed', value: parsed };
        } catch (error) {
            return { status: 'raw', value: text, error: errorMessage(error) };
        }
    }

    try {
        return { status: 'native', value: encode(text) };
    } catch (error) {
        return { status: 'raw', value: String(text), error: errorMessage(error) };
    }
}

/**
 * Inverse of `encode` for native stores; with `form: 'text'`, parses the
 * column's JSON text. Malformed text is returned as-is and logged.
 */
export function decode(stored: unknown, options: DecodeOptions = {}): JsonValue {
    const result = decodeDetailed(stored, options.form);
    if (result.status === 'raw') {
        getLogger().warn(
            { ...options.context, error: result.error },
            'Stored semi-structured value is not valid JSON, keeping raw text'
        );
    }
    return result.value;
}

// ─── Canonical form ───────────────────────────────────────

interface IntegerLike {
    low: number;
    high: number;
    toNumber(): number;
}

function isIntegerLike(value: object): value is IntegerLike {
    return (
        'low' in value &&
        'high' in value &&
        'toNumber' in value &&
        typeof value.low === 'number' &&
        typeof value.high === 'number' &&
        typeof value.toNumber === 'function'
    );
}

/**
 * Canonical JSON form for comparisons: driver integers become numbers,
 * `-0` becomes `0`, map keys are sorted. Values with no JSON form are
 * compared by their string rendering.
 */
export function canonicalize(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return Object.is(value, -0) ? 0 : value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' || typeof value === 'boolean') return value;

    if (typeof value === 'object') {
        if (isIntegerLike(value)) return value.toNumber();
        if (Array.isArray(value)) return value.map(canonicalize);
        if (value instanceof Set) return Array.from(value, canonicalize);

        const source = value instanceof Map ? Object.fromEntries(value) : isFlattenable(value) ? value.toJSON() : value;
        if (source !== value) return canonicalize(source);

        const result: { [key: string]: JsonValue } = {};
        for (const key of Object.keys(value).sort()) {
            const item: unknown = Reflect.get(value, key);
            if (item !== undefined) {
                result[key] = canonicalize(item);
            }
        }
        return result;
    }

    return String(value);
}

export function canonicalJson(value: unknown): string {
    return JSON.stringify(canonicalize(value));
}

export function canonicallyEqual(left: unknown, right: unknown): boolean {
    return canonicalJson(left) === canonicalJson(right);
}
