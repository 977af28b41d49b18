import { describe, it, expect } from 'vitest';
import {
    ESCAPE_TABLE,
    LITERAL_TABLE,
    escapeValue,
    unescapeValue,
    controlToken,
    UnsupportedValueError,
} from '../../src/codec/EscapeCodec.js';

// ── Helpers ──────────────────────────────────────────────

/** Small seeded PRNG so generated cases are reproducible */
function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6D2B79F5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Printable ASCII plus the escaped whitespace, without `_` */
const ALPHABET = [
    ...Array.from({ length: 95 }, (_, i) => String.fromCharCode(32 + i)).filter(c => c !== '_'),
    '\n', '\r', '\t', 'é', '日',
];

function randomString(next: () => number, maxLength: number): string {
    const length = Math.floor(next() * (maxLength + 1));
    let out = '';
    for (let i = 0; i < length; i++) {
        out += ALPHABET[Math.floor(next() * ALPHABET.length)] ?? '';
    }
    return out;
}

// ============================================================================
// EscapeCodec Tests
// ============================================================================

describe('EscapeCodec', () => {
    // ── Tables ──

    describe('tables', () => {
        it('should escape exactly the fourteen Galaxy-mapped characters, in order', () => {
            expect(ESCAPE_TABLE.map(([char]) => char)).toEqual([
                '[', ']', '>', '<', '\'', '"', '{', '}', '@', '\n', '\r', '\t', '#', ',',
            ]);
        });

        it('should never let one token contain another token', () => {
            for (const [, outer] of ESCAPE_TABLE) {
                for (const [, inner] of ESCAPE_TABLE) {
                    if (outer === inner) continue;
                    expect(outer.includes(inner), `${outer} contains ${inner}`).toBe(false);
                }
            }
        });

        it('should never put an escaped character inside a token', () => {
            for (const [char] of ESCAPE_TABLE) {
                for (const [, token] of ESCAPE_TABLE) {
                    expect(token.includes(char), `${JSON.stringify(token)} contains ${JSON.stringify(char)}`).toBe(false);
                }
                for (const [, sentinel] of LITERAL_TABLE) {
                    expect(sentinel.includes(char)).toBe(false);
                }
            }
        });

        it('should keep sentinel tokens out of reach of the character table', () => {
            for (const [, sentinel] of LITERAL_TABLE) {
                for (const [, token] of ESCAPE_TABLE) {
                    expect(sentinel.includes(token)).toBe(false);
                }
            }
        });
    });

    // ── escapeValue ──

    describe('escapeValue()', () => {
        it('should replace brackets', () => {
            expect(escapeValue('a[1]')).toBe('a__ob__1__cb__');
        });

        it('should replace quotes and newlines', () => {
            expect(escapeValue('it\'s "ok"\n')).toBe('it__sq__s __dq__ok__dq____cn__');
        });

        it('should replace commas so test values are not split', () => {
            expect(escapeValue('x, y')).toBe('x__comma__ y');
        });

        it('should escape every mapped character', () => {
            expect(escapeValue('[]><\'"{}@\n\r\t#,')).toBe(
                '__ob____cb____gt____lt____sq____dq____oc____cc____at____cn____cr____tc____pd____comma__',
            );
        });

        it('should leave plain text untouched', () => {
            expect(escapeValue('plain text_with-underscores.')).toBe('plain text_with-underscores.');
        });

        it('should return the empty string unchanged', () => {
            expect(escapeValue('')).toBe('');
        });

        it('should map null, true and false to sentinels', () => {
            expect(escapeValue(null)).toBe('__q2galaxy__::literal::None');
            expect(escapeValue(true)).toBe('__q2galaxy__::literal::True');
            expect(escapeValue(false)).toBe('__q2galaxy__::literal::False');
        });

        it('should treat the strings "True", "None" and "False" as text', () => {
            expect(escapeValue('True')).toBe('True');
            expect(escapeValue('None')).toBe('None');
            expect(escapeValue('False')).toBe('False');
            expect(escapeValue(true)).not.toBe(escapeValue('True'));
        });

        it('should reject numbers, including 1 and 0', () => {
            expect(() => escapeValue(1)).toThrow(UnsupportedValueError);
            expect(() => escapeValue(0)).toThrow(UnsupportedValueError);
        });

        it('should reject undefined, objects and arrays with the value type', () => {
            const cases: Array<[unknown, string]> = [
                [undefined, 'undefined'],
                [{}, 'object'],
                [['a'], 'array'],
                [Symbol('s'), 'symbol'],
            ];
            for (const [value, valueType] of cases) {
                let caught: unknown;
                try {
                    escapeValue(value);
                } catch (err) {
                    caught = err;
                }
                expect(caught).toBeInstanceOf(UnsupportedValueError);
                expect(caught instanceof UnsupportedValueError ? caught.valueType : undefined).toBe(valueType);
            }
        });

        it('should name the error', () => {
            const err = new UnsupportedValueError(3);
            expect(err.name).toBe('UnsupportedValueError');
            expect(err.message).toBe('Unsupported value type "number": only strings, null, true and false can be escaped.');
        });
    });

    // ── unescapeValue ──

    describe('unescapeValue()', () => {
        it('should restore escaped characters', () => {
            expect(unescapeValue('a__ob__1__cb__')).toBe('a[1]');
            expect(unescapeValue('x__comma__ y')).toBe('x, y');
        });

        it('should return the identical literal for each sentinel', () => {
            expect(unescapeValue('__q2galaxy__::literal::None')).toBeNull();
            expect(unescapeValue('__q2galaxy__::literal::True')).toBe(true);
            expect(unescapeValue('__q2galaxy__::literal::False')).toBe(false);
        });

        it('should only match sentinels against the whole string', () => {
            expect(unescapeValue(' __q2galaxy__::literal::None')).toBe(' __q2galaxy__::literal::None');
            expect(unescapeValue('__q2galaxy__::literal::True__comma__')).toBe('__q2galaxy__::literal::True,');
        });

        it('should not decode control tokens', () => {
            const token = controlToken({ tag: 'conditional', name: 'mode' });
            expect(unescapeValue(token)).toBe(token);
        });

        it('should not read a token across the boundary of its neighbours', () => {
            // '>ob]' escapes to '__gt__ob__cb__', which contains '__ob__' at index 4
            expect(escapeValue('>ob]')).toBe('__gt__ob__cb__');
            expect(unescapeValue('__gt__ob__cb__')).toBe('>ob]');
        });

        it('should take the leftmost token when tokens overlap', () => {
            expect(unescapeValue('x__gt__ob__')).toBe('x>ob__');
        });
    });

    // ── Round trip ──

    describe('round trip', () => {
        it('should restore every string without underscores', () => {
            const next = mulberry32(20210427);
            for (let i = 0; i < 500; i++) {
                const s = randomString(next, 24);
                expect(unescapeValue(escapeValue(s))).toBe(s);
            }
        });

        it('should restore strings mixing underscores with escaped characters', () => {
            for (const s of ['snake_case [x]', '_[', '[_', 'a_>', 'x_,_y', '{a_b}']) {
                expect(unescapeValue(escapeValue(s))).toBe(s);
            }
        });

        it('should return the identical literal for each sentinel value', () => {
            expect(unescapeValue(escapeValue(null))).toBe(null);
            expect(unescapeValue(escapeValue(true))).toBe(true);
            expect(unescapeValue(escapeValue(false))).toBe(false);
        });
    });

    // ── controlToken ──

    describe('controlToken()', () => {
        it('should name a direct value', () => {
            expect(controlToken({ value: 'auto' })).toBe('__q2galaxy__::control::auto');
        });

        it('should join tag and name into a GUI path', () => {
            expect(controlToken({ tag: 'conditional', name: 'mode' })).toBe('__q2galaxy__GUI__conditional__mode__');
        });

        it('should skip missing parts', () => {
            expect(controlToken()).toBe('__q2galaxy__GUI__');
            expect(controlToken({ tag: 'section' })).toBe('__q2galaxy__GUI__section__');
            expect(controlToken({ name: 'x' })).toBe('__q2galaxy__GUI__x__');
        });

        it('should fall back to the GUI path when value is null', () => {
            expect(controlToken({ value: null, tag: 'when' })).toBe('__q2galaxy__GUI__when__');
        });
    });
});
