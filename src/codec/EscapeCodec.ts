/**
 * EscapeCodec — Reversible Value Escaping for Galaxy Tool XML
 *
 * Galaxy strips or mangles a handful of characters in parameter values,
 * so every value written into a tool document goes through `escapeValue()`
 * and comes back through `unescapeValue()` on the execution side.
 *
 * Two tables drive the codec:
 * - `ESCAPE_TABLE` maps single characters to placeholder tokens
 *   (mirrors `galaxy.util.mapped_chars`, plus `,`)
 * - `LITERAL_TABLE` maps the three non-string values (`null`, `true`,
 *   `false`) to sentinel tokens
 *
 * Both tables are ordered arrays. Encoding substitutes in table order;
 * decoding restores every token in a single left-to-right scan, so a token
 * produced by one character is never re-read across the boundary of its
 * neighbour (`'>ob]'` encodes to `__gt__ob__cb__`, which contains
 * `__ob__`). Reversibility still depends on the tokens: no token may
 * contain another token or any escaped character.
 *
 * @module
 */

// ── Types ────────────────────────────────────────────────

/**
 * A value the codec can carry: text, or one of the three literals.
 * `null` stands for an absent value.
 */
export type LiteralValue = string | boolean | null;

/** Options for {@link controlToken} */
export interface ControlTokenOptions {
    readonly value?: string | null;
    readonly tag?: string;
    readonly name?: string;
}

// ── Tables ───────────────────────────────────────────────

export const ESCAPE_TABLE: ReadonlyArray<readonly [char: string, token: string]> = [
    ['[', '__ob__'],
    [']', '__cb__'],
    ['>', '__gt__'],
    ['<', '__lt__'],
    ['\'', '__sq__'],
    ['"', '__dq__'],
    ['{', '__oc__'],
    ['}', '__cc__'],
    ['@', '__at__'],
    ['\n', '__cn__'],
    ['\r', '__cr__'],
    ['\t', '__tc__'],
    ['#', '__pd__'],
    // keeps <test/> from splitting one value into several
    [',', '__comma__'],
];

export const LITERAL_TABLE: ReadonlyArray<readonly [value: boolean | null, token: string]> = [
    [null, '__q2galaxy__::literal::None'],
    [true, '__q2galaxy__::literal::True'],
    [false, '__q2galaxy__::literal::False'],
];

const CONTROL_PREFIX = '__q2galaxy__::control::';

const TOKEN_CHARS = new Map(ESCAPE_TABLE.map(([char, token]): [string, string] => [token, char]));

// Alternatives in table order; leftmost match wins, so order only breaks ties
const TOKEN_PATTERN = new RegExp(
    ESCAPE_TABLE.map(([, token]) => token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|'),
    'g',
);

// ── Errors ───────────────────────────────────────────────

/**
 * Thrown when `escapeValue()` receives something other than a string,
 * `null`, `true` or `false`.
 */
export class UnsupportedValueError extends Error {
    /** Runtime type of the rejected value (`typeof`, or `'array'`) */
    readonly valueType: string;

    constructor(value: unknown) {
        const valueType = Array.isArray(value) ? 'array' : typeof value;
        super(`Unsupported value type "${valueType}": only strings, null, true and false can be escaped.`);
        this.name = 'UnsupportedValueError';
        this.valueType = valueType;
    }
}

// ── Public API ───────────────────────────────────────────

/**
 * Escape a value for use as a Galaxy attribute or text value.
 *
 * Strings are rewritten character by character through `ESCAPE_TABLE`.
 * `null`, `true` and `false` become sentinel tokens; the string `'True'`
 * is ordinary text and is returned as-is.
 *
 * @throws {UnsupportedValueError} for any other value
 *
 * @example
 * escapeValue('a[1]')  → 'a__ob__1__cb__'
 * escapeValue(true)    → '__q2galaxy__::literal::True'
 */
export function escapeValue(value: unknown): string {
    if (typeof value === 'string') {
        let result = value;
        for (const [char, token] of ESCAPE_TABLE) {
            result = result.replaceAll(char, token);
        }
        return result;
    }

    for (const [literal, token] of LITERAL_TABLE) {
        if (value === literal) return token;
    }

    throw new UnsupportedValueError(value);
}

/**
 * Reverse {@link escapeValue}.
 *
 * A whole-string match against a sentinel token yields the literal;
 * anything else is text and has its placeholder tokens restored.
 *
 * Tokens are restored in one left-to-right scan, not one table entry at a
 * time, so restored text is never matched again. The two differ on input
 * that was not produced by {@link escapeValue}: `'x__gt__ob__'` decodes to
 * `'x>ob__'` here, where replacing `__ob__` first would give `'x__gt['`.
 * `unescapeValue(escapeValue(s)) === s` for every string without `_`; text that
 * already contains token spellings is not recoverable.
 */
export function unescapeValue(text: string): LiteralValue {
    for (const [literal, token] of LITERAL_TABLE) {
        if (text === token) return literal;
    }

    return text.replace(TOKEN_PATTERN, token => TOKEN_CHARS.get(token) ?? token);
}

/**
 * Build a one-way placeholder binding a value to a Galaxy UI control.
 *
 * With a `value`, the token names the value directly. Without one, it is
 * a `__`-joined path of the element tag and name. These tokens are never
 * decoded by {@link unescapeValue}.
 *
 * @example
 * controlToken({ value: 'auto' })                    → '__q2galaxy__::control::auto'
 * controlToken({ tag: 'conditional', name: 'mode' }) → '__q2galaxy__GUI__conditional__mode__'
 */
export function controlToken(options: ControlTokenOptions = {}): string {
    if (options.value !== undefined && options.value !== null) {
        return `${CONTROL_PREFIX}${options.value}`;
    }

    const elements = ['', 'q2galaxy', 'GUI'];
    if (options.tag !== undefined) elements.push(options.tag);
    if (options.name !== undefined) elements.push(options.name);
    elements.push('');
    return elements.join('__');
}
