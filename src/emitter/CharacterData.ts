/**
 * CharacterData — XML 1.0 Escaping for Text and Attribute Values
 *
 * The assembler turns off fast-xml-parser's own entity pass and routes
 * every value through these functions instead. Whitespace other than a
 * plain space is written as a character reference inside attribute
 * values, since a conforming parser would otherwise normalize it to a
 * space (XML 1.0 §3.3.3). Characters XML 1.0 cannot carry at all fail
 * with `InvalidXmlCharacterError`.
 *
 * @module
 */

// ── Errors ───────────────────────────────────────────────

/** Thrown for a character outside the XML 1.0 `Char` production */
export class InvalidXmlCharacterError extends Error {
    /** UTF-16 code unit of the offending character */
    readonly codePoint: number;
    /** Position in the value */
    readonly index: number;

    constructor(codePoint: number, index: number) {
        const hex = codePoint.toString(16).toUpperCase().padStart(4, '0');
        super(`Character U+${hex} at index ${index} cannot be represented in XML 1.0.`);
        this.name = 'InvalidXmlCharacterError';
        this.codePoint = codePoint;
        this.index = index;
    }
}

// ── Tables ───────────────────────────────────────────────

// C0 controls other than tab/LF/CR, the two noncharacters, and unpaired surrogates
const FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const TEXT_ENTITIES: ReadonlyMap<string, string> = new Map([
    ['&', '&amp;'],
    ['<', '&lt;'],
    ['>', '&gt;'],
    ['\r', '&#13;'],
]);

const ATTRIBUTE_ENTITIES: ReadonlyMap<string, string> = new Map([
    ...TEXT_ENTITIES,
    ['"', '&quot;'],
    ['\n', '&#10;'],
    ['\t', '&#9;'],
]);

const TEXT_SPECIALS = /[&<>\r]/g;
const ATTRIBUTE_SPECIALS = /[&<>\r"\n\t]/g;

// ── Public API ───────────────────────────────────────────

/**
 * @throws {InvalidXmlCharacterError} when `value` holds a character XML
 *   1.0 forbids
 */
export function assertXmlCharacters(value: string): string {
    const match = FORBIDDEN.exec(value);
    if (match !== null) {
        throw new InvalidXmlCharacterError(value.charCodeAt(match.index), match.index);
    }
    return value;
}

/**
 * Escape element text.
 *
 * @example
 * escapeText('a < b\r\n') → 'a &lt; b&#13;\n'
 */
export function escapeText(value: string): string {
    return assertXmlCharacters(value).replace(TEXT_SPECIALS, char => TEXT_ENTITIES.get(char) ?? char);
}

/**
 * Escape a double-quoted attribute value.
 *
 * @example
 * escapeAttribute('a\tb "c"') → 'a&#9;b &quot;c&quot;'
 */
export function escapeAttribute(value: string): string {
    return assertXmlCharacters(value).replace(ATTRIBUTE_SPECIALS, char => ATTRIBUTE_ENTITIES.get(char) ?? char);
}
