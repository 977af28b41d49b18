/**
 * PriorityOrder — Canonical Orderings for Galaxy Tool XML
 *
 * The two fixed lists below are the implicit schema of a generated tool:
 * which attributes come first on any element, and which sections a
 * `<tool>` may contain and in what order.
 *
 * @module
 */

// ── Priority Lists ───────────────────────────────────────

/** Attributes listed here lead, in this order; the rest follow alphabetically */
export const ATTRIBUTE_ORDER = [
    'name', 'argument', 'type', 'format', 'min', 'truevalue',
    'max', 'falsevalue', 'value', 'checked', 'optional', 'label',
    'help',
] as const;

/** The only sections a `<tool>` root may contain, in canonical order */
export const TOOL_SECTION_ORDER = [
    'description', 'macros', 'edam_topics', 'edam_operations',
    'parallelism', 'requirements', 'code', 'stdio', 'version_command',
    'command', 'environment_variables', 'configfiles', 'inputs',
    'request_param_translation', 'outputs', 'tests', 'help',
    'citations',
] as const;

export type ToolSection = typeof TOOL_SECTION_ORDER[number];

// ── Rank Maps ────────────────────────────────────────────

/** Name → position in a priority list */
export type RankMap = ReadonlyMap<string, number>;

/**
 * Build a rank map from a priority list.
 *
 * @throws {Error} if the list names an entry twice
 */
export function createRankMap(order: readonly string[]): RankMap {
    const ranks = new Map<string, number>();
    order.forEach((entry, index) => {
        if (ranks.has(entry)) {
            throw new Error(`Priority list names "${entry}" more than once.`);
        }
        ranks.set(entry, index);
    });
    return ranks;
}

export const ATTRIBUTE_RANKS: RankMap = createRankMap(ATTRIBUTE_ORDER);
export const TOOL_SECTION_RANKS: RankMap = createRankMap(TOOL_SECTION_ORDER);

// ── Errors ───────────────────────────────────────────────

/**
 * Thrown when a child element's tag is missing from the priority list
 * that orders its parent's children.
 */
export class UnknownSectionError extends Error {
    readonly tag: string;
    readonly parent: string;
    readonly allowed: readonly string[];

    constructor(tag: string, parent: string, allowed: readonly string[]) {
        super(`Unknown section <${tag}> in <${parent}>. Allowed sections: ${allowed.join(', ')}.`);
        this.name = 'UnknownSectionError';
        this.tag = tag;
        this.parent = parent;
        this.allowed = allowed;
    }
}
