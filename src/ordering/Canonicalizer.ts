/**
 * Canonicalizer — Deterministic Ordering of Tool Trees
 *
 * Produces a new tree where:
 * - attributes on every element follow `ATTRIBUTE_ORDER`, then the
 *   remaining names in code-unit order
 * - the root's children follow `TOOL_SECTION_ORDER`; an unlisted tag
 *   fails with `UnknownSectionError`
 * - deeper children keep their input order unless `sectionOrders` names
 *   a list for their parent's tag
 *
 * The input tree is never mutated, and `canonicalize(canonicalize(t))`
 * equals `canonicalize(t)`.
 *
 * @module
 */
import type { ToolNode } from '../model/ToolNode.js';
import {
    ATTRIBUTE_RANKS,
    TOOL_SECTION_ORDER,
    UnknownSectionError,
    createRankMap,
    type RankMap,
} from './PriorityOrder.js';

// ── Options ──────────────────────────────────────────────

export interface CanonicalizeOptions {
    /** Order for the root's direct children (default: `TOOL_SECTION_ORDER`) */
    readonly rootOrder?: readonly string[];
    /**
     * Child orders for nested elements, keyed by parent tag.
     * Only parents named here have their children re-sorted.
     */
    readonly sectionOrders?: Readonly<Record<string, readonly string[]>>;
}

interface SectionOrder {
    readonly order: readonly string[];
    readonly ranks: RankMap;
}

// ── Public API ───────────────────────────────────────────

/**
 * Return a copy of `attributes` whose key order is canonical.
 *
 * @example
 * sortAttributes({ help: 'h', name: 'n', zzz: 'z', argument: 'a' })
 * // keys → ['name', 'argument', 'help', 'zzz']
 */
export function sortAttributes(attributes: Readonly<Record<string, string>>): Record<string, string> {
    const ranked: Array<[string, number]> = [];
    const remaining: string[] = [];

    for (const key of Object.keys(attributes)) {
        const rank = ATTRIBUTE_RANKS.get(key);
        if (rank === undefined) {
            remaining.push(key);
        } else {
            ranked.push([key, rank]);
        }
    }

    ranked.sort((a, b) => a[1] - b[1]);
    remaining.sort(compareCodeUnits);

    // fromEntries defines own properties, so `__proto__` stays an attribute
    return Object.fromEntries(
        [...ranked.map(([key]) => key), ...remaining].map((key): [string, string] => [key, attributeValue(attributes, key)]),
    );
}

/**
 * Canonicalize a tool tree.
 *
 * @throws {UnknownSectionError} when a child of an ordered parent has an
 *   unlisted tag
 */
export function canonicalize(root: ToolNode, options: CanonicalizeOptions = {}): ToolNode {
    const nested = new Map<string, SectionOrder>();
    for (const [parent, order] of Object.entries(options.sectionOrders ?? {})) {
        nested.set(parent, toSectionOrder(order));
    }

    const rootOrder = options.rootOrder !== undefined
        ? toSectionOrder(options.rootOrder)
        : DEFAULT_ROOT_ORDER;

    return canonicalizeNode(root, rootOrder, nested);
}

// ── Internal ─────────────────────────────────────────────

const DEFAULT_ROOT_ORDER: SectionOrder = toSectionOrder(TOOL_SECTION_ORDER);

function canonicalizeNode(
    node: ToolNode,
    order: SectionOrder | undefined,
    nested: ReadonlyMap<string, SectionOrder>,
): ToolNode {
    const children = node.children.map(child => canonicalizeNode(child, nested.get(child.tag), nested));

    return {
        tag: node.tag,
        attributes: sortAttributes(node.attributes),
        children: order !== undefined ? sortSections(node.tag, children, order) : children,
        ...(node.text !== undefined ? { text: node.text } : {}),
    };
}

function sortSections(parent: string, children: readonly ToolNode[], order: SectionOrder): ToolNode[] {
    const ranked = children.map(child => {
        const rank = order.ranks.get(child.tag);
        if (rank === undefined) {
            throw new UnknownSectionError(child.tag, parent, order.order);
        }
        return { child, rank };
    });

    // Array.prototype.sort is stable: repeated tags keep their input order
    ranked.sort((a, b) => a.rank - b.rank);
    return ranked.map(entry => entry.child);
}

function toSectionOrder(order: readonly string[]): SectionOrder {
    return { order: [...order], ranks: createRankMap(order) };
}

function attributeValue(attributes: Readonly<Record<string, string>>, key: string): string {
    return attributes[key] ?? '';
}

function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
