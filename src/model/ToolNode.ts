/**
 * ToolNode — In-Memory Tool Tree
 *
 * The tree handed to the ordering engine and the document assembler.
 * A node is a tag, a bag of string attributes, child nodes, and optional
 * inline text. Neither attribute insertion order nor child order carries
 * meaning on input; both are recomputed by `canonicalize()`.
 *
 * @module
 */
import { z } from 'zod';

// ── Types ────────────────────────────────────────────────

/** A named element of a tool document */
export interface ToolNode {
    readonly tag: string;
    readonly attributes: Readonly<Record<string, string>>;
    readonly children: readonly ToolNode[];
    /** Inline text content, emitted before any child element */
    readonly text?: string;
}

/** Shape accepted by {@link ToolNodeSchema} after defaults are applied */
export interface ToolNodeInput {
    tag: string;
    attributes: Record<string, string>;
    children: ToolNodeInput[];
    text?: string | undefined;
}

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

// ── Errors ───────────────────────────────────────────────

/** Thrown by `createNode()` when a tag or attribute name is not an XML name */
export class InvalidNameError extends Error {
    readonly kind: 'tag' | 'attribute';
    readonly value: string;

    constructor(kind: 'tag' | 'attribute', value: string) {
        super(`Invalid ${kind} name "${value}": expected an XML name.`);
        this.name = 'InvalidNameError';
        this.kind = kind;
        this.value = value;
    }
}

// ── Builder ──────────────────────────────────────────────

/**
 * Build a tool node.
 *
 * @throws {InvalidNameError} when the tag or an attribute name is not an
 *   XML name (`#comment` or `?xml` would otherwise be read as serializer
 *   directives)
 *
 * @example
 * createNode('param', { name: 'x', type: 'integer' })
 * createNode('description', {}, [], 'Do a thing')
 */
export function createNode(
    tag: string,
    attributes: Readonly<Record<string, string>> = {},
    children: readonly ToolNode[] = [],
    text?: string,
): ToolNode {
    if (!XML_NAME.test(tag)) throw new InvalidNameError('tag', tag);
    for (const name of Object.keys(attributes)) {
        if (!XML_NAME.test(name)) throw new InvalidNameError('attribute', name);
    }

    return {
        tag,
        attributes: { ...attributes },
        children: [...children],
        ...(text !== undefined ? { text } : {}),
    };
}

// ── Validation ───────────────────────────────────────────

const XmlNameSchema = z.string().regex(XML_NAME, 'must be a valid XML name');

// zod builds records by assignment, which would turn this key into a prototype
const AttributeNameSchema = XmlNameSchema.refine(name => name !== '__proto__', 'is a reserved attribute name');

/**
 * Recursive schema for trees loaded from YAML or JSON.
 *
 * Attribute values must already be strings: `version: 1.0` in YAML is a
 * number and is rejected rather than silently reformatted.
 */
export const ToolNodeSchema: z.ZodType<ToolNodeInput, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        tag: XmlNameSchema,
        attributes: z.record(AttributeNameSchema, z.string()).default({}),
        children: z.array(ToolNodeSchema).default([]),
        text: z.string().optional(),
    }).strict(),
);

/**
 * Validate an untyped tree and convert it to a {@link ToolNode}.
 *
 * @throws {z.ZodError} when the tree does not match {@link ToolNodeSchema}
 */
export function parseToolTree(raw: unknown): ToolNode {
    return fromInput(ToolNodeSchema.parse(raw));
}

function fromInput(input: ToolNodeInput): ToolNode {
    return createNode(input.tag, input.attributes, input.children.map(fromInput), input.text);
}
