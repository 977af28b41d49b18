/**
 * DocumentAssembler — Canonical Tree → Galaxy Tool XML
 *
 * Decorates a canonical `<tool>` tree with its fixed root attributes,
 * prepends the copyright and provenance comments, and serializes the
 * result through fast-xml-parser's ordered builder so that attribute and
 * child order are exactly those of the canonical tree. Values are escaped
 * by `CharacterData` rather than by the builder's entity pass.
 *
 * Output layout:
 * ```xml
 * <?xml version="1.0" encoding="UTF-8"?>
 * <!--copyright-->
 * <!--provenance-->
 * <tool ... profile="20.09" license="BSD-3-Clause">
 *     ...
 * </tool>
 * ```
 *
 * @module
 */
import { closeSync, openSync, writeSync } from 'node:fs';
import { XMLBuilder } from 'fast-xml-parser';
import type { ToolNode } from '../model/ToolNode.js';
import { canonicalize } from '../ordering/Canonicalizer.js';
import {
    DEFAULT_CONFIG,
    metadataFromConfig,
    type GeneratorConfig,
    type SystemVersion,
} from '../config/GeneratorConfig.js';
import type { DebugObserverFn, GenerationStep } from '../observability/DebugObserver.js';
import { copyrightNotice, provenanceNote } from './Provenance.js';
import { assertXmlCharacters, escapeAttribute, escapeText } from './CharacterData.js';

// ── Types ────────────────────────────────────────────────

/** Caller-supplied values for the leading comment blocks */
export interface DocumentMetadata {
    readonly generator: SystemVersion;
    readonly target: SystemVersion;
    /** Year in the copyright notice (default: the current year) */
    readonly year?: number;
}

export interface WriteToolOptions {
    /** Defaults to the provenance in `config` */
    readonly metadata?: DocumentMetadata;
    readonly config?: GeneratorConfig;
    readonly debug?: DebugObserverFn;
}

/** fast-xml-parser `preserveOrder` entry: `{ [tag]: children, ':@'?: attributes }` */
type OrderedEntry = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';
const COMMENT_NODE = '#comment';

// Stands in for `''` text so the builder keeps the element open; no escaped value can contain U+0000
const EMPTY_TEXT = '\u0000';

// ── Public API ───────────────────────────────────────────

/**
 * Return a copy of the root with `profile` and `license` set.
 * An attribute already present keeps its position; new ones are appended.
 */
export function decorateTool(canonical: ToolNode, config: GeneratorConfig = DEFAULT_CONFIG): ToolNode {
    return {
        ...canonical,
        attributes: {
            ...canonical.attributes,
            profile: config.profile,
            license: config.license,
        },
    };
}

/**
 * Serialize a canonical tree to a complete XML document string.
 *
 * The tree is not re-sorted; pass it through `canonicalize()` first.
 */
export function renderToolXml(
    canonical: ToolNode,
    metadata: DocumentMetadata,
    config: GeneratorConfig = DEFAULT_CONFIG,
): string {
    const year = metadata.year ?? new Date().getFullYear();
    const document: OrderedEntry[] = [
        {
            '?xml': [{ [TEXT_NODE]: '' }],
            ':@': { [`${ATTRIBUTE_PREFIX}version`]: '1.0', [`${ATTRIBUTE_PREFIX}encoding`]: 'UTF-8' },
        },
        { [COMMENT_NODE]: [{ [TEXT_NODE]: assertXmlCharacters(copyrightNotice(year, config.copyright.holder, config.copyright.notice)) }] },
        { [COMMENT_NODE]: [{ [TEXT_NODE]: assertXmlCharacters(provenanceNote(metadata.generator, metadata.target)) }] },
        toOrderedEntry(decorateTool(canonical, config)),
    ];

    const builder = new XMLBuilder({
        preserveOrder: true,
        ignoreAttributes: false,
        attributeNamePrefix: ATTRIBUTE_PREFIX,
        textNodeName: TEXT_NODE,
        commentPropName: COMMENT_NODE,
        format: true,
        indentBy: ' '.repeat(config.indent),
        suppressEmptyNode: true,
        processEntities: false,
        tagValueProcessor: (_name: string, value: unknown): unknown =>
            typeof value === 'string' && value !== EMPTY_TEXT ? escapeText(value) : value,
        attributeValueProcessor: (_name: string, value: unknown): unknown =>
            typeof value === 'string' ? escapeAttribute(value) : value,
    });

    const body: string = builder.build(document);
    return `${body.replaceAll(EMPTY_TEXT, '')}\n`;
}

/** Serialize a canonical tree to UTF-8 bytes */
export function assembleTool(
    canonical: ToolNode,
    metadata: DocumentMetadata,
    config: GeneratorConfig = DEFAULT_CONFIG,
): Buffer {
    return Buffer.from(renderToolXml(canonical, metadata, config), 'utf-8');
}

/**
 * Canonicalize, assemble and write a tool document.
 *
 * The file descriptor is closed on every path, including a failed write.
 * I/O errors are rethrown unchanged.
 *
 * @returns The bytes written
 */
export function writeTool(tree: ToolNode, filePath: string, options: WriteToolOptions = {}): Buffer {
    const config = options.config ?? DEFAULT_CONFIG;
    const metadata = options.metadata ?? metadataFromConfig(config);
    const debug = options.debug;

    let started = debug ? performance.now() : 0;
    const canonical = observe('canonicalize', debug, () =>
        canonicalize(tree, { sectionOrders: config.sectionOrders }));
    if (debug) {
        debug({
            type: 'canonicalize',
            tag: canonical.tag,
            sections: canonical.children.length,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        started = performance.now();
    }

    const bytes = observe('assemble', debug, () => assembleTool(canonical, metadata, config));
    if (debug) {
        debug({
            type: 'assemble',
            profile: config.profile,
            bytes: bytes.length,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        started = performance.now();
    }

    observe('write', debug, () => writeBytes(filePath, bytes));
    if (debug) {
        debug({
            type: 'write',
            path: filePath,
            bytes: bytes.length,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
    }

    return bytes;
}

// ── Internal ─────────────────────────────────────────────

function toOrderedEntry(node: ToolNode): OrderedEntry {
    const body: OrderedEntry[] = [];
    if (node.text !== undefined && node.text.length > 0) {
        body.push({ [TEXT_NODE]: node.text });
    } else if (node.text === '' && node.children.length === 0) {
        body.push({ [TEXT_NODE]: EMPTY_TEXT });
    }
    for (const child of node.children) {
        body.push(toOrderedEntry(child));
    }

    const entry: OrderedEntry = { [node.tag]: body };
    const attributes = Object.entries(node.attributes);
    if (attributes.length > 0) {
        entry[':@'] = Object.fromEntries(
            attributes.map(([name, value]): [string, string] => [`${ATTRIBUTE_PREFIX}${name}`, value]),
        );
    }
    return entry;
}

function writeBytes(filePath: string, bytes: Uint8Array): void {
    const fd = openSync(filePath, 'w');
    try {
        let offset = 0;
        while (offset < bytes.length) {
            offset += writeSync(fd, bytes, offset, bytes.length - offset);
        }
    } finally {
        closeSync(fd);
    }
}

function observe<T>(step: GenerationStep, debug: DebugObserverFn | undefined, run: () => T): T {
    try {
        return run();
    } catch (err) {
        debug?.({
            type: 'error',
            step,
            error: err instanceof Error ? err.message : String(err),
            timestamp: Date.now(),
        });
        throw err;
    }
}
