/**
 * galaxy-tool-writer — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { createNode, escapeValue, writeTool } from 'galaxy-tool-writer';
 *
 * const tool = createNode('tool', { id: 'demo', name: 'Demo', version: '0.1.0' }, [
 *     createNode('description', {}, [], 'Do a thing'),
 *     createNode('inputs', {}, [
 *         createNode('param', { name: 'x', type: 'text', value: escapeValue('a,b') }),
 *     ]),
 * ]);
 *
 * writeTool(tool, 'demo.xml', {
 *     metadata: {
 *         generator: { name: 'galaxy-tool-writer', version: '0.1.0' },
 *         target: { name: 'qiime2', version: '2024.5.0' },
 *     },
 * });
 * ```
 *
 * @module
 */

// ── Model ────────────────────────────────────────────────
export { createNode, parseToolTree, ToolNodeSchema, InvalidNameError } from './model/ToolNode.js';
export type { ToolNode, ToolNodeInput } from './model/ToolNode.js';

// ── Escape Codec ─────────────────────────────────────────
export {
    ESCAPE_TABLE, LITERAL_TABLE,
    escapeValue, unescapeValue, controlToken,
    UnsupportedValueError,
} from './codec/EscapeCodec.js';
export type { LiteralValue, ControlTokenOptions } from './codec/EscapeCodec.js';

// ── Canonical Ordering ───────────────────────────────────
export {
    ATTRIBUTE_ORDER, TOOL_SECTION_ORDER,
    ATTRIBUTE_RANKS, TOOL_SECTION_RANKS,
    createRankMap, UnknownSectionError,
} from './ordering/PriorityOrder.js';
export type { RankMap, ToolSection } from './ordering/PriorityOrder.js';
export { canonicalize, sortAttributes } from './ordering/Canonicalizer.js';
export type { CanonicalizeOptions } from './ordering/Canonicalizer.js';

// ── Document Assembly ────────────────────────────────────
export { decorateTool, renderToolXml, assembleTool, writeTool } from './emitter/DocumentAssembler.js';
export type { DocumentMetadata, WriteToolOptions } from './emitter/DocumentAssembler.js';
export { copyrightNotice, provenanceNote, InvalidCommentError } from './emitter/Provenance.js';
export { escapeText, escapeAttribute, assertXmlCharacters, InvalidXmlCharacterError } from './emitter/CharacterData.js';

// ── Config ───────────────────────────────────────────────
export { mergeConfig, metadataFromConfig, DEFAULT_CONFIG, PartialConfigSchema } from './config/GeneratorConfig.js';
export type {
    GeneratorConfig, PartialConfig, SystemVersion,
    CopyrightConfig, ProvenanceConfig,
} from './config/GeneratorConfig.js';
export { loadConfig, applyCliOverrides, ConfigError, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, GenerationStep,
    CanonicalizeEvent, AssembleEvent, WriteEvent, ErrorEvent,
} from './observability/DebugObserver.js';
