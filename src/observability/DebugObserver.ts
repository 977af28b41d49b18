/**
 * DebugObserver — Opt-in Observability for Tool Generation
 *
 * Typed debug events emitted at each stage of `writeTool()`:
 * canonicalize → assemble → write. When no observer is passed, nothing
 * is emitted and no timing is taken.
 *
 * @example
 * ```typescript
 * import { createDebugObserver, writeTool } from 'galaxy-tool-writer';
 *
 * // Default: pretty console.debug output
 * writeTool(tree, 'tool.xml', { metadata, debug: createDebugObserver() });
 *
 * // Custom handler
 * writeTool(tree, 'tool.xml', {
 *     metadata,
 *     debug: createDebugObserver((event) => events.push(event)),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after the tree has been put into canonical order */
export interface CanonicalizeEvent {
    readonly type: 'canonicalize';
    readonly tag: string;
    /** Number of direct children of the root */
    readonly sections: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after the decorated document has been serialized to bytes */
export interface AssembleEvent {
    readonly type: 'assemble';
    readonly profile: string;
    readonly bytes: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after the bytes have been written and the file closed */
export interface WriteEvent {
    readonly type: 'write';
    readonly path: string;
    readonly bytes: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted when a stage fails, just before the error is rethrown */
export interface ErrorEvent {
    readonly type: 'error';
    readonly step: GenerationStep;
    readonly error: string;
    readonly timestamp: number;
}

export type GenerationStep = 'canonicalize' | 'assemble' | 'write';

export type DebugEvent =
    | CanonicalizeEvent
    | AssembleEvent
    | WriteEvent
    | ErrorEvent;

/** Observer function that receives debug events */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler writes one line per event:
 *
 * ```
 * [tool-writer] canonical <tool> 3 sections 0.2ms
 * [tool-writer] assemble  profile 20.09 812 bytes 1.1ms
 * [tool-writer] write     out/tool.xml 812 bytes 0.4ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[tool-writer]';

        switch (event.type) {
            case 'canonicalize':
                console.debug(`${prefix} canonical <${event.tag}> ${event.sections} sections ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'assemble':
                console.debug(`${prefix} assemble  profile ${event.profile} ${event.bytes} bytes ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'write':
                console.debug(`${prefix} write     ${event.path} ${event.bytes} bytes ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     [${event.step}] ${event.error}`);
                break;
        }
    };
}
