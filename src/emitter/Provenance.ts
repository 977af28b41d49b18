/**
 * Provenance — Leading Comment Blocks
 *
 * Bodies of the two comments placed before the `<tool>` root: a
 * copyright notice stamped with the generation year, and a note naming
 * the generating and target systems with their versions.
 *
 * @module
 */
import type { SystemVersion } from '../config/GeneratorConfig.js';

/** Thrown when comment text cannot be represented in an XML comment */
export class InvalidCommentError extends Error {
    readonly text: string;

    constructor(text: string) {
        super('XML comments may not contain "--" or end with "-".');
        this.name = 'InvalidCommentError';
        this.text = text;
    }
}

/**
 * @example
 * copyrightNotice(2024, 'Example Team', 'All rights reserved.')
 * // → '\nCopyright (c) 2024, Example Team.\n\nAll rights reserved.\n'
 */
export function copyrightNotice(year: number, holder: string, notice: string): string {
    return assertCommentText(`\nCopyright (c) ${year}, ${holder}.\n\n${notice}\n`);
}

export function provenanceNote(generator: SystemVersion, target: SystemVersion): string {
    return assertCommentText(
        '\nThis tool was automatically generated by:\n'
        + `    ${generator.name} (version: ${generator.version})\n`
        + 'for:\n'
        + `    ${target.name} (version: ${target.version})\n`,
    );
}

function assertCommentText(text: string): string {
    if (text.includes('--') || text.endsWith('-')) {
        throw new InvalidCommentError(text);
    }
    return text;
}
