#!/usr/bin/env node
/**
 * CLI Entry Point — galaxy-tool-writer
 *
 * Usage:
 *   galaxy-tool-writer generate -i <tree.yaml> -o <tool.xml> [--config <config.yaml>]
 *   galaxy-tool-writer escape <value> | --null | --true | --false
 *   galaxy-tool-writer unescape <text>
 *
 * @module
 */
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { parseToolTree } from './model/ToolNode.js';
import { writeTool } from './emitter/DocumentAssembler.js';
import { escapeValue, unescapeValue } from './codec/EscapeCodec.js';
import { loadConfig, applyCliOverrides, type CliOverrides } from './config/ConfigLoader.js';
import { createDebugObserver } from './observability/DebugObserver.js';
import type { GeneratorConfig } from './config/GeneratorConfig.js';

// ── Arg Parsing ──────────────────────────────────────────

interface RawCliArgs {
    command: string;
    positional: string[];
    input?: string;
    output?: string;
    config?: string;
    generatorVersion?: string;
    targetVersion?: string;
    debug: boolean;
    literal?: null | boolean;
}

function parseArgs(argv: string[]): RawCliArgs {
    const args = argv.slice(2);
    const command = args[0] ?? '';

    const result: Record<string, string | undefined> = {};
    const positional: string[] = [];
    let debug = false;
    let literal: null | boolean | undefined;

    for (let i = 1; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-i':
            case '--input':
                result['input'] = args[++i];
                break;
            case '-o':
            case '--output':
                result['output'] = args[++i];
                break;
            case '-c':
            case '--config':
                result['config'] = args[++i];
                break;
            case '--generator-version':
                result['generatorVersion'] = args[++i];
                break;
            case '--target-version':
                result['targetVersion'] = args[++i];
                break;
            case '--debug':
                debug = true;
                break;
            case '--null':
                literal = null;
                break;
            case '--true':
                literal = true;
                break;
            case '--false':
                literal = false;
                break;
            default:
                if (arg !== undefined) positional.push(arg);
        }
    }

    return {
        command,
        positional,
        debug,
        ...(literal !== undefined ? { literal } : {}),
        ...(result['input'] !== undefined ? { input: result['input'] } : {}),
        ...(result['output'] !== undefined ? { output: result['output'] } : {}),
        ...(result['config'] !== undefined ? { config: result['config'] } : {}),
        ...(result['generatorVersion'] !== undefined ? { generatorVersion: result['generatorVersion'] } : {}),
        ...(result['targetVersion'] !== undefined ? { targetVersion: result['targetVersion'] } : {}),
    };
}

// ── Commands ─────────────────────────────────────────────

function runGenerate(rawArgs: RawCliArgs): void {
    // Load config (YAML file → defaults → CLI overrides)
    const baseConfig = loadConfig(rawArgs.config);

    const overrides: CliOverrides = {
        ...(rawArgs.input !== undefined ? { input: rawArgs.input } : {}),
        ...(rawArgs.output !== undefined ? { output: rawArgs.output } : {}),
        ...(rawArgs.generatorVersion !== undefined ? { generatorVersion: rawArgs.generatorVersion } : {}),
        ...(rawArgs.targetVersion !== undefined ? { targetVersion: rawArgs.targetVersion } : {}),
    };

    const config: GeneratorConfig = applyCliOverrides(baseConfig, overrides);

    if (!config.input || !config.output) {
        console.error('Error: --input (-i) and --output (-o) are required (or set `input`/`output` in config file).');
        console.error('Usage: galaxy-tool-writer generate -i <tree.yaml> -o <tool.xml>');
        process.exit(1);
    }

    const treePath = resolve(config.input);
    let treeContent: string;
    try {
        treeContent = readFileSync(treePath, 'utf-8');
    } catch {
        console.error(`Error: Cannot read file "${treePath}".`);
        process.exit(1);
    }

    console.log(`📂 Parsing: ${treePath}`);

    const raw: unknown = treePath.endsWith('.json') ? JSON.parse(treeContent) : parseYaml(treeContent);
    const tree = parseToolTree(raw);

    console.log(`✅ Parsed: <${tree.tag}> with ${tree.children.length} sections`);

    const outPath = resolve(config.output);
    const bytes = writeTool(tree, outPath, {
        config,
        ...(rawArgs.debug ? { debug: createDebugObserver() } : {}),
    });

    console.log(`🎉 Wrote ${bytes.length} bytes to ${outPath}`);
}

function runEscape(rawArgs: RawCliArgs): void {
    const value = rawArgs.literal !== undefined ? rawArgs.literal : rawArgs.positional[0];
    if (value === undefined) {
        console.error('Error: escape needs a value, or one of --null, --true, --false.');
        process.exit(1);
    }
    console.log(escapeValue(value));
}

function runUnescape(rawArgs: RawCliArgs): void {
    const text = rawArgs.positional[0];
    if (text === undefined) {
        console.error('Error: unescape needs a value.');
        process.exit(1);
    }
    const value = unescapeValue(text);
    console.log(typeof value === 'string' ? value : JSON.stringify(value));
}

function printHelp(): void {
    console.log(`
galaxy-tool-writer — Tool Tree → Canonical Galaxy Tool XML

USAGE:
  galaxy-tool-writer generate -i <tree> -o <tool.xml> [options]
  galaxy-tool-writer escape <value> | --null | --true | --false
  galaxy-tool-writer unescape <text>

COMMANDS:
  generate    Canonicalize a tool tree and write the tool XML
  escape      Print the escaped form of a value
  unescape    Print the value behind an escaped string (literals as JSON)

OPTIONS:
  -i, --input <file>            Tool tree (YAML or JSON)
  -o, --output <file>           XML file to write
  -c, --config <file>           Config file (default: auto-detect galaxy-tool-writer.yaml)
  --generator-version <v>       Version printed for the generating system
  --target-version <v>          Version printed for the target system
  --debug                       Print a debug line per generation stage
  --help                        Show this help message

CONFIG FILE (galaxy-tool-writer.yaml):
  profile: "20.09"
  license: BSD-3-Clause
  indent: 4
  copyright:
    holder: QIIME 2 development team
  provenance:
    generator: { name: galaxy-tool-writer, version: 0.1.0 }
    target: { name: qiime2, version: 2024.5.0 }
  sectionOrders:
    conditional: [param, when]

TREE FILE:
  tag: tool
  attributes: { id: demo, name: Demo, version: "0.1.0" }
  children:
    - tag: description
      text: Do a thing
`);
}

// ── Main ─────────────────────────────────────────────────

const cliArgs = parseArgs(process.argv);

try {
    switch (cliArgs.command) {
        case 'generate':
            runGenerate(cliArgs);
            break;
        case 'escape':
            runEscape(cliArgs);
            break;
        case 'unescape':
            runUnescape(cliArgs);
            break;
        case '--help':
        case 'help':
        case '':
            printHelp();
            break;
        default:
            console.error(`Unknown command: "${cliArgs.command}". Use --help for usage.`);
            process.exit(1);
    }
} catch (err) {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
}
