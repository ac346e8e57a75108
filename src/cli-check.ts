#!/usr/bin/env node
/**
 * CLI Check Entry Point
 *
 * Implements argument parsing for tern-check.
 * Type-checks a Tern source file and reports the first diagnostic.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { compile } from './compile.js';
import { createDefaultConfig, loadConfig, type TernConfig } from './config.js';
import { formatDiagnostic } from './error-classes.js';
import type { ObservabilityCallbacks } from './semantic/index.js';
import { formatType } from './value-types.js';

/**
 * Parsed command-line arguments for tern-check
 */
export type ParsedCheckArgs =
  | { mode: 'check'; file: string; trace: boolean }
  | { mode: 'help' }
  | { mode: 'version' };

const KNOWN_FLAGS = new Set(['--help', '-h', '--version', '-v', '--trace']);

const HELP_TEXT = `tern-check - Type-check Tern source files

Usage: tern-check [options] <file>

Options:
  --trace         Log scopes and declarations to stderr
  -h, --help      Show this help message
  -v, --version   Show version number

Exit codes:
  0  no diagnostics
  1  a lexer, syntax or semantic diagnostic was reported
  2  usage, configuration or file error`;

/**
 * Parse command-line arguments for tern-check
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (arg.startsWith('-') && !KNOWN_FLAGS.has(arg)) {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  const files = argv.filter((arg) => !arg.startsWith('-'));
  const [file] = files;
  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (files.length > 1) {
    throw new Error(`Unexpected argument: ${files[1]}`);
  }

  return { mode: 'check', file, trace: argv.includes('--trace') };
}

// ============================================================
// TRACING
// ============================================================

/**
 * Observability callbacks that write one line per analyzer event.
 */
export function createTraceCallbacks(
  log: (line: string) => void
): ObservabilityCallbacks {
  return {
    onScopeEnter: ({ depth }) => log(`[trace] enter scope ${depth}`),
    onScopeExit: ({ depth }) => log(`[trace] exit scope ${depth}`),
    onDeclare: ({ name, kind, type }) =>
      log(`[trace] declare ${kind} ${name}: ${formatType(type)}`),
    onDiagnostic: (error) => log(`[trace] diagnostic ${error.code}`),
  };
}

// ============================================================
// CHECKING
// ============================================================

export interface CheckOutcome {
  readonly exitCode: 0 | 1;
  /** Line for stdout */
  readonly output: string;
}

/**
 * Check one source text. Local imports resolve against the configured
 * module root, taken relative to `cwd`.
 */
export function checkSource(
  file: string,
  source: string,
  config: TernConfig,
  cwd: string,
  observability?: ObservabilityCallbacks
): CheckOutcome {
  const result = compile(source, {
    sourceName: file,
    moduleRoot: resolve(cwd, config.modules.root),
    moduleExtension: config.modules.extension,
    ...(observability ? { observability } : {}),
  });

  if (!result.success) {
    return { exitCode: 1, output: formatDiagnostic(result.error) };
  }
  return { exitCode: 0, output: `${file}: ok` };
}

/** Version from the package manifest beside src/ and dist/ */
export function readVersion(): string {
  const url = new URL('../package.json', import.meta.url);
  const manifest: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

export interface CheckInput {
  readonly file: string;
  readonly source: string;
  readonly config: TernConfig;
  readonly trace: boolean;
}

/**
 * Load configuration from `cwd` and read the file to check.
 * Throws on configuration and file errors.
 */
export function loadCheckInput(
  args: { file: string; trace: boolean },
  cwd: string
): CheckInput {
  // Load configuration from cwd (null if not present)
  const config = loadConfig(cwd) ?? createDefaultConfig();
  const path = resolve(cwd, args.file);

  if (!existsSync(path)) {
    throw new Error(`File not found: ${args.file}`);
  }
  if (statSync(path).isDirectory()) {
    throw new Error(`Path is a directory: ${args.file}`);
  }

  return {
    file: args.file,
    source: readFileSync(path, 'utf-8'),
    config,
    trace: args.trace || config.trace,
  };
}

/**
 * Usage, configuration and read errors exit with code 2. Anything thrown
 * while checking is a bug and propagates.
 */
function prepare(cwd: string): CheckInput {
  try {
    const args = parseCheckArgs(process.argv.slice(2));

    if (args.mode === 'help') {
      console.log(HELP_TEXT);
      process.exit(0);
    }
    if (args.mode === 'version') {
      console.log(readVersion());
      process.exit(0);
    }

    return loadCheckInput(args, cwd);
  } catch (err) {
    if (err instanceof Error) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(2);
  }
}

/**
 * Main entry point for tern-check CLI.
 * Orchestrates argument parsing, configuration, file reading and output.
 */
function main(): void {
  const cwd = process.cwd();
  const input = prepare(cwd);

  const outcome = checkSource(
    input.file,
    input.source,
    input.config,
    cwd,
    input.trace
      ? createTraceCallbacks((line) => console.error(line))
      : undefined
  );
  console.log(outcome.output);
  process.exit(outcome.exitCode);
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
