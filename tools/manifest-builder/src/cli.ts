#!/usr/bin/env tsx
/**
 * Manifest builder CLI. Scans an asset directory and writes a manifest JSON.
 *
 * Usage:
 *   manifest-builder --dir <root> --output <file> [--type ext=TypeName ...]
 *
 * Options:
 *   --dir      Asset root to scan (recursive)
 *   --output   Manifest file to write
 *   --type     Map an extension to a type name (repeatable)
 *   --help     Show this help message
 */

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';

import { isAssetError, saveManifest } from '@stockpile/assets';

import { buildManifest, parseTypeOverride } from './builder.js';

interface CliArgs {
  dir: string | undefined;
  output: string | undefined;
  types: Map<string, string>;
}

// ============================================================================
// Argument parsing
// ============================================================================

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    dir: undefined,
    output: undefined,
    types: new Map(),
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--dir':
      case '-d':
        args.dir = readArgValue(argv, ++i, '--dir');
        break;
      case '--output':
      case '-o':
        args.output = readArgValue(argv, ++i, '--output');
        break;
      case '--type':
      case '-t': {
        const [extension, typeName] = parseTypeOverride(readArgValue(argv, ++i, '--type'));
        args.types.set(extension, typeName);
        break;
      }
      case '--help':
      case '-h':
        printUsage();
        process.exit(0);
        break;
      default:
        console.error(`Unknown argument: ${arg}`);
        printUsage();
        process.exit(1);
    }
  }

  return args;
}

function readArgValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value) {
    console.error(`Error: ${flag} requires a value`);
    printUsage();
    process.exit(1);
  }
  return value;
}

function printUsage(): void {
  console.log(`
Manifest Builder

Usage:
  manifest-builder --dir <root> --output <file> [--type ext=TypeName ...]

Options:
  --dir,    -d   Asset root to scan (recursive)
  --output, -o   Manifest file to write (required)
  --type,   -t   Map an extension to a type name, e.g. --type png=Texture
  --help,   -h   Show this help message
  `.trim());
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const args = parseArgs(process.argv);

  if (!args.dir || !args.output) {
    console.error('Error: --dir and --output are required');
    printUsage();
    process.exit(1);
  }

  const root = resolve(args.dir);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    console.error(`Error: directory not found: ${root}`);
    process.exit(1);
  }

  const output = resolve(args.output);
  const manifest = buildManifest(root, { typeNames: args.types, exclude: [output] });
  await saveManifest(output, manifest);
  console.log(`Wrote ${manifest.size} assets to ${output}`);
}

main().catch((err: unknown) => {
  if (isAssetError(err)) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(1);
});
