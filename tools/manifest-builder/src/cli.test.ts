import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { spawnSync } from 'node:child_process';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { AssetManifest } from '@stockpile/assets';

interface CliResult {
  readonly status: number;
  readonly stdout: string;
  readonly stderr: string;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../../..');
const CLI_PATH = resolve(PROJECT_ROOT, 'tools/manifest-builder/src/cli.ts');
const TSX_PATH = resolve(PROJECT_ROOT, 'node_modules/tsx/dist/cli.mjs');

function runCli(args: string[]): CliResult {
  const proc = spawnSync(process.execPath, [TSX_PATH, CLI_PATH, ...args], {
    cwd: PROJECT_ROOT,
    encoding: 'utf8',
  });

  return {
    status: proc.status ?? 1,
    stdout: typeof proc.stdout === 'string' ? proc.stdout : '',
    stderr: typeof proc.stderr === 'string' ? proc.stderr : '',
  };
}

function withTempDir<T>(fn: (dir: string) => T): T {
  const dir = mkdtempSync(join(tmpdir(), 'stockpile-manifest-cli-'));
  try {
    return fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

describe('manifest-builder CLI', () => {
  it('writes a manifest for the directory', () => {
    withTempDir((dir) => {
      const assets = join(dir, 'assets');
      mkdirSync(join(assets, 'ui'), { recursive: true });
      writeFileSync(join(assets, 'ui', 'menu.txt'), 'menu');
      writeFileSync(join(assets, 'logo.png'), 'png');
      const output = join(dir, 'out', 'manifest.json');

      const result = runCli(['--dir', assets, '--output', output, '--type', 'png=Texture']);

      expect(result.status).toBe(0);
      expect(result.stdout).toContain('Wrote 2 assets');
      const manifest = AssetManifest.parse(readFileSync(output, 'utf8'));
      expect(manifest.paths()).toEqual(['logo.png', 'ui/menu.txt']);
      expect(manifest.getInfo('logo.png')?.type).toBe('Texture');
      expect(manifest.getInfo('ui/menu.txt')?.size).toBe(4);
    });
  });

  it('fails without required arguments', () => {
    const result = runCli(['--dir', 'somewhere']);
    expect(result.status).toBe(1);
    expect(result.stderr).toContain('--dir and --output are required');
  });

  it('fails for a missing directory', () => {
    withTempDir((dir) => {
      const result = runCli(['--dir', join(dir, 'none'), '--output', join(dir, 'm.json')]);
      expect(result.status).toBe(1);
      expect(result.stderr).toContain('directory not found');
    });
  });

  it('rejects malformed type overrides', () => {
    withTempDir((dir) => {
      const result = runCli(['--dir', dir, '--output', join(dir, 'm.json'), '--type', 'png']);
      expect(result.status).toBe(1);
      expect(result.stderr).toContain('expected ext=TypeName, got "png"');
    });
  });
});
