import { existsSync, readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';

const root = new URL('../../', import.meta.url);

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(new URL(path, root), 'utf8'));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

describe('workspace packaging', () => {
  it.each(['core', 'providers', 'cli'])('%s serves sources to the type checker and built JavaScript to Node', (name) => {
    const manifest = readJson(`${name}/package.json`);
    const entry = isRecord(manifest) && isRecord(manifest.exports) ? manifest.exports['.'] : undefined;
    expect(isRecord(entry)).toBe(true);
    if (!isRecord(entry) || typeof entry.types !== 'string' || typeof entry.default !== 'string') {
      return;
    }

    expect(entry.default).toBe(entry.types.replace('./src/', './dist/').replace(/\.ts$/, '.js'));
    expect(existsSync(new URL(`${name}/${entry.types}`, root))).toBe(true);

    const build = readJson(`${name}/tsconfig.build.json`);
    expect(build).toMatchObject({ compilerOptions: { rootDir: 'src', outDir: 'dist' } });
  });

  it('points the keyreel binary at the built command line entry', () => {
    expect(readJson('package.json')).toMatchObject({
      bin: { keyreel: './cli/dist/cli.js' },
      scripts: { build: 'tsc -b cli/tsconfig.build.json' },
    });
    expect(readJson('cli/package.json')).toMatchObject({ bin: { keyreel: './dist/cli.js' } });
  });
});
