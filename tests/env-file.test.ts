import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { applyEnv, loadEnvFile, parseEnv } from '../src/server/env-file.js';
import type { Environment } from '../src/server/env-file.js';
import { ConfigurationError } from '../src/core/errors.js';

const envDir = fileURLToPath(new URL('./fixtures/env/', import.meta.url));

describe('parseEnv', () => {
  it('reads assignments and skips comments, blanks and other lines', () => {
    const vars = parseEnv('# comment\n\nA=1\nexport B = two \nnot an assignment\n=orphan\n');
    expect(vars).toEqual({ A: '1', B: 'two' });
  });

  it('strips surrounding quotes and expands basic escapes', () => {
    const vars = parseEnv('A="quoted value"\r\nB=\'single\'\nC=line\\nbreak');
    expect(vars).toEqual({ A: 'quoted value', B: 'single', C: 'line\nbreak' });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseEnv('URL=http://localhost/v1?a=b')).toEqual({ URL: 'http://localhost/v1?a=b' });
  });
});

describe('loadEnvFile', () => {
  it('resolves a relative path against the given directory', () => {
    expect(loadEnvFile('.env', envDir)).toEqual({
      EMBEDDING_API_KEY: 'test-key',
      EMBEDDING_MODEL: 'text-embedding-v3',
    });
  });

  it('fails for a missing file', () => {
    expect(() => loadEnvFile('missing.env', envDir)).toThrow(ConfigurationError);
    expect(() => loadEnvFile('missing.env', envDir)).toThrow(/^Env file not found: .*missing\.env$/);
  });
});

describe('applyEnv', () => {
  it('keeps variables that are already set', () => {
    const env: Environment = { A: 'from-shell' };
    applyEnv({ A: 'from-file', B: 'new' }, env, false);
    expect(env).toEqual({ A: 'from-shell', B: 'new' });
  });

  it('replaces them when overriding', () => {
    const env: Environment = { A: 'from-shell' };
    applyEnv({ A: 'from-file' }, env, true);
    expect(env).toEqual({ A: 'from-file' });
  });
});
