import { describe, it, expect } from 'vitest';
import { expandPath, relativeUnder } from '../../src/utils/paths.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

describe('expandPath', () => {
  it('expands a leading ~/', () => {
    expect(expandPath('~/code')).toBe(join(homedir(), 'code'));
  });

  it('expands a bare ~', () => {
    expect(expandPath('~')).toBe(homedir());
  });

  it('leaves other paths alone', () => {
    expect(expandPath('/srv/code')).toBe('/srv/code');
    expect(expandPath('code/~/x')).toBe('code/~/x');
    expect(expandPath('~other/code')).toBe('~other/code');
  });
});

describe('relativeUnder', () => {
  it('returns the path below the root', () => {
    expect(relativeUnder('/srv/code', '/srv/code/acme/widgets')).toBe('acme/widgets');
  });

  it('returns null for paths outside the root', () => {
    expect(relativeUnder('/srv/code', '/srv/other')).toBeNull();
    expect(relativeUnder('/srv/code', '/srv')).toBeNull();
  });

  it('returns null for the root itself', () => {
    expect(relativeUnder('/srv/code', '/srv/code')).toBeNull();
  });

  it('keeps names that merely start with two dots', () => {
    expect(relativeUnder('/srv/code', '/srv/code/..cache')).toBe('..cache');
  });
});
