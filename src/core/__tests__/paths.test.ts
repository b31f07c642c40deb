/**
 * Tests for path resolution.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { expandPath, getConfigPath, getGlobalConfigPath, getLocalDataDir, getTrellisHome, resolveGraphPath } from '../paths.js';

describe('getTrellisHome', () => {
  const origEnv = process.env['TRELLIS_HOME'];

  afterEach(() => {
    if (origEnv !== undefined) {
      process.env['TRELLIS_HOME'] = origEnv;
    } else {
      delete process.env['TRELLIS_HOME'];
    }
  });

  it('defaults to ~/.trellis', () => {
    delete process.env['TRELLIS_HOME'];
    expect(getTrellisHome()).toBe(join(homedir(), '.trellis'));
  });

  it('respects TRELLIS_HOME', () => {
    process.env['TRELLIS_HOME'] = '/custom/trellis';
    expect(getTrellisHome()).toBe('/custom/trellis');
    expect(getGlobalConfigPath()).toBe('/custom/trellis/config.json');
  });
});

describe('project paths', () => {
  it('places the data dir and config under cwd', () => {
    expect(getLocalDataDir('/work/project')).toBe('/work/project/.trellis');
    expect(getConfigPath('/work/project')).toBe('/work/project/.trellis/config.json');
  });
});

describe('expandPath', () => {
  it('expands $HOME, ${HOME} and ~', () => {
    expect(expandPath('$HOME/bp')).toBe(join(homedir(), 'bp'));
    expect(expandPath('${HOME}/bp')).toBe(join(homedir(), 'bp'));
    expect(expandPath('~/bp')).toBe(join(homedir(), 'bp'));
  });

  it('resolves relative paths against cwd', () => {
    expect(expandPath('blueprints', '/work/project')).toBe('/work/project/blueprints');
    expect(expandPath('/abs/bp', '/work/project')).toBe('/abs/bp');
  });
});

describe('resolveGraphPath', () => {
  let tempDir: string;
  const origEnv = process.env['TRELLIS_HOME'];

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'trellis-paths-test-'));
    process.env['TRELLIS_HOME'] = join(tempDir, 'home');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    if (origEnv !== undefined) process.env['TRELLIS_HOME'] = origEnv;
    else delete process.env['TRELLIS_HOME'];
  });

  it('uses the global graph when there is no local one', () => {
    expect(resolveGraphPath({ cwd: tempDir })).toBe(join(tempDir, 'home', 'graph.yaml'));
  });

  it('uses the local graph when asked or when it exists', () => {
    const localGraph = join(tempDir, '.trellis', 'graph.yaml');
    expect(resolveGraphPath({ cwd: tempDir, local: true })).toBe(localGraph);

    mkdirSync(join(tempDir, '.trellis'));
    writeFileSync(localGraph, '');
    expect(resolveGraphPath({ cwd: tempDir })).toBe(localGraph);
    expect(resolveGraphPath({ cwd: tempDir, global: true })).toBe(join(tempDir, 'home', 'graph.yaml'));
  });

  it('prefers an explicit file', () => {
    expect(resolveGraphPath({ cwd: tempDir, local: true, file: 'other.yaml' })).toBe(join(tempDir, 'other.yaml'));
  });
});
