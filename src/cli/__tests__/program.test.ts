import { describe, it, expect } from 'vitest';
import { createProgram, getPackageVersion } from '../program.js';

describe('createProgram', () => {
  it('registers every command', () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(expect.arrayContaining([
      'add', 'rename', 'rm', 'link', 'unlink', 'mv', 'cp', 'ord',
      'set', 'check', 'uncheck', 'arc', 'unarc',
      'alias', 'unalias', 'aliases',
      'ls', 'lsd', 'lsa', 'stats', 'clean', 'rand', 'cal',
      'export', 'import', 'bp', 'config', 'version',
    ]));
  });

  it('groups the blueprint commands under bp', () => {
    const bp = createProgram().commands.find((command) => command.name() === 'bp');
    expect(bp?.aliases()).toEqual(['blueprint']);
    expect(bp?.commands.map((command) => command.name())).toEqual(['save', 'ins', 'ls', 'show', 'rm', 'export', 'edit']);
  });

  it('leaves bp edit out of the embedded program', () => {
    const bp = createProgram({ embedded: true }).commands.find((command) => command.name() === 'bp');
    expect(bp?.commands.map((command) => command.name())).toEqual(['save', 'ins', 'ls', 'show', 'rm', 'export']);
  });

  it('declares the global options', () => {
    const longs = createProgram().options.map((option) => option.long);
    expect(longs).toEqual(expect.arrayContaining(['--local', '--global', '--file', '--json', '--human', '--quiet']));
  });

  it('reads its version from package.json', () => {
    expect(getPackageVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
