import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';

describe('loadConfig', () => {
  it('uses declared binding and no extra directory by default', () => {
    expect(loadConfig({ env: {} })._unsafeUnwrap()).toEqual({
      trees: { directory: null },
      engine: { inputBinding: 'declared_only' },
    });
  });

  it('reads the trees directory and binding mode', () => {
    const config = loadConfig({
      env: { BRANCHWISE_TREES_DIR: ' ./my-trees ', BRANCHWISE_INPUT_BINDING: 'substring' },
    })._unsafeUnwrap();

    expect(config.trees.directory).toBe('./my-trees');
    expect(config.engine.inputBinding).toBe('declared_or_substring');
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ env: { PATH: '/usr/bin', BRANCHWISE_LOG_LEVEL: 'debug' } }).isOk()).toBe(true);
  });

  it('reports invalid values as issues', () => {
    const error = loadConfig({
      env: { BRANCHWISE_TREES_DIR: '   ', BRANCHWISE_INPUT_BINDING: 'fuzzy' },
    })._unsafeUnwrapErr();

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toEqual([
      { path: 'BRANCHWISE_TREES_DIR', message: 'BRANCHWISE_TREES_DIR cannot be empty when set' },
      { path: 'BRANCHWISE_INPUT_BINDING', message: "BRANCHWISE_INPUT_BINDING must be 'declared' or 'substring'" },
    ]);
  });
});
