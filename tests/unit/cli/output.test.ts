import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { formatOutput, formatResult } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { failure, misuse, success } from '../../../src/cli/types/cli-result.js';
import { toProcessExitCode } from '../../../src/cli/types/exit-code.js';
import {
  ProcessTerminationRequested,
  ThrowingProcessTerminator,
} from '../../../src/runtime/adapters/throwing-process-terminator.js';
import { toNumericExitCode } from '../../../src/runtime/adapters/node-process-terminator.js';

describe('output formatting', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('lays out details, warnings and suggestions', () => {
    expect(
      formatOutput({ message: 'Decision: Approved', details: ['Reason: ok', '', 'Path:'], warnings: ['w'], suggestions: ['s'] })
    ).toBe(['✔ Decision: Approved', '', '  Reason: ok', '', '  Path:', '', 'Warnings:', '  • w', '', 'Suggestions:', '  • s'].join('\n'));
  });

  it('marks failures', () => {
    expect(formatResult(failure('Decision: Error'))).toBe('✖ Decision: Error');
  });

  it('prints nothing for an empty success', () => {
    expect(formatResult(success())).toBe('');
  });
});

describe('interpretCliResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints raw output verbatim and does not terminate on success', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    interpretCliResult(success({ message: 'Approved', raw: '{"decision":"Approved"}' }), new ThrowingProcessTerminator());
    expect(log).toHaveBeenCalledWith('{"decision":"Approved"}');
  });

  it('terminates misuse with a usage error', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    let caught: unknown;
    try {
      interpretCliResult(misuse('Unknown tree'), new ThrowingProcessTerminator());
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProcessTerminationRequested);
    expect(caught instanceof ProcessTerminationRequested && caught.code).toEqual({ kind: 'usage_error' });
  });
});

describe('exit codes', () => {
  it('maps CLI exit kinds onto process exit numbers', () => {
    expect(toNumericExitCode(toProcessExitCode({ kind: 'success' }))).toBe(0);
    expect(toNumericExitCode(toProcessExitCode({ kind: 'general_error' }))).toBe(1);
    expect(toNumericExitCode(toProcessExitCode({ kind: 'misuse' }))).toBe(2);
  });
});
