import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { Command } from 'commander';
import { printResult, runOptionsOf, confirmDestructive } from '../../src/commands/run.js';
import type { DispatchResult } from '../../src/lib/dispatcher.js';

const result: DispatchResult = {
  statements: ['SHOW DATABASES;'],
  outcomes: [{ type: 'empty' }],
  outcome: { type: 'empty' },
  text: 'No results found.',
  warnings: ['Ignored --params keys already set by named options: model'],
  executed: true,
};

describe('run helpers', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('printResult', () => {
    it('should print one JSON document in json mode', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

      printResult(result, { json: true });

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        sql: ['SHOW DATABASES;'],
        outcome: { type: 'empty' },
        warnings: ['Ignored --params keys already set by named options: model'],
      });
    });

    it('should print warnings before the result text', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

      printResult(result, {});

      expect(logSpy).toHaveBeenCalledTimes(2);
      expect(String(logSpy.mock.calls[0][0])).toContain(
        'Warning: Ignored --params keys already set by named options: model'
      );
      expect(String(logSpy.mock.calls[1][0])).toContain('No results found.');
    });
  });

  describe('runOptionsOf', () => {
    it('should read the program level flags from a subcommand', async () => {
      const program = new Command();
      program.exitOverride().option('--json').option('--dry-run').option('-q, --quiet');

      let seen: ReturnType<typeof runOptionsOf> | undefined;
      program.command('ping').action((_options: unknown, command: Command) => {
        seen = runOptionsOf(command);
      });

      await program.parseAsync(['node', 'kbforge', '--dry-run', 'ping']);

      expect(seen).toEqual({ json: false, dryRun: true, quiet: false });
    });
  });

  describe('confirmDestructive', () => {
    it('should not prompt when --yes or --dry-run is given', async () => {
      await expect(confirmDestructive('Drop job?', { yes: true })).resolves.toBe(true);
      await expect(confirmDestructive('Drop job?', { dryRun: true })).resolves.toBe(true);
    });
  });
});
