/**
 * Unit tests for ProcessExecutorAdapter
 *
 * Spawns only the Node binary running this test suite.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ProcessExecutorAdapter } from '../../../src/platform/ProcessExecutorAdapter.js';

const node = process.execPath;

describe('ProcessExecutorAdapter', () => {
  let executor: ProcessExecutorAdapter;

  beforeEach(() => {
    executor = new ProcessExecutorAdapter();
  });

  describe('execute', () => {
    it('should execute a program with arguments', async () => {
      const result = await executor.execute(node, ['-e', 'process.stdout.write(process.argv[1])', 'hello']);

      expect(result.exitCode).toBe(0);
      expect(result.stdout).toBe('hello');
      expect(result.timedOut).toBe(false);
    });

    it('should pass JSON arguments through without a shell', async () => {
      const payload = '{"location": "New York; echo $HOME"}';
      const result = await executor.execute(node, ['-e', 'process.stdout.write(process.argv[1])', payload]);

      expect(result.stdout).toBe(payload);
    });

    it('should capture stderr and the exit code', async () => {
      const result = await executor.execute(node, [
        '-e',
        'process.stderr.write("oops"); process.exit(3)',
      ]);

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('oops');
      expect(result.output).toBe('oops');
    });

    it('should combine stdout and stderr in output', async () => {
      const result = await executor.execute(node, [
        '-e',
        'process.stdout.write("out\\n"); setTimeout(() => process.stderr.write("err\\n"), 50)',
      ]);

      expect(result.output).toBe('out\nerr');
    });

    it('should pass cwd and env', async () => {
      const result = await executor.execute(
        node,
        ['-e', 'process.stdout.write(process.env.TOOL_SHIM_TEST + ":" + process.cwd())'],
        { cwd: '/', env: { TOOL_SHIM_TEST: 'yes' } }
      );

      expect(result.stdout).toBe('yes:/');
    });

    it('should handle non-existent command', async () => {
      const result = await executor.execute('nonexistentcommand123456');

      expect(result.exitCode).not.toBe(0);
    });

    it('should respect timeout', async () => {
      const result = await executor.execute(node, ['-e', 'setTimeout(() => {}, 5000)'], {
        timeout: 100,
      });

      expect(result.timedOut).toBe(true);
      expect(result.exitCode).not.toBe(0);
    }, 10000);
  });
});
