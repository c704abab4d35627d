/**
 * Tests for ShellTool
 */

import { describe, it, expect } from 'vitest';
import { ShellTool } from '../../../src/tools/ShellTool.js';
import { ConfigurationError, ToolDiscoveryError } from '../../../src/shared/utils/errors.js';
import { MockProcessExecutor, conventionTool } from '../../mocks/MockProcessExecutor.js';

const testSchema = {
  title: 'test-tool',
  description: 'A test tool',
  type: 'object',
  properties: {
    message: { type: 'string', description: 'A test message' },
  },
  required: ['message'],
};

function echoExecutor(): MockProcessExecutor {
  return new MockProcessExecutor(conventionTool(testSchema, (args) => `Received: ${String(args.message)}`));
}

describe('ShellTool', () => {
  describe('load', () => {
    it('discovers the schema by running --schema', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('/tools/test-tool.sh', executor);

      expect(executor.calls[0]).toEqual({
        file: '/tools/test-tool.sh',
        args: ['--schema'],
        options: { cwd: undefined, env: undefined, timeout: 30000 },
      });
      expect(tool.getSchema()).toEqual(testSchema);
      expect(tool.definition).toEqual({
        name: 'test-tool',
        description: 'A test tool',
        metadata: { source: 'shell' },
      });
      expect(tool.command).toBe('/tools/test-tool.sh');
    });

    it('fills defaults for a minimal schema', async () => {
      const executor = new MockProcessExecutor(() => ({
        stdout: '{"title": "slow-tool", "type": "object"}',
      }));
      const tool = await ShellTool.load('slow-tool', executor);

      expect(tool.getSchema()).toEqual({
        title: 'slow-tool',
        description: '',
        type: 'object',
        properties: {},
        required: [],
      });
    });

    it('fails when --schema exits non-zero', async () => {
      const executor = new MockProcessExecutor(() => ({ exitCode: 2 }));

      await expect(ShellTool.load('broken', executor)).rejects.toThrow(
        'Failed to get schema from broken: exit code 2'
      );
    });

    it('fails when --schema prints something other than JSON', async () => {
      const executor = new MockProcessExecutor(() => ({ stdout: 'Usage: broken' }));

      await expect(ShellTool.load('broken', executor)).rejects.toThrow(ToolDiscoveryError);
      await expect(ShellTool.load('broken', executor)).rejects.toThrow(
        /^Failed to parse schema from broken: /
      );
    });

    it('fails when the schema has no title', async () => {
      const executor = new MockProcessExecutor(() => ({ stdout: '{"type": "object"}' }));

      await expect(ShellTool.load('untitled', executor)).rejects.toThrow(
        /^Invalid schema from untitled: title: /
      );
    });

    it('records the command on discovery errors', async () => {
      const executor = new MockProcessExecutor(() => ({ exitCode: 1 }));

      const error = await ShellTool.load('missing', executor).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ToolDiscoveryError);
      if (error instanceof ToolDiscoveryError) {
        expect(error.command).toBe('missing');
      }
    });

    it('rejects invalid options before running anything', async () => {
      const executor = echoExecutor();

      await expect(ShellTool.load('x', executor, { timeout: -1 })).rejects.toThrow(ConfigurationError);
      expect(executor.calls).toHaveLength(0);
    });
  });

  describe('execute', () => {
    it('passes arguments as one JSON argument and trims the output', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('test-tool', executor);

      const result = await tool.execute({ message: 'Hello, World!' });

      expect(executor.calls[1].args).toEqual(['--execute', '{"message":"Hello, World!"}']);
      expect(result).toEqual({
        success: true,
        output: 'Received: Hello, World!',
        metadata: { exitCode: 0 },
      });
    });

    it('reports a non-zero exit as a failed result with the output', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('test-tool', executor);
      executor.setHandler(() => ({ stderr: 'boom\n', exitCode: 3 }));

      const result = await tool.execute({});

      expect(result).toEqual({
        success: false,
        output: 'boom',
        error: 'Tool execution failed with exit code 3 (output: boom)',
        metadata: { exitCode: 3 },
      });
    });

    it('reports timeouts', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('test-tool', executor, { timeout: 500 });
      executor.setHandler(() => ({ exitCode: 1, timedOut: true }));

      const result = await tool.execute({});

      expect(executor.calls[1].options.timeout).toBe(500);
      expect(result.success).toBe(false);
      expect(result.error).toBe('Tool execution timed out after 500ms');
    });

    it('lets the context override cwd, timeout and environment', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('test-tool', executor, {
        cwd: '/srv',
        env: { TOOL_MODE: 'a', KEEP: '1' },
      });

      await tool.execute(
        { message: 'x' },
        { workingDirectory: '/tmp/work', timeout: 1000, environment: { TOOL_MODE: 'b' } }
      );

      expect(executor.calls[1].options).toEqual({
        cwd: '/tmp/work',
        env: { TOOL_MODE: 'b', KEEP: '1' },
        timeout: 1000,
      });
    });

    it('uses the configured options when no context is given', async () => {
      const executor = echoExecutor();
      const tool = await ShellTool.load('test-tool', executor, { cwd: '/srv' });

      await tool.execute({ message: 'x' });

      expect(executor.calls[1].options).toEqual({ cwd: '/srv', env: undefined, timeout: 30000 });
    });
  });
});
