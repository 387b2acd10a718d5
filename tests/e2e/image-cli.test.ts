/**
 * End-to-end runs through runCli with real console streams and a real log
 * file.
 *
 * All tests use temp directories and in-memory streams. No mocks.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PassThrough } from 'node:stream';
import { ConsoleIoService } from '../../src/cli/io.js';
import { runCli } from '../../src/cli/index.js';
import { defineCommand } from '../../src/core/commands/define.js';
import { StaticCommandRegistry } from '../../src/core/commands/registry.js';
import { defineOption } from '../../src/core/options/definitions.js';
import { ExitCode } from '../../src/types/exit-codes.js';
import { createImageCli, type RecordedCall } from '../helpers/image-cli.js';
import { MemoryIoService } from '../helpers/memory-io.js';

function collect(stream: PassThrough): () => string {
  let text = '';
  stream.on('data', (chunk: Buffer) => {
    text += chunk.toString('utf8');
  });
  return () => text;
}

/** Let stream 'data' events queued by earlier writes fire. */
function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

async function readAuditRecords(path: string): Promise<unknown[]> {
  const text = await readFile(path, 'utf8');
  return text
    .trim()
    .split('\n')
    .map((line): unknown => JSON.parse(line))
    .filter((record) =>
      typeof record === 'object' && record !== null && 'subsystem' in record && record.subsystem === 'audit');
}

describe('image CLI end to end', () => {
  let testDir: string;
  let logFile: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'cmdtree-e2e-'));
    logFile = join(testDir, 'logs', 'cli.log');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('writes an audit record for an executed command', async () => {
    const calls: RecordedCall[] = [];
    const io = new MemoryIoService();
    const code = await runCli(createImageCli(calls), ['-v', 'pull', '-t', 'latest', 'myrepo'], {
      io,
      env: { CMDTREE_LOG_LEVEL: 'info', CMDTREE_LOG_FILE: logFile },
    });

    expect(code).toBe(ExitCode.SUCCESS);
    expect(calls).toEqual([
      { id: 'PullCommand', args: ['myrepo'], options: { tag: ['latest'] }, chain: ['image', 'pull'] },
    ]);

    const audit = await readAuditRecords(logFile);
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({
      level: 'INFO',
      msg: 'command executed',
      command: 'image pull',
      options: ['-v', '-t'],
      argCount: 1,
      success: true,
    });
  });

  it('logs nothing at info level for help or rejected input', async () => {
    const io = new MemoryIoService();
    const env = { CMDTREE_LOG_LEVEL: 'info', CMDTREE_LOG_FILE: logFile };
    expect(await runCli(createImageCli(), ['registry', '-h'], { io, env })).toBe(ExitCode.SUCCESS);
    expect(await runCli(createImageCli(), ['pull', '-t', 'a', '-a', 'r'], { io, env })).toBe(ExitCode.VALIDATION_ERROR);

    expect(await readFile(logFile, 'utf8')).toBe('');
    expect(io.err).toBe(
      '-t, -a are mutually exclusive.\n' +
      "Run 'image pull --help' to see the option requirements.\n",
    );
  });

  it('prints help and errors on console streams', async () => {
    const output = new PassThrough();
    const error = new PassThrough();
    const out = collect(output);
    const err = collect(error);
    const io = new ConsoleIoService({ input: new PassThrough(), output, error, color: true });
    const registry = createImageCli();
    const env = { CMDTREE_LOG_LEVEL: 'silent' };

    expect(await runCli(registry, ['registry', 'login', '-u', 'bob'], { io, env })).toBe(ExitCode.VALIDATION_ERROR);
    await settle();
    expect(err()).toBe(
      '\x1b[0;31mIf user is present then --password, --token at least one is required.\x1b[0m\n' +
      "\x1b[0;31mRun 'image registry login --help' to see the option requirements.\x1b[0m\n",
    );

    expect(await runCli(registry, ['--help'], { io, env })).toBe(ExitCode.SUCCESS);
    await settle();
    expect(out()).toMatch(/^image\nManage container images\n\nUsage: {2}image \[IMAGE_OPTIONS\] COMMAND\n/);
  });

  it('lets an action read input through the io service', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const out = collect(output);
    const io = new ConsoleIoService({ input, output, error: new PassThrough() });
    const env = { CMDTREE_LOG_LEVEL: 'silent' };

    const registry = new StaticCommandRegistry([
      {
        id: 'PruneCommand',
        namespace: 'app',
        create: () => defineCommand({
          id: 'PruneCommand',
          description: 'Remove unused images',
          isRoot: true,
          printHelpWithNoArgs: false,
          options: [defineOption({ long: 'force', short: 'f', description: 'Do not ask' })],
          execute: async (ctx) => {
            if (!ctx.options.has('force')) {
              ctx.io.write('Remove all unused images? [y/N] ');
              const answer = await ctx.io.readLine();
              if (answer?.trim().toLowerCase() !== 'y') {
                ctx.io.writeLine('Cancelled.');
                return;
              }
            }
            ctx.io.writeLine('Removed.');
          },
        }),
      },
    ]);

    input.write('y\n');
    expect(await runCli(registry, [], { io, env })).toBe(ExitCode.SUCCESS);
    expect(await runCli(registry, ['-f'], { io, env })).toBe(ExitCode.SUCCESS);
    await settle();
    expect(out()).toBe('Remove all unused images? [y/N] Removed.\nRemoved.\n');
  });
});
