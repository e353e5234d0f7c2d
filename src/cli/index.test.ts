/**
 * CLI tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, readFile, realpath, symlink, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import { pathToFileURL } from 'url';
import { getDefaultConfig, resetConfig, setConfig } from '../config/index.js';
import { resetLogger } from '../utils/logger.js';
import { chatConversation } from '../testing/fixtures.js';
import { createProgram, isEntryPoint } from './index.js';

describe('CLI', () => {
  it('should create program with correct name and description', () => {
    const program = createProgram();

    expect(program.name()).toBe('chatgpt-clean');
    expect(program.description()).toBe(
      'Clean ChatGPT data exports into markdown, JSON and fine-tuning pairs'
    );
  });

  it('should have version set', () => {
    expect(createProgram().version()).toBe('0.1.0');
  });

  it('should register commands', () => {
    const commands = createProgram().commands.map(cmd => cmd.name());

    expect(commands).toEqual(['clean', 'inspect', 'config']);
  });

  it('should expose the clean options', () => {
    const clean = createProgram().commands.find(cmd => cmd.name() === 'clean');
    const flags = clean?.options.map(opt => opt.long);

    expect(flags).toEqual([
      '--in',
      '--out',
      '--markdown-dir',
      '--max-filename-length',
      '--no-markdown',
      '--dry-run',
      '--log-level',
    ]);
  });
});

describe('CLI commands', () => {
  let workDir: string;
  let input: string;
  let lines: string[];
  let errors: unknown[][];

  beforeEach(async () => {
    workDir = join(tmpdir(), `cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(workDir, { recursive: true });
    input = join(workDir, 'conversations.json');
    await writeFile(
      input,
      JSON.stringify([
        chatConversation('Greeting', [
          ['user', 'Hi'],
          ['assistant', 'Hello!'],
        ]),
        { title: 'Empty', mapping: {} },
      ]),
      'utf-8'
    );

    setConfig({ ...getDefaultConfig(), logFormat: 'json', logLevel: 'error' });
    resetLogger();

    lines = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetConfig();
    resetLogger();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  const run = (args: string[]) => createProgram().parseAsync(args, { from: 'user' });

  it('should clean an export and print a summary', async () => {
    const outDir = join(workDir, 'out');

    await run(['clean', '--in', input, '--out', outDir]);

    expect(lines).toEqual([
      `Input: ${input}`,
      'Export completed!',
      '  Conversations: 1',
      '  Prompt-completion pairs: 1',
      '  Skipped (empty): 1',
      `  Output: ${resolve(outDir)}`,
    ]);
    expect(await readFile(join(outDir, 'pairs.jsonl'), 'utf-8')).toBe(
      '{"prompt":"Hi","completion":"Hello!","_title":"Greeting"}\n'
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('should announce dry-run mode', async () => {
    await run(['clean', '--in', input, '--out', join(workDir, 'out'), '--dry-run']);

    expect(lines.slice(0, 2)).toEqual([`Input: ${input}`, 'Mode: DRY RUN']);
  });

  it('should report a missing input file and set the exit code', async () => {
    const missing = join(workDir, 'missing.json');

    await run(['clean', '--in', missing, '--out', join(workDir, 'out')]);

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveLength(1);
    expect(String(errors[0][0])).toMatch(
      /^Failed to clean export: Input file not readable: .*missing\.json/
    );
  });

  it('should reject a non-numeric filename length', async () => {
    await run(['clean', '--in', input, '--max-filename-length', 'long']);

    expect(process.exitCode).toBe(1);
    expect(errors[0][0]).toBe(
      'Failed to clean export: --max-filename-length must be a positive integer, got "long"'
    );
  });

  it('should list conversations', async () => {
    await run(['inspect', '--in', input]);

    expect(lines).toEqual(['Conversations: 1 (skipped 1)', '  Greeting: 2 messages, 1 pairs']);
  });

  it('should list conversations as JSON', async () => {
    await run(['inspect', '--in', input, '--json']);

    expect(JSON.parse(lines[0])).toEqual({
      conversations: [
        {
          title: 'Greeting',
          messages: 2,
          userMessageCount: 1,
          assistantMessageCount: 1,
          pairCount: 1,
          totalCharacters: 8,
          averageMessageLength: 4,
        },
      ],
      skipped: 1,
    });
  });

  it('should print the configuration as JSON', async () => {
    await run(['config', '--json']);

    expect(JSON.parse(lines[0])).toEqual({
      outDir: './cleaned',
      markdownDirName: 'markdown_by_conversation',
      maxFilenameLength: 120,
      logLevel: 'error',
      logFormat: 'json',
      dryRun: false,
    });
  });
});

describe('isEntryPoint', () => {
  let workDir: string;
  let scriptPath: string;
  let scriptUrl: string;

  beforeEach(async () => {
    workDir = join(tmpdir(), `entry-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(workDir, 'dist', 'cli'), { recursive: true });
    await mkdir(join(workDir, 'bin'), { recursive: true });
    scriptPath = join(workDir, 'dist', 'cli', 'index.js');
    await writeFile(scriptPath, '', 'utf-8');
    scriptUrl = pathToFileURL(await realpath(scriptPath)).href;
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('should match the script run directly', () => {
    expect(isEntryPoint(scriptPath, scriptUrl)).toBe(true);
  });

  it('should match the script run through an installed bin symlink', async () => {
    const binPath = join(workDir, 'bin', 'chatgpt-clean');
    await symlink(join('..', 'dist', 'cli', 'index.js'), binPath);

    expect(isEntryPoint(binPath, scriptUrl)).toBe(true);
  });

  it('should not match another script or a missing path', async () => {
    const otherPath = join(workDir, 'dist', 'cli', 'other.js');
    await writeFile(otherPath, '', 'utf-8');

    expect(isEntryPoint(otherPath, scriptUrl)).toBe(false);
    expect(isEntryPoint(join(workDir, 'missing.js'), scriptUrl)).toBe(false);
    expect(isEntryPoint(undefined, scriptUrl)).toBe(false);
  });
});
