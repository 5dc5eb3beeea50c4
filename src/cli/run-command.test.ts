import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PathEntry } from '../application/services/path-entry';
import { formatHelp } from './help';
import { EXIT_CODE, runCommand } from './run-command';
import type { CommandContext } from './run-command';

type LogLine = Record<string, unknown>;

describe('runCommand', () => {
  let root: string;
  let output: string[];
  let logs: LogLine[];
  let context: CommandContext;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'fs-entry-cli-'));
    output = [];
    logs = [];
    context = {
      createEntry: (targetPath) => new PathEntry(targetPath),
      write: (text) => {
        output.push(text);
      },
      logger: pino({ level: 'info' }, { write: (line: string) => logs.push(JSON.parse(line)) }),
      defaultDirectoryMode: 0o700,
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prints help', () => {
    expect(runCommand({ name: 'help' }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(output).toEqual([formatHelp()]);
  });

  it('prints entry details as JSON', () => {
    fs.writeFileSync(path.join(root, 'a.txt'), 'abc');

    expect(runCommand({ name: 'info', path: path.join(root, 'a.txt') }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(JSON.parse(output.join(''))).toMatchObject({ name: 'a.txt', type: 'file', sizeBytes: 3 });
  });

  it('lists names one per line', () => {
    fs.mkdirSync(path.join(root, 'sub'));
    fs.writeFileSync(path.join(root, 'f.txt'), 'x');

    const code = runCommand(
      { name: 'ls', path: root, recursive: false, showHidden: false, filter: 'directories' },
      context,
    );

    expect(code).toBe(EXIT_CODE.SUCCESS);
    expect(output).toEqual(['sub\n']);
  });

  it('fails to list a file', () => {
    const filePath = path.join(root, 'f.txt');
    fs.writeFileSync(filePath, 'x');

    const code = runCommand({ name: 'ls', path: filePath, recursive: false, showHidden: false, filter: 'all' }, context);

    expect(code).toBe(EXIT_CODE.FAILURE);
    expect(logs[0]).toMatchObject({ level: 40, msg: 'Not a directory', path: filePath });
  });

  it('reports a false result as a failure', () => {
    const filePath = path.join(root, 'f.txt');

    expect(runCommand({ name: 'touch', path: filePath, force: false }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(runCommand({ name: 'touch', path: filePath, force: false }, context)).toBe(EXIT_CODE.FAILURE);
    expect(logs[0]).toMatchObject({ level: 40, msg: 'File not created', path: filePath, force: false });
  });

  it('creates directories with the default mode', () => {
    const directory = path.join(root, 'out');

    expect(runCommand({ name: 'mkdir', path: directory, parents: false, mode: null }, context)).toBe(
      EXIT_CODE.SUCCESS,
    );
    expect(fs.statSync(directory).mode & 0o777).toBe(0o700);

    expect(runCommand({ name: 'mkdir', path: directory, parents: false, mode: 0o755 }, context)).toBe(
      EXIT_CODE.FAILURE,
    );
    expect(logs[0]).toMatchObject({ msg: 'Directory not created', mode: '0o755' });
  });

  it('moves, renames and removes', () => {
    const source = path.join(root, 'a.txt');
    fs.writeFileSync(source, 'x');

    expect(runCommand({ name: 'mv', source, destination: path.join(root, 'b.txt'), force: false }, context)).toBe(
      EXIT_CODE.SUCCESS,
    );
    expect(runCommand({ name: 'rename', path: path.join(root, 'b.txt'), newName: 'c.txt', force: false }, context)).toBe(
      EXIT_CODE.SUCCESS,
    );
    expect(fs.readdirSync(root)).toEqual(['c.txt']);

    expect(runCommand({ name: 'rm', path: path.join(root, 'c.txt') }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(fs.readdirSync(root)).toEqual([]);
  });

  it('removes a directory tree', () => {
    fs.mkdirSync(path.join(root, 'tree', 'nested'), { recursive: true });
    fs.writeFileSync(path.join(root, 'tree', 'nested', 'f.txt'), 'x');

    expect(runCommand({ name: 'rmdir', path: path.join(root, 'tree'), recursive: false }, context)).toBe(
      EXIT_CODE.FAILURE,
    );
    expect(runCommand({ name: 'rmdir', path: path.join(root, 'tree'), recursive: true }, context)).toBe(
      EXIT_CODE.SUCCESS,
    );
    expect(fs.existsSync(path.join(root, 'tree'))).toBe(false);
  });

  it('writes, appends and prints content', () => {
    const filePath = path.join(root, 'notes.txt');

    expect(runCommand({ name: 'write', path: filePath, content: 'x' }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(runCommand({ name: 'append', path: filePath, content: 'y' }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(runCommand({ name: 'cat', path: filePath }, context)).toBe(EXIT_CODE.SUCCESS);
    expect(output).toEqual(['xy']);
  });

  it('logs content errors', () => {
    const missing = path.join(root, 'missing.txt');

    expect(runCommand({ name: 'cat', path: missing }, context)).toBe(EXIT_CODE.FAILURE);
    expect(output).toEqual([]);
    expect(logs[0]).toMatchObject({
      level: 50,
      msg: "Can't read the content.",
      operation: 'read',
      path: missing,
    });
  });

  it('lets unexpected errors through', () => {
    const failing: CommandContext = {
      ...context,
      createEntry: () => {
        throw new Error('boom');
      },
    };

    expect(() => runCommand({ name: 'cat', path: 'x' }, failing)).toThrow('boom');
  });
});
