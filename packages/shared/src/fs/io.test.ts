import path from 'node:path';
import fs from 'fs-extra';
import { dir, type DirectoryResult } from 'tmp-promise';
import { atomicWrite, atomicWriteJson, ensureParentDir } from './io';

describe('fs io', () => {
  let workspace: DirectoryResult;

  beforeEach(async () => {
    workspace = await dir({ unsafeCleanup: true });
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('ensureParentDir creates the parent directory of a file path', async () => {
    const file = path.join(workspace.path, 'a', 'b', 'events.jsonl');
    await ensureParentDir(file);
    expect(await fs.pathExists(path.join(workspace.path, 'a', 'b'))).toBe(true);
    expect(await fs.pathExists(file)).toBe(false);
  });

  it('atomicWrite creates directories and replaces existing content', async () => {
    const file = path.join(workspace.path, 'results', 'run.json');
    await atomicWrite(file, '{"a":1}');
    await atomicWrite(file, '{"a":2}');

    expect(await fs.readFile(file, 'utf8')).toBe('{"a":2}');
    expect(await fs.readdir(path.join(workspace.path, 'results'))).toEqual(['run.json']);
  });

  it('atomicWrite removes its temp file when the rename fails', async () => {
    const results = path.join(workspace.path, 'results');
    // A non-empty directory in the way makes the rename fail.
    await fs.outputFile(path.join(results, 'run.json', 'keep.txt'), 'x');

    await expect(atomicWrite(path.join(results, 'run.json'), '{}')).rejects.toThrow();
    expect(await fs.readdir(results)).toEqual(['run.json']);
  });

  it('atomicWriteJson writes indented JSON with a trailing newline', async () => {
    const file = path.join(workspace.path, 'issues', 'baseline_cli-flag-002.json');
    await atomicWriteJson(file, { issueId: 'cli-flag-002', score: 1 });

    expect(await fs.readFile(file, 'utf8')).toBe('{\n  "issueId": "cli-flag-002",\n  "score": 1\n}\n');
  });
});
