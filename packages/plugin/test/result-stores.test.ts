import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileTaskResultStore, MemoryTaskResultStore } from '../src/results/index.js';
import { TaskConfigurationError } from '../src/errors.js';

describe('MemoryTaskResultStore', () => {
  it('should return what was pushed under the default key', async () => {
    const store = new MemoryTaskResultStore();
    await store.push('run-1', 'train', { id: 'exec-1' });

    await expect(store.pull('run-1', 'train')).resolves.toEqual({ id: 'exec-1' });
    await expect(store.pull('run-1', 'train', 'return_value')).resolves.toEqual({ id: 'exec-1' });
  });

  it('should keep runs, tasks and keys apart', async () => {
    const store = new MemoryTaskResultStore();
    await store.push('run-1', 'train', 'a');
    await store.push('run-2', 'train', 'b');
    await store.push('run-1', 'train', 'c', 'metrics');

    await expect(store.pull('run-1', 'train')).resolves.toBe('a');
    await expect(store.pull('run-2', 'train')).resolves.toBe('b');
    await expect(store.pull('run-1', 'train', 'metrics')).resolves.toBe('c');
    await expect(store.pull('run-1', 'evaluate')).resolves.toBeUndefined();
  });
});

describe('FileTaskResultStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'valohai-flow-results-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should persist results as one JSON document per run', async () => {
    const store = new FileTaskResultStore(dataDir);
    await store.push('run-1', 'train', { id: 'exec-1' });
    await store.push('run-1', 'train', 0.93, 'accuracy');

    const content = JSON.parse(await readFile(join(dataDir, 'results', 'run-1.json'), 'utf-8'));
    expect(content).toEqual({ train: { return_value: { id: 'exec-1' }, accuracy: 0.93 } });
  });

  it('should read results written by another instance', async () => {
    await new FileTaskResultStore(dataDir).push('run-1', 'train', { id: 'exec-1' });

    const reader = new FileTaskResultStore(dataDir);
    await expect(reader.pull('run-1', 'train')).resolves.toEqual({ id: 'exec-1' });
  });

  it('should return undefined for an unknown run', async () => {
    const store = new FileTaskResultStore(dataDir);

    await expect(store.pull('run-9', 'train')).resolves.toBeUndefined();
  });

  it('should reject run ids that are not plain file names', async () => {
    const store = new FileTaskResultStore(dataDir);

    await expect(store.push('../outside', 'train', 1)).rejects.toThrow(TaskConfigurationError);
  });

  it('should reject a corrupt results file', async () => {
    await mkdir(join(dataDir, 'results'), { recursive: true });
    await writeFile(join(dataDir, 'results', 'run-1.json'), '["not", "a", "map"]', 'utf-8');
    const store = new FileTaskResultStore(dataDir);

    await expect(store.pull('run-1', 'train')).rejects.toThrow(
      `Corrupt task results file: ${join(dataDir, 'results', 'run-1.json')}`
    );
  });

  it('should reject a results file that is not JSON', async () => {
    await mkdir(join(dataDir, 'results'), { recursive: true });
    await writeFile(join(dataDir, 'results', 'run-1.json'), '{', 'utf-8');
    const store = new FileTaskResultStore(dataDir);

    await expect(store.pull('run-1', 'train')).rejects.toThrow(
      new TaskConfigurationError(`Corrupt task results file: ${join(dataDir, 'results', 'run-1.json')}`)
    );
  });

  it('should keep every result when tasks of one run push at once', async () => {
    const store = new FileTaskResultStore(dataDir);
    const other = new FileTaskResultStore(dataDir);

    const outcomes = await Promise.allSettled([
      store.push('run-1', 'train', 1),
      store.push('run-1', 'evaluate', 2),
      other.push('run-1', 'report', 3),
    ]);

    expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'fulfilled', 'fulfilled']);
    const content = JSON.parse(await readFile(join(dataDir, 'results', 'run-1.json'), 'utf-8'));
    expect(content).toEqual({
      train: { return_value: 1 },
      evaluate: { return_value: 2 },
      report: { return_value: 3 },
    });
  });

  it('should leave no temporary files behind', async () => {
    const store = new FileTaskResultStore(dataDir);
    await Promise.all([store.push('run-1', 'train', 1), store.push('run-1', 'evaluate', 2)]);

    expect(await readdir(join(dataDir, 'results'))).toEqual(['run-1.json']);
  });
});
