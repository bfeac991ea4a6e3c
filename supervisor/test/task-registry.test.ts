import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { normalizeTaskConfig, TaskRegistry, type RegistryOptions } from '../src/services/task-registry.js';
import { InvalidOperationError, InvalidTaskConfigError, TaskNotFoundError } from '../src/utils/errors.js';
import { createFakeLauncher, type FakeLauncher } from './fake-process.js';

const taskDefaults: RegistryOptions['taskDefaults'] = {
  continue: true,
  split: 4,
  maxConnectionPerServer: undefined,
  maxTries: 5,
  retryWait: undefined,
  fileAllocation: 'none',
};

describe('normalizeTaskConfig', () => {
  const defaults = { downloadPath: '/srv/downloads', taskDefaults };

  it('fills in defaults', () => {
    expect(normalizeTaskConfig({ url: '  http://example/a.iso ' }, defaults)).toEqual({
      url: 'http://example/a.iso',
      outputDir: '/srv/downloads',
      outputName: '',
      options: {
        continue: true,
        split: 4,
        maxConnectionPerServer: undefined,
        maxTries: 5,
        retryWait: undefined,
        maxDownloadLimit: undefined,
        maxUploadLimit: undefined,
        referer: undefined,
        userAgent: undefined,
        headers: [],
        fileAllocation: 'none',
        extraArgs: '',
      },
    });
  });

  it('keeps explicit values over defaults', () => {
    const config = normalizeTaskConfig({
      url: 'http://example/a.iso',
      outputDir: '/data',
      outputName: 'a.iso',
      options: {
        continue: false,
        split: 8,
        maxTries: 0,
        referer: ' ',
        userAgent: 'test-agent',
        headers: ['X-Token: test-secret'],
        fileAllocation: 'falloc',
        extraArgs: ' --quiet ',
      },
    }, defaults);

    expect(config.outputDir).toBe('/data');
    expect(config.outputName).toBe('a.iso');
    expect(config.options).toMatchObject({
      continue: false,
      split: 8,
      maxTries: 0,
      referer: undefined,
      userAgent: 'test-agent',
      headers: ['X-Token: test-secret'],
      fileAllocation: 'falloc',
      extraArgs: '--quiet',
    });
  });

  it('rejects an empty url', () => {
    expect(() => normalizeTaskConfig({ url: '   ' }, defaults)).toThrow(InvalidTaskConfigError);
  });

  it('rejects out of range numbers', () => {
    expect(() => normalizeTaskConfig({ url: 'http://x/', options: { split: 0 } }, defaults))
      .toThrow('split must be an integer >= 1, got 0');
    expect(() => normalizeTaskConfig({ url: 'http://x/', options: { maxConnectionPerServer: 1.5 } }, defaults))
      .toThrow(InvalidTaskConfigError);
    expect(() => normalizeTaskConfig({ url: 'http://x/', options: { retryWait: -1 } }, defaults))
      .toThrow('retryWait must be an integer >= 0, got -1');
  });
});

describe('TaskRegistry', () => {
  let workDir: string;
  let fake: FakeLauncher;
  let registry: TaskRegistry;

  beforeEach(async () => {
    workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'supervisor-registry-'));
    fake = createFakeLauncher();
    registry = new TaskRegistry({
      executable: 'aria2c',
      launcher: fake.launcher,
      downloadPath: workDir,
      taskDefaults,
    });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(workDir, { recursive: true, force: true });
  });

  it('adds tasks in waiting state with increasing ids', () => {
    const first = registry.add({ url: 'http://example/one' });
    const second = registry.add({ url: 'http://example/two' });

    expect([first, second]).toEqual([1, 2]);
    expect(registry.list()).toEqual([
      { id: 1, url: 'http://example/one', displayUrl: 'http://example/one', status: 'waiting', progress: 0 },
      { id: 2, url: 'http://example/two', displayUrl: 'http://example/two', status: 'waiting', progress: 0 },
    ]);
    expect(fake.processes).toHaveLength(0);
  });

  it('does not add an invalid task', () => {
    expect(() => registry.add({ url: '' })).toThrow(InvalidTaskConfigError);
    expect(registry.size).toBe(0);
  });

  it('keeps ids stable after a removal', () => {
    registry.add({ url: 'http://example/one' });
    registry.add({ url: 'http://example/two' });
    registry.add({ url: 'http://example/three' });

    registry.remove(2);
    const fourth = registry.add({ url: 'http://example/four' });

    expect(fourth).toBe(4);
    expect(registry.list().map(task => task.id)).toEqual([1, 3, 4]);
    expect(registry.details(3).url).toBe('http://example/three');
  });

  it('throws for unknown ids', async () => {
    expect(() => registry.details(7)).toThrow(TaskNotFoundError);
    expect(() => registry.getLog(7)).toThrow('Task 7 not found');
    expect(() => registry.remove(7)).toThrow(TaskNotFoundError);
    await expect(registry.dispatch(7, 'start')).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  it('refuses to remove a downloading task', async () => {
    const id = registry.add({ url: 'http://example/one' });
    await registry.dispatch(id, 'start');

    expect(() => registry.remove(id)).toThrow(InvalidOperationError);
    expect(registry.size).toBe(1);

    await registry.dispatch(id, 'stop');
    await registry.get(id).waitForExit();
    await registry.dispatch(id, 'delete');

    expect(registry.size).toBe(0);
  });

  it('terminates a leftover process on delete', async () => {
    const id = registry.add({ url: 'http://example/one' });
    await registry.dispatch(id, 'start');
    fake.last().writeLine('(OK):download completed.');
    await vi.waitFor(() => expect(registry.details(id).status).toBe('completed'));

    const result = await registry.dispatch(id, 'delete');

    expect(result).toEqual({ success: true, message: 'Task deleted' });
    expect(fake.last().signals).toEqual(['SIGTERM']);
  });

  it('cancels a pending start when the task is deleted', async () => {
    const id = registry.add({ url: 'http://example/one' });

    const starting = registry.dispatch(id, 'start');
    registry.remove(id);

    expect(await starting).toEqual({ success: false, message: 'Start cancelled' });
    expect(registry.size).toBe(0);
    expect(fake.processes).toHaveLength(0);
  });

  it('terminates a process that comes up after its task was deleted', async () => {
    let id = 0;
    fake = createFakeLauncher(() => registry.remove(id));
    registry = new TaskRegistry({
      executable: 'aria2c',
      launcher: fake.launcher,
      downloadPath: workDir,
      taskDefaults,
    });
    id = registry.add({ url: 'http://example/one' });

    const result = await registry.dispatch(id, 'start');

    expect(result).toEqual({ success: false, message: 'Start cancelled' });
    expect(registry.size).toBe(0);
    expect(fake.processes).toHaveLength(1);
    expect(fake.last().signals).toEqual(['SIGTERM']);
    expect(fake.last().signalCode).toBe('SIGTERM');
  });

  it('returns the newest log lines', async () => {
    const id = registry.add({ url: 'http://example/one' });
    await registry.dispatch(id, 'pause');
    await registry.dispatch(id, 'resume');

    const lines = registry.getLog(id, 2);

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\] Resuming download$/);
    expect(lines[1]).toMatch(/\] Start command: aria2c -c /);
  });

  it('runs the whole download flow', async () => {
    const id = registry.add({ url: 'http://example/file.bin' });

    await registry.dispatch(id, 'start');
    expect(registry.runningCount()).toBe(1);

    fake.last().writeLine('[#00 5MiB/10MiB(50%) CN:2 DL:2MiB ETA:10s]');
    await vi.waitFor(() => expect(registry.details(id).progress).toBe(50));
    expect(registry.details(id)).toMatchObject({
      status: 'downloading',
      gid: '00',
      downloadedBytes: 5 * 1024 * 1024,
      totalBytes: 10 * 1024 * 1024,
      connections: 2,
      speed: '2MiB',
      eta: '10s',
    });

    fake.last().exit(0);
    await registry.get(id).waitForExit();

    expect(registry.details(id)).toMatchObject({ status: 'completed', progress: 100 });
    expect(registry.runningCount()).toBe(0);
  });

  it('stops every running task on shutdown', async () => {
    const first = registry.add({ url: 'http://example/one' });
    const second = registry.add({ url: 'http://example/two' });
    registry.add({ url: 'http://example/three' });
    await registry.dispatch(first, 'start');
    await registry.dispatch(second, 'start');

    await registry.shutdown();

    expect(fake.processes.map(proc => proc.signals)).toEqual([['SIGTERM'], ['SIGTERM']]);
    expect(registry.list().map(task => task.status)).toEqual(['stopped', 'stopped', 'waiting']);
    expect(registry.runningCount()).toBe(0);
  });
});
