import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { Scanner } from './scanner.js';
import { defaultConfig, type DocmarkConfig } from '../config/config.js';
import { DETACHED_ERROR, JsonTaskStore } from '../state/task-store.js';
import { JsonFingerprintStore } from '../state/fingerprint-store.js';
import { ChangeDetector } from '../state/change-detector.js';
import { BackupManager } from '../apply/backup-manager.js';
import { Applier } from '../apply/applier.js';

const TWO_FUNCTIONS = [
  '# @llm-doc-start',
  'def f(x):',
  '    return x',
  '# @llm-doc-end',
  '',
  '# @llm-doc-start',
  'def g(y):',
  '    """Return y."""',
  '    return y',
  '# @llm-doc-end',
  '',
].join('\n');

describe('Scanner', () => {
  let tempDir: string;
  let config: DocmarkConfig;
  let store: JsonTaskStore;
  let fingerprints: JsonFingerprintStore;
  let scanner: Scanner;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'docmark-scan-'));
    await mkdir(join(tempDir, 'pkg'));
    config = defaultConfig();
    store = new JsonTaskStore(join(tempDir, '.docmark'));
    fingerprints = new JsonFingerprintStore(join(tempDir, '.docmark'));
    scanner = new Scanner(tempDir, config, store, new ChangeDetector(tempDir, fingerprints));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true });
  });

  const write = (file: string, content: string) => writeFile(join(tempDir, file), content);

  it('should create one task per block with its payload', async () => {
    await write('pkg/util.py', '# @llm-doc-start\ndef f(x):\n    return x\n# @llm-doc-end\n');

    const result = await scanner.scan();

    expect(result).toEqual({
      filesScanned: 1,
      blocksFound: 1,
      tasksCreated: 1,
      tasksUpdated: 0,
      tasksMoved: 0,
      tasksDetached: 0,
      issues: [],
    });
    const [task] = await store.listAll();
    expect(task).toMatchObject({
      filePath: 'pkg/util.py',
      lineNumber: 2,
      kind: 'generate-function-doc',
      markerText: '# @llm-doc-start',
      context: 'def f(x):\n    return x',
      scopeName: 'f',
      status: 'pending',
    });
  });

  it('should pick validate kinds for existing documentation', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();
    expect((await store.listAll()).map(t => t.kind)).toEqual(['generate-function-doc', 'validate-function-doc']);
  });

  it('should create nothing on a second pass over unchanged files', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();

    const second = await scanner.scan();

    expect(second.tasksCreated).toBe(0);
    expect(second.tasksUpdated).toBe(0);
    expect(await store.listAll()).toHaveLength(2);
  });

  it('should reset only the changed block', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();
    for (const task of await store.listAll()) {
      await store.markProcessing(task.id);
      await store.setSuggestion(task.id, 'Doc.');
      await store.markCompleted(task.id);
    }

    await write('pkg/util.py', TWO_FUNCTIONS.replace('return x', 'return z'));
    const result = await scanner.scan();

    expect(result.tasksUpdated).toBe(1);
    const [f, g] = await store.listAll();
    expect(f.status).toBe('pending');
    expect(f.suggestion).toBeNull();
    expect(f.context).toBe('def f(x):\n    return z');
    expect(g.status).toBe('completed');
    expect(g.suggestion).toBe('Doc.');
  });

  it('should re-derive unchanged blocks when forced', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();
    await rm(join(tempDir, '.docmark', 'fingerprints.json'));

    const result = await scanner.scan({ force: true });

    expect(result.tasksCreated).toBe(0);
    expect(result.tasksUpdated).toBe(0);
    expect((await fingerprints.list('block:')).map(([subject]) => subject)).toEqual([
      'block:pkg/util.py:function:f#0',
      'block:pkg/util.py:function:g#0',
    ]);
  });

  it('should report a dangling start and keep other blocks', async () => {
    await write(
      'pkg/util.py',
      '# @llm-doc-start\ndef f(x):\n    return x\n# @llm-doc-end\n\n# @llm-class-start\nclass A:\n    pass\n',
    );

    const result = await scanner.scan();

    expect(result.tasksCreated).toBe(1);
    expect(result.issues).toEqual([
      {
        filePath: 'pkg/util.py',
        line: 6,
        code: 'marker-imbalance',
        message: 'pkg/util.py:6: # @llm-class-start is never closed',
      },
    ]);
  });

  it('should isolate problems to their own file', async () => {
    await write('pkg/bad.py', '# @llm-doc-end\n');
    await write('pkg/good.py', '# @llm-doc-start\ndef f(x):\n    return x\n# @llm-doc-end\n');

    const result = await scanner.scan();

    expect(result.filesScanned).toBe(2);
    expect(result.tasksCreated).toBe(1);
    expect(result.issues.map(i => i.filePath)).toEqual(['pkg/bad.py']);
  });

  it('should mark tasks failed when their block was removed', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();

    await write('pkg/util.py', 'def f(x):\n    return x\n');
    const result = await scanner.scan();

    expect(result.tasksDetached).toBe(2);
    expect((await store.listAll()).map(t => [t.status, t.error, t.detached])).toEqual([
      ['failed', DETACHED_ERROR, true],
      ['failed', DETACHED_ERROR, true],
    ]);
    expect(await store.requeueFailed()).toBe(0);
    expect(await fingerprints.list('block:')).toEqual([]);
  });

  it('should reattach detached tasks when their block comes back', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();
    await write('pkg/util.py', 'def f(x):\n    return x\n');
    await scanner.scan();

    await write('pkg/util.py', TWO_FUNCTIONS);
    const result = await scanner.scan();

    expect(result.tasksCreated).toBe(0);
    expect(result.tasksUpdated).toBe(2);
    expect((await store.listAll()).map(t => [t.id, t.status, t.detached])).toEqual([
      [1, 'pending', false],
      [2, 'pending', false],
    ]);
  });

  it('should move tasks with their block when lines are added above', async () => {
    await write('pkg/util.py', TWO_FUNCTIONS);
    await scanner.scan();
    for (const task of await store.listAll()) {
      await store.markProcessing(task.id);
      await store.setSuggestion(task.id, 'Doc.');
      await store.markCompleted(task.id);
    }

    await write('pkg/util.py', `import os\n\n${TWO_FUNCTIONS}`);
    const result = await scanner.scan();

    expect(result.tasksMoved).toBe(2);
    expect(result.tasksUpdated).toBe(0);
    expect((await store.listAll()).map(t => [t.lineNumber, t.status, t.suggestion])).toEqual([
      [4, 'completed', 'Doc.'],
      [9, 'completed', 'Doc.'],
    ]);
    expect((await scanner.scan()).tasksMoved).toBe(0);
  });

  it('should update the same task when an edit inside the block moves its definition', async () => {
    await write('pkg/util.py', '# @llm-doc-start\ndef f(x):\n    return x\n# @llm-doc-end\n');
    await scanner.scan();
    const [task] = await store.listAll();
    await store.markProcessing(task.id);
    await store.setSuggestion(task.id, 'Return x.');
    await store.markCompleted(task.id);

    await write('pkg/util.py', '# @llm-doc-start\n# helper\ndef f(x):\n    return x\n# @llm-doc-end\n');
    const result = await scanner.scan();

    expect(result.tasksCreated).toBe(0);
    expect(result.tasksUpdated).toBe(1);
    expect((await store.listAll()).map(t => [t.id, t.lineNumber, t.status, t.suggestion])).toEqual([
      [task.id, 3, 'pending', null],
    ]);
  });

  it('should honor scan paths, excludes and the size limit', async () => {
    await mkdir(join(tempDir, 'pkg', '__pycache__'));
    await write('pkg/__pycache__/cached.py', '# @llm-doc-start\ndef f():\n    pass\n# @llm-doc-end\n');
    await write('pkg/notes.txt', '# @llm-doc-start\n');
    await write('top.py', '# @llm-doc-start\ndef f():\n    pass\n# @llm-doc-end\n');
    await write('pkg/big.py', `# ${'x'.repeat(2048)}\n`);
    config.scanning.maxFileSizeKb = 1;

    const result = await scanner.scan({ paths: ['pkg', 'missing'] });

    expect(result.filesScanned).toBe(0);
    expect(result.issues.map(i => i.message)).toEqual(['missing does not exist', 'pkg/big.py is larger than 1 KB']);
  });

  it('should not re-queue documentation it just applied', async () => {
    await write('pkg/util.py', '# @llm-doc-start\ndef f(x):\n    return x\n# @llm-doc-end\n');
    await scanner.scan();
    const [task] = await store.listPending();
    await store.markProcessing(task.id);
    await store.setSuggestion(task.id, 'Return x unchanged.');
    await store.markCompleted(task.id);
    await store.setAccepted(task.id, true);

    const applier = new Applier(tempDir, store, new BackupManager(tempDir, join(tempDir, '.docmark', 'backups')));
    const [accepted] = await store.listAccepted();
    const before = await readFile(join(tempDir, 'pkg', 'util.py'), 'utf-8');
    const applied = await applier.apply(accepted);
    expect(applied.success).toBe(true);
    expect(await scanner.refresh('pkg/util.py', before, applied.shift)).toBe(1);

    const rescan = await scanner.scan();
    expect(rescan.tasksCreated).toBe(0);
    expect(await store.listAll()).toEqual([]);
    expect(await readFile(join(tempDir, 'pkg', 'util.py'), 'utf-8')).toContain('    Return x unchanged.\n');
  });
});
