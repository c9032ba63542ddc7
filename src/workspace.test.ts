import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { Workspace } from './workspace.js';

const SOURCE = [
  '# @llm-module-start',
  'import math',
  '',
  '# @llm-class-start',
  'class Circle:',
  '    # @llm-doc-start',
  '    def area(self):',
  '        # @llm-comm-start',
  '        r = self.radius',
  '        # @llm-comm-end',
  '        return math.pi * r * r',
  '    # @llm-doc-end',
  '# @llm-class-end',
  '# @llm-module-end',
  '',
].join('\n');

describe('Workspace', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'docmark-workspace-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true });
  });

  it('should read the backup directory from config', async () => {
    await mkdir(join(tempDir, '.docmark'));
    await writeFile(join(tempDir, '.docmark', 'config.yaml'), 'output:\n  backupDir: snapshots\n');
    const workspace = await Workspace.open(tempDir);
    expect(workspace.backups.backupDir).toBe(join(tempDir, 'snapshots'));
  });

  it('should apply every accepted task of a file in one run', async () => {
    await writeFile(join(tempDir, 'shapes.py'), SOURCE);
    const workspace = await Workspace.open(tempDir);
    await workspace.scanner.scan();

    const suggestions: Record<string, string> = {
      'generate-module-doc': 'Shapes.',
      'generate-class-doc': 'A circle.',
      'generate-function-doc': 'Compute the area.',
      'generate-inline-comment': 'Cache the radius.',
    };
    for (const task of await workspace.tasks.listPending()) {
      await workspace.tasks.markProcessing(task.id);
      await workspace.tasks.setSuggestion(task.id, suggestions[task.kind]);
      await workspace.tasks.markCompleted(task.id);
      await workspace.tasks.setAccepted(task.id, true);
    }

    const run = await workspace.applyAccepted();

    expect(run.results.map(r => r.success)).toEqual([true, true, true, true]);
    expect(run.modified).toEqual(['shapes.py']);
    expect(await readFile(join(tempDir, 'shapes.py'), 'utf-8')).toBe(
      [
        '# @llm-module-start',
        '"""',
        'Shapes.',
        '"""',
        'import math',
        '',
        '# @llm-class-start',
        'class Circle:',
        '    """',
        '    A circle.',
        '    """',
        '    # @llm-doc-start',
        '    def area(self):',
        '        """',
        '        Compute the area.',
        '        """',
        '        # @llm-comm-start',
        '        # Cache the radius.',
        '        r = self.radius',
        '        # @llm-comm-end',
        '        return math.pi * r * r',
        '    # @llm-doc-end',
        '# @llm-class-end',
        '# @llm-module-end',
        '',
      ].join('\n'),
    );
    expect(await workspace.tasks.listAll()).toEqual([]);
    expect((await workspace.scanner.scan()).tasksCreated).toBe(0);
  });

  it('should rescan a block edited before another block was applied', async () => {
    const source = [
      '# @llm-doc-start',
      'def f(x):',
      '    return x',
      '# @llm-doc-end',
      '',
      '# @llm-doc-start',
      'def g(y):',
      '    return y',
      '# @llm-doc-end',
      '',
    ].join('\n');
    await writeFile(join(tempDir, 'calc.py'), source);
    const workspace = await Workspace.open(tempDir);
    await workspace.scanner.scan();
    const [f, g] = await workspace.tasks.listAll();
    for (const task of [f, g]) {
      await workspace.tasks.markProcessing(task.id);
      await workspace.tasks.setSuggestion(task.id, `Return ${task.scopeName}.`);
      await workspace.tasks.markCompleted(task.id);
    }
    await workspace.tasks.setAccepted(f.id, true);

    await writeFile(join(tempDir, 'calc.py'), source.replace('return y', 'return y + 1'));
    await workspace.applyAccepted();
    const rescan = await workspace.scanner.scan();

    expect(rescan.tasksCreated).toBe(0);
    expect(rescan.tasksUpdated).toBe(1);
    expect(rescan.tasksMoved).toBe(0);
    const [task] = await workspace.tasks.listAll();
    expect(task).toMatchObject({
      id: g.id,
      lineNumber: 10,
      status: 'pending',
      suggestion: null,
      context: 'def g(y):\n    return y + 1',
    });
    expect(await workspace.drift()).toEqual({ changed: [], missing: [] });
  });

  it('should report tracked files edited or removed since the last scan', async () => {
    await writeFile(join(tempDir, 'a.py'), 'x = 1\n');
    await writeFile(join(tempDir, 'b.py'), 'y = 2\n');
    await writeFile(join(tempDir, 'c.py'), 'z = 3\n');
    const workspace = await Workspace.open(tempDir);
    await workspace.scanner.scan();

    await writeFile(join(tempDir, 'b.py'), 'y = 3\n');
    await rm(join(tempDir, 'c.py'));

    expect(await workspace.drift()).toEqual({ changed: ['b.py'], missing: ['c.py'] });
  });
});
