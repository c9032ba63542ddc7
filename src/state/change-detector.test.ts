import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ChangeDetector, artifactSubject, blockPrefix, blockSubject, fileSubject } from './change-detector.js';
import { JsonFingerprintStore } from './fingerprint-store.js';

describe('ChangeDetector', () => {
  let tempDir: string;
  let fingerprints: JsonFingerprintStore;
  let detector: ChangeDetector;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'docmark-changes-'));
    await writeFile(join(tempDir, 'a.py'), 'x = 1\n');
    await writeFile(join(tempDir, 'b.py'), 'y = 2\n');
    fingerprints = new JsonFingerprintStore(join(tempDir, '.docmark'));
    detector = new ChangeDetector(tempDir, fingerprints);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true });
  });

  it('should build subject keys', () => {
    expect(fileSubject('pkg/a.py')).toBe('file:pkg/a.py');
    expect(blockSubject('pkg/a.py', 'class', 'Point')).toBe('block:pkg/a.py:class:Point#0');
    expect(blockSubject('pkg/a.py', 'comment', 'total = a + b', 1)).toBe('block:pkg/a.py:comment:total = a + b#1');
    expect(blockSubject('pkg/a.py', 'class', 'Point').startsWith(blockPrefix('pkg/a.py'))).toBe(true);
    expect(artifactSubject('readme')).toBe('artifact:readme');
  });

  it('should need regeneration when nothing was recorded', async () => {
    expect(await detector.needsRegeneration(artifactSubject('readme'), ['a.py'])).toBe(true);
  });

  it('should not need regeneration after recording unchanged sources', async () => {
    const subject = artifactSubject('readme');
    await detector.recordSources(subject, ['a.py', 'b.py']);
    expect(await detector.needsRegeneration(subject, ['b.py', 'a.py'])).toBe(false);
  });

  it('should need regeneration after a single-byte change', async () => {
    const subject = artifactSubject('readme');
    await detector.recordSources(subject, ['a.py', 'b.py']);
    await writeFile(join(tempDir, 'a.py'), 'x = 2\n');
    expect(await detector.needsRegeneration(subject, ['a.py', 'b.py'])).toBe(true);
  });

  it('should compare fingerprints', async () => {
    const subject = blockSubject('a.py', 'function', 'f');
    expect(await detector.compare(subject, 'aaaa')).toBe('new');
    await detector.record(subject, 'aaaa');
    expect(await detector.compare(subject, 'aaaa')).toBe('unchanged');
    expect(await detector.compare(subject, 'bbbb')).toBe('changed');
  });

  it('should prune stale subjects under a prefix', async () => {
    await detector.record(blockSubject('a.py', 'function', 'f'), '1');
    await detector.record(blockSubject('a.py', 'function', 'g'), '2');
    await detector.record(blockSubject('b.py', 'function', 'f'), '3');

    const removed = await detector.prune(blockPrefix('a.py'), [blockSubject('a.py', 'function', 'g')]);
    expect(removed).toBe(1);
    expect((await fingerprints.list()).map(([subject]) => subject)).toEqual([
      'block:a.py:function:g#0',
      'block:b.py:function:f#0',
    ]);
  });

  it('should keep the hash when relocating a record', async () => {
    const subject = blockSubject('a.py', 'function', 'f');
    await detector.record(subject, 'aaaa', 4);
    await detector.relocate(subject, 7);

    const record = (await detector.lookup(blockPrefix('a.py'))).get(subject);
    expect(record?.hash).toBe('aaaa');
    expect(record?.line).toBe(7);
  });
});
