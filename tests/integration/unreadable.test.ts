import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';

import { syncCorpus } from '../../src/sync/run.js';
import { readCorpus } from '../../src/sync/discover.js';
import { runStatus } from '../../src/sync/process.js';
import { fingerprint, identityOf } from '../../src/sync/fingerprint.js';
import { ConfigError, CorpusReadError } from '../../src/core/errors.js';
import { FakeEmbedder } from '../fakes/fake-embedder.js';
import { InMemoryVectorStore } from '../fakes/in-memory-store.js';

// Permission bits do not stop root, so locked.md and locked-dir fail through the module instead
vi.mock('fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const dir = String(args[0]);
      if (dir.endsWith('locked-dir') || dir.includes('vectorizer-unlistable-')) {
        throw new Error('EACCES: permission denied');
      }
      return actual.readdir(...args);
    },
    readFile: async (...args: Parameters<typeof actual.readFile>) => {
      if (String(args[0]).endsWith('locked.md')) {
        throw new Error('EACCES: permission denied');
      }
      return actual.readFile(...args);
    },
  };
});

describe('syncCorpus with an unreadable file', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'vectorizer-unreadable-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('keeps its stored record and reports a read failure', async () => {
    await writeFile(path.join(root, 'a.md'), 'hello');
    await writeFile(path.join(root, 'locked.md'), 'secret');

    const store = new InMemoryVectorStore();
    store.seed({
      identity: identityOf('locked.md'),
      path: 'locked.md',
      content: 'secret',
      embedding: [1],
      contentFingerprint: fingerprint('secret'),
    });
    const embedder = new FakeEmbedder();

    const { plan, result } = await syncCorpus({ root, embedder, store });

    expect(plan).toEqual([{ identity: identityOf('a.md'), action: 'insert' }]);
    expect(store.calls.delete).toBe(0);
    expect(store.records.has(identityOf('locked.md'))).toBe(true);
    expect(result?.failures).toEqual([
      {
        identity: identityOf('locked.md'),
        path: 'locked.md',
        kind: 'read',
        message: 'EACCES: permission denied',
      },
    ]);
    expect(result && runStatus(result)).toEqual({ exitCode: 1, reasons: ['item-failures'] });
  });
});

describe('syncCorpus with an unlistable directory', () => {
  let root: string;

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('aborts before any write when a subdirectory cannot be listed', async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'vectorizer-unreadable-'));
    await writeFile(path.join(root, 'a.md'), 'hello');
    await mkdir(path.join(root, 'locked-dir'));
    await writeFile(path.join(root, 'locked-dir', 'b.md'), 'world');

    const store = new InMemoryVectorStore();
    store.seed({
      identity: identityOf('locked-dir/b.md'),
      path: 'locked-dir/b.md',
      content: 'world',
      embedding: [1],
      contentFingerprint: fingerprint('world'),
    });
    const embedder = new FakeEmbedder();

    await expect(syncCorpus({ root, embedder, store })).rejects.toBeInstanceOf(CorpusReadError);
    expect(embedder.calls).toEqual([]);
    expect(store.calls.upsert).toBe(0);
    expect(store.calls.delete).toBe(0);
    expect(store.records.has(identityOf('locked-dir/b.md'))).toBe(true);
  });

  it('treats an unlistable root as a configuration error', async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'vectorizer-unlistable-'));
    await writeFile(path.join(root, 'a.md'), 'hello');

    const read = async () => {
      for await (const entry of readCorpus(root)) void entry;
    };
    await expect(read()).rejects.toBeInstanceOf(ConfigError);
    await expect(read()).rejects.toThrow(/Corpus root is not readable/);

    const store = new InMemoryVectorStore();
    await expect(syncCorpus({ root, embedder: new FakeEmbedder(), store })).rejects.toBeInstanceOf(ConfigError);
    expect(store.calls.upsert).toBe(0);
    expect(store.calls.delete).toBe(0);
  });
});
