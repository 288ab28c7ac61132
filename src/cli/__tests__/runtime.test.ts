import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { createRuntime, runtimeOptionsFrom } from '../runtime.js';
import { applyChunkStoreSchema } from '../../providers/sqlite_chunk_source.js';
import { getLogLevel, setLogLevel } from '../../telemetry/logger.js';
import { ConfigurationError } from '../../core/errors.js';

describe('createRuntime', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-runtime-'));
    const db = new Database(path.join(workspace, 'store.sqlite'));
    applyChunkStoreSchema(db);
    db.close();
  });

  afterEach(() => {
    setLogLevel('silent');
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('loads config from the environment and opens the store', async () => {
    const runtime = await createRuntime({
      workspace,
      dbPath: 'store.sqlite',
      env: { DOCQA_TOP_K: '3', DOCQA_LOG_LEVEL: 'error' },
    });

    try {
      expect(runtime.dbPath).toBe(path.join(workspace, 'store.sqlite'));
      expect(runtime.config.retrieval.topK).toBe(3);
      expect(getLogLevel()).toBe('error');
      await expect(runtime.orchestrator.runUtility('missing', 'summarize')).rejects.toThrow(/not found or is not ready/);
    } finally {
      runtime.close();
    }
  });

  it('switches to debug logging when verbose', async () => {
    const runtime = await createRuntime({ workspace, dbPath: 'store.sqlite', verbose: true, env: {} });
    runtime.close();

    expect(getLogLevel()).toBe('debug');
  });

  it('rejects invalid configuration before touching the store', async () => {
    await expect(
      createRuntime({ workspace, dbPath: 'absent.sqlite', env: { DOCQA_ALPHA: '3' } }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('runtimeOptionsFrom', () => {
  it('defaults the workspace to the current directory', () => {
    expect(runtimeOptionsFrom({ db: 'a.sqlite' })).toEqual({
      workspace: process.cwd(),
      dbPath: 'a.sqlite',
      configPath: undefined,
      verbose: undefined,
    });
  });
});
