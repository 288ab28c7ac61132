import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { resolveDbPath } from '../db_path.js';
import { CliError } from '../errors.js';

describe('resolveDbPath', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-db-'));
    fs.mkdirSync(path.join(workspace, '.docqa'));
    fs.writeFileSync(path.join(workspace, '.docqa', 'docqa.sqlite'), '');
    fs.writeFileSync(path.join(workspace, 'custom.sqlite'), '');
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('defaults to the store under the workspace', async () => {
    await expect(resolveDbPath(workspace, undefined, {})).resolves.toBe(path.join(workspace, '.docqa', 'docqa.sqlite'));
  });

  it('prefers the explicit path over DOCQA_DB', async () => {
    const resolved = await resolveDbPath(workspace, 'custom.sqlite', { DOCQA_DB: '/elsewhere.sqlite' });

    expect(resolved).toBe(path.join(workspace, 'custom.sqlite'));
  });

  it('falls back to DOCQA_DB', async () => {
    const resolved = await resolveDbPath(workspace, undefined, { DOCQA_DB: path.join(workspace, 'custom.sqlite') });

    expect(resolved).toBe(path.join(workspace, 'custom.sqlite'));
  });

  it('fails when the store does not exist', async () => {
    const error = await resolveDbPath(workspace, 'missing.sqlite', {}).then(undefined, (e: unknown) => e);

    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError ? error.code : undefined).toBe('DATABASE_NOT_FOUND');
  });
});
