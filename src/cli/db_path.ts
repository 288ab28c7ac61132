/**
 * @fileoverview Chunk store path resolution
 *
 * `--db` wins, then `DOCQA_DB`, then `.docqa/docqa.sqlite` under the
 * workspace. Relative paths resolve against the workspace.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createError } from './errors.js';

const STORE_DIRNAME = '.docqa';
const SQLITE_FILENAME = 'docqa.sqlite';

export async function resolveDbPath(
  workspace: string,
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const candidate = explicit?.trim() || env.DOCQA_DB?.trim() || path.join(STORE_DIRNAME, SQLITE_FILENAME);
  const dbPath = path.isAbsolute(candidate) ? candidate : path.resolve(workspace, candidate);

  try {
    await fs.access(dbPath);
  } catch {
    throw createError('DATABASE_NOT_FOUND', `No chunk store at ${dbPath}`, { dbPath });
  }
  return dbPath;
}
