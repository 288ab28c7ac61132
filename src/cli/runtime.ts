/**
 * @fileoverview Wires config, chunk store and provider into an orchestrator
 * for a single CLI invocation.
 */

import { loadConfig, type PipelineConfig } from '../config/index.js';
import { Orchestrator } from '../orchestrator/pipeline.js';
import { OpenAiCompatibleClient } from '../providers/openai_compatible.js';
import { SqliteChunkSource } from '../providers/sqlite_chunk_source.js';
import { logDebug, setLogLevel } from '../telemetry/logger.js';
import { resolveDbPath } from './db_path.js';

/** Flags every command accepts; commands spread these into their own parseArgs options */
export const RUNTIME_OPTIONS = {
  workspace: { type: 'string', short: 'w' },
  db: { type: 'string' },
  config: { type: 'string' },
  verbose: { type: 'boolean' },
  json: { type: 'boolean' },
} as const;

export interface RuntimeFlags {
  workspace?: string;
  db?: string;
  config?: string;
  verbose?: boolean;
}

export interface RuntimeOptions {
  workspace: string;
  dbPath?: string;
  configPath?: string;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
}

export interface CliRuntime {
  orchestrator: Orchestrator;
  config: PipelineConfig;
  dbPath: string;
  close(): void;
}

export function runtimeOptionsFrom(flags: RuntimeFlags): RuntimeOptions {
  return {
    workspace: flags.workspace ?? process.cwd(),
    dbPath: flags.db,
    configPath: flags.config,
    verbose: flags.verbose,
  };
}

export async function createRuntime(options: RuntimeOptions): Promise<CliRuntime> {
  const env = options.env ?? process.env;
  const config = loadConfig({ configPath: options.configPath, env });
  setLogLevel(options.verbose ? 'debug' : config.logging.level);

  const dbPath = await resolveDbPath(options.workspace, options.dbPath, env);
  const chunkSource = new SqliteChunkSource(dbPath);
  const client = new OpenAiCompatibleClient(config.provider);
  logDebug('[cli] Runtime ready', {
    dbPath,
    baseUrl: config.provider.baseUrl,
    chatModel: config.provider.chatModel,
  });

  return {
    orchestrator: new Orchestrator({ chunkSource, embedder: client, completion: client }, config),
    config,
    dbPath,
    close: () => chunkSource.close(),
  };
}
