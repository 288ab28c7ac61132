import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { askCommand, loadHistory } from '../ask.js';
import { createRuntime, type CliRuntime } from '../../runtime.js';
import { CliError } from '../../errors.js';
import { Orchestrator } from '../../../orchestrator/pipeline.js';
import { InMemoryChunkSource } from '../../../providers/in_memory_chunk_source.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import { ConfigurationError } from '../../../core/errors.js';
import type { ChunkSource } from '../../../providers/types.js';
import { fixedEmbedder, scriptedCompletion } from '../../../__tests__/pipeline_fixtures.js';

vi.mock('../../runtime.js', async () => {
  const actual = await vi.importActual<typeof import('../../runtime.js')>('../../runtime.js');
  return {
    ...actual,
    createRuntime: vi.fn(),
  };
});

function warrantySource(): InMemoryChunkSource {
  return new InMemoryChunkSource([
    {
      id: 'warranty',
      title: 'Warranty terms',
      status: 'READY',
      chunks: [{ id: 'w-0', sequenceIndex: 0, pageNumber: 3, text: 'The warranty lasts 24 months.', embedding: [1, 0] }],
    },
  ]);
}

function stubRuntime(chunkSource: ChunkSource, reply: string) {
  const completion = scriptedCompletion(reply);
  const runtime: CliRuntime = {
    orchestrator: new Orchestrator({
      chunkSource,
      embedder: fixedEmbedder([1, 0]).provider,
      completion: completion.provider,
    }),
    config: DEFAULT_CONFIG,
    dbPath: '/tmp/store.sqlite',
    close: vi.fn(),
  };
  vi.mocked(createRuntime).mockResolvedValue(runtime);
  return { runtime, completion };
}

describe('askCommand', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let dir: string | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  const printed = (): unknown[] => logSpy.mock.calls.map((call) => call[0]);

  it('prints the answer followed by its sources', async () => {
    const { runtime } = stubRuntime(warrantySource(), 'The warranty lasts 24 months [Source 1].');

    await askCommand(['How long is the warranty?', '--db', 'store.sqlite', '-w', '/srv/docs']);

    expect(printed()).toEqual([
      'The warranty lasts 24 months [Source 1].',
      '',
      'Sources:',
      '  [1] Warranty terms, page 3',
    ]);
    expect(createRuntime).toHaveBeenCalledWith({
      workspace: '/srv/docs',
      dbPath: 'store.sqlite',
      configPath: undefined,
      verbose: undefined,
    });
    expect(runtime.close).toHaveBeenCalledTimes(1);
  });

  it('prints the whole response as JSON', async () => {
    stubRuntime(warrantySource(), 'The warranty lasts 24 months [Source 1].');

    await askCommand(['How long is the warranty?', '--json']);

    const output = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
    expect(output.answer).toBe('The warranty lasts 24 months [Source 1].');
    expect(output.citations).toEqual([
      {
        documentId: 'warranty',
        documentTitle: 'Warranty terms',
        pageNumber: 3,
        sequenceIndex: 0,
        snippet: 'The warranty lasts 24 months.',
      },
    ]);
    expect(output.metadata.stateTrace).toEqual(['START', 'ROUTE', 'RETRIEVE', 'REASON', 'DONE']);
  });

  it('warns on stderr when a stage degraded the answer', async () => {
    const failing: ChunkSource = {
      listReadyChunks: async () => {
        throw new Error('disk unavailable');
      },
    };
    stubRuntime(failing, 'unused');

    await askCommand(['How long is the warranty?']);

    expect(errorSpy).toHaveBeenCalledWith('Warning: Retrieval failed (source_failed): disk unavailable');
  });

  it('applies chat utilities to the last assistant message in the history', async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-ask-'));
    fs.writeFileSync(
      path.join(dir, 'chat.json'),
      JSON.stringify([
        { role: 'user', content: 'How long is the warranty?' },
        { role: 'assistant', content: 'The warranty lasts 24 months and covers parts.' },
      ]),
    );
    const { completion } = stubRuntime(warrantySource(), 'Two years, parts only.');

    await askCommand(['summarize that', '--history', 'chat.json', '--workspace', dir]);

    expect(printed()).toEqual(['Two years, parts only.']);
    expect(completion.complete.mock.calls[0]?.[0]).toContain('The warranty lasts 24 months and covers parts.');
  });

  it('requires a question', async () => {
    const error = await askCommand(['--json']).then(undefined, (e: unknown) => e);

    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError ? error.code : undefined).toBe('INVALID_ARGUMENT');
    expect(createRuntime).not.toHaveBeenCalled();
  });

  it('closes the runtime when the pipeline throws', async () => {
    const misconfigured: ChunkSource = {
      listReadyChunks: async () => {
        throw new ConfigurationError('db', 'schema missing');
      },
    };
    const { runtime } = stubRuntime(misconfigured, 'unused');

    await expect(askCommand(['How long is the warranty?'])).rejects.toBeInstanceOf(ConfigurationError);
    expect(runtime.close).toHaveBeenCalledTimes(1);
  });
});

describe('loadHistory', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-history-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('rejects messages with an unknown role', async () => {
    const file = path.join(dir, 'chat.json');
    fs.writeFileSync(file, JSON.stringify([{ role: 'bot', content: 'hi' }]));

    await expect(loadHistory(file)).rejects.toThrow(/at 0\.role/);
  });

  it('reports unreadable files as usage errors', async () => {
    const error = await loadHistory(path.join(dir, 'missing.json')).then(undefined, (e: unknown) => e);

    expect(error instanceof CliError ? error.code : undefined).toBe('INVALID_ARGUMENT');
  });
});
