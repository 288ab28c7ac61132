import { parseArgs } from 'node:util';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { AnswerResponse, ChatMessage } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { RUNTIME_OPTIONS, createRuntime, runtimeOptionsFrom } from '../runtime.js';

const historySchema = z.array(
  z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
  }),
);

export async function loadHistory(filePath: string): Promise<ChatMessage[]> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `Cannot read chat history ${filePath}: ${getErrorMessage(error)}`);
  }
  const parsed = historySchema.safeParse(decoded);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw createError('INVALID_ARGUMENT', `Invalid chat history ${filePath}: ${issue?.message ?? 'invalid'}${where}`);
  }
  return parsed.data;
}

export function printAnswer(response: AnswerResponse): void {
  console.log(response.answer);
  if (response.citations.length > 0) {
    console.log('');
    console.log('Sources:');
    response.citations.forEach((citation, index) => {
      const page = citation.pageNumber === null ? '' : `, page ${citation.pageNumber}`;
      console.log(`  [${index + 1}] ${citation.documentTitle}${page}`);
    });
  }
  if (response.error) {
    console.error(`Warning: ${response.error}`);
  }
}

export async function askCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...RUNTIME_OPTIONS,
      history: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });

  const question = positionals.join(' ').trim();
  if (!question) {
    throw createError('INVALID_ARGUMENT', 'A question is required. Usage: docqa ask "<question>"');
  }

  const options = runtimeOptionsFrom(values);
  const history = values.history ? await loadHistory(path.resolve(options.workspace, values.history)) : [];

  const runtime = await createRuntime(options);
  try {
    const response = await runtime.orchestrator.answerQuery(question, history);
    if (values.json) {
      console.log(JSON.stringify(response, null, 2));
    } else {
      printAnswer(response);
    }
  } finally {
    runtime.close();
  }
}
