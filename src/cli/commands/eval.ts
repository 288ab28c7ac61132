import { parseArgs } from 'node:util';
import { writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  loadTestQueries,
  runEvaluation,
  type EvaluationReport,
} from '../../evaluation/keyword_evaluator.js';
import { createError } from '../errors.js';
import { createProgressBar, formatDuration, printKeyValue, printTable } from '../progress.js';
import { RUNTIME_OPTIONS, createRuntime, runtimeOptionsFrom } from '../runtime.js';

export function printReport(report: EvaluationReport): void {
  printTable(
    ['Query', 'Score', 'Intent', 'Citations', 'Error'],
    report.results.map((result) => [
      result.queryId,
      result.score.toFixed(2),
      result.intent ?? '-',
      String(result.citationCount),
      result.error ?? '',
    ]),
  );
  console.log('');
  printKeyValue([
    { key: 'Queries', value: report.totalQueries },
    { key: 'Average score', value: report.averageScore.toFixed(2) },
    { key: 'Min score', value: report.minScore.toFixed(2) },
    { key: 'Max score', value: report.maxScore.toFixed(2) },
    { key: 'Duration', value: formatDuration(Date.parse(report.completedAt) - Date.parse(report.startedAt)) },
  ]);
}

export async function evalCommand(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...RUNTIME_OPTIONS,
      queries: { type: 'string' },
      output: { type: 'string' },
    },
    allowPositionals: false,
    strict: true,
  });

  if (!values.queries) {
    throw createError('INVALID_ARGUMENT', 'A test query file is required. Usage: docqa eval --queries <file>');
  }

  const options = runtimeOptionsFrom(values);
  const testQueries = await loadTestQueries(path.resolve(options.workspace, values.queries));
  const total = testQueries.filter((query) => query.active).length;

  const runtime = await createRuntime(options);
  const bar = values.json || total === 0 ? undefined : createProgressBar({ total });
  const report = await runEvaluation(runtime.orchestrator, testQueries, {
    onProgress: (completed, _total, result) => bar?.update(completed, { task: result.queryId }),
  }).finally(() => {
    bar?.stop();
    runtime.close();
  });

  if (values.output) {
    await writeFile(path.resolve(options.workspace, values.output), `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  }
  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report);
  }
}
