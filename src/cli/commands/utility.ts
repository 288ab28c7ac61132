import { parseArgs } from 'node:util';
import { createError } from '../errors.js';
import { RUNTIME_OPTIONS, createRuntime, runtimeOptionsFrom } from '../runtime.js';

export async function utilityCommand(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...RUNTIME_OPTIONS,
      'target-language': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });

  const [documentId, action] = positionals;
  if (!documentId || !action) {
    throw createError(
      'INVALID_ARGUMENT',
      'A document id and an action are required. Usage: docqa utility <documentId> <summarize|translate|checklist>',
    );
  }

  const runtime = await createRuntime(runtimeOptionsFrom(values));
  try {
    const response = await runtime.orchestrator.runUtility(documentId, action, values['target-language']);
    if (values.json) {
      console.log(JSON.stringify(response, null, 2));
      return;
    }
    console.log(response.outputText);
    if (response.error) {
      console.error(`Warning: ${response.error}`);
    }
  } finally {
    runtime.close();
  }
}
