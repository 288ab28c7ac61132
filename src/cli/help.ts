/**
 * @fileoverview Detailed help text for docqa CLI commands
 */

const HELP_TEXT = {
  main: `
docqa - Grounded question answering over a chunked document store

USAGE:
    docqa <command> [options]

COMMANDS:
    ask "<question>"                 Answer a question with cited sources
    utility <documentId> <action>    Summarize, translate or extract a checklist from a document
    eval --queries <file>            Score answers against expected keywords
    help [command]                   Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Directory relative paths resolve against (default: current directory)
    --db <path>         SQLite chunk store (default: DOCQA_DB, then .docqa/docqa.sqlite)
    --config <path>     YAML configuration file (default: DOCQA_CONFIG)
    --verbose           Log pipeline decisions to stderr
    --json              Print results and errors as JSON

ENVIRONMENT:
    DOCQA_CONFIG, DOCQA_DB, DOCQA_LOG_LEVEL, DOCQA_API_KEY, DOCQA_BASE_URL,
    DOCQA_CHAT_MODEL, DOCQA_EMBEDDING_MODEL, DOCQA_ALPHA, DOCQA_TOP_K

EXAMPLES:
    docqa ask "How long is the warranty?" --db ./store.sqlite
    docqa utility doc-42 summarize
    docqa eval --queries ./queries.json --output ./report.json

For more information on a specific command, run:
    docqa help <command>
`,

  ask: `
docqa ask - Answer a question from the document store

USAGE:
    docqa ask "<question>" [options]

OPTIONS:
    --history <file>    JSON array of prior {role, content} messages, oldest first
    --json              Print the full response (answer, citations, metadata)

DESCRIPTION:
    Questions are routed by keyword. Requests to summarize, translate or
    make a checklist are applied to the latest assistant message in the
    history, or to the question text. Everything else retrieves the most
    relevant chunks and answers from them, citing [Source N].

EXAMPLES:
    docqa ask "What does section 4 require?"
    docqa ask "translate to French" --history ./chat.json
`,

  utility: `
docqa utility - Transform a whole document

USAGE:
    docqa utility <documentId> <summarize|translate|checklist> [options]

OPTIONS:
    --target-language <lang>  Translation target (default: English for Persian text, otherwise Persian)
    --json                    Print the full response

EXAMPLES:
    docqa utility doc-42 checklist
    docqa utility doc-42 translate --target-language German
`,

  eval: `
docqa eval - Run a keyword evaluation

USAGE:
    docqa eval --queries <file> [options]

OPTIONS:
    --queries <file>    JSON file: { "queries": [{ "query", "expectedKeywords", "active" }] }
    --output <file>     Write the report as JSON
    --json              Print the report as JSON instead of a table

DESCRIPTION:
    Each active query is answered and scored by the fraction of its
    expected keywords present in the answer. A query that throws scores 0.

EXAMPLES:
    docqa eval --queries ./queries.json
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function getCommandHelp(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
