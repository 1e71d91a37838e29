/**
 * Команда query: grounded запрос и вывод в JSON или markdown
 */

import type { Command } from 'commander';
import { resolveModel } from '../config/searchConfig';
import { classifyError, formatErrorMessage } from '../services/errors';
import { queryWithGrounding } from '../services/gemini';
import { EventLogger, levelForVerbosity } from '../services/observability';
import { addInlineCitations, toJSON, toMarkdown } from '../services/webSearch';
import { resolvePrompt } from '../utils/prompt';
import type { CliRuntime } from './runtime';

const SCOPE = 'commands.query';

export interface QueryCommandOptions {
  stdin: boolean;
  addCitations: boolean;
  pro: boolean;
  text: boolean;
  verbose: number;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

/**
 * Выполняет query и возвращает exit code.
 * Вывод в stdout пишется только после того, как ответ полностью собран.
 */
export async function runQuery(
  prompt: string | undefined,
  options: QueryCommandOptions,
  runtime: CliRuntime
): Promise<number> {
  const logger = new EventLogger({
    logLevel: levelForVerbosity(options.verbose),
    stream: runtime.stderr
  });
  logger.info('command_start', SCOPE, 'Starting query command');

  try {
    const finalPrompt = await resolvePrompt(prompt, options.stdin, runtime.stdin);
    logger.debug('prompt_resolved', SCOPE, `Validated prompt: ${finalPrompt.slice(0, 50)}...`);

    const client = runtime.createClient({ env: runtime.env, logger });
    const model = resolveModel(options.pro);

    const response = await queryWithGrounding(client, finalPrompt, { model, logger });
    logger.info('api_response', SCOPE, 'Query completed successfully');

    if (options.addCitations && response.groundingSegments) {
      response.responseText = addInlineCitations(
        response.responseText,
        response.groundingSegments,
        response.citations
      );
      logger.info('citations_added', SCOPE, 'Citations added to response text');
    }

    const output = options.text
      ? toMarkdown(response)
      : toJSON(response, { includeGroundingMetadata: options.verbose >= 2 });

    runtime.stdout.write(`${output}\n`);
    logger.debug('output_written', SCOPE, `Output written as ${options.text ? 'markdown' : 'JSON'}`);
    return 0;
  } catch (error) {
    const classified = classifyError(error);
    logger.error(SCOPE, `Query failed: ${classified.message}`, { type: classified.type });
    if (error instanceof Error && error.stack) {
      logger.debug('error', SCOPE, 'Full stack trace', { stack: error.stack });
    }
    runtime.stderr.write(`${formatErrorMessage(classified)}\n`);
    return classified.exitCode;
  }
}

/**
 * Регистрирует query в program. Настройки вывода и exitOverride
 * наследуются от program, поэтому их задают до вызова.
 */
export function registerQueryCommand(
  program: Command,
  runtime: CliRuntime,
  onExit: (code: number) => void
): Command {
  return program
    .command('query')
    .description('Query Gemini with Google Search grounding for real-time web information')
    .argument('[prompt]', 'The question to ask')
    .option('-s, --stdin', 'Read prompt from stdin (overrides PROMPT argument)', false)
    .option('--add-citations', 'Add inline citations to the response text', false)
    .option('--pro', 'Use gemini-2.5-pro model (default: gemini-2.5-flash)', false)
    .option('-t, --text', 'Output markdown format instead of JSON', false)
    .option(
      '-v, --verbose',
      'Enable verbose output (-v INFO, -vv DEBUG and grounding metadata, -vvv TRACE)',
      increaseVerbosity,
      0
    )
    .action(async (prompt: string | undefined, options: QueryCommandOptions) => {
      onExit(await runQuery(prompt, options, runtime));
    });
}
