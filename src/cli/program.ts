/**
 * CLI: сборка commander program и запуск с заданным runtime
 */

import { Command, CommanderError } from 'commander';
import { registerCompletionCommand } from './completionCommand';
import { registerQueryCommand } from './queryCommand';
import type { CliRuntime } from './runtime';

export const CLI_NAME = 'gemini-grounded-search';
export const CLI_VERSION = '0.1.0';

export function buildProgram(runtime: CliRuntime, onExit: (code: number) => void): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      'Query Gemini with Google Search grounding and get answers with verifiable sources.\n\n' +
      'Environment Variables:\n' +
      '  GEMINI_API_KEY    Required API key for Gemini authentication'
    )
    .version(CLI_VERSION)
    .configureOutput({
      writeOut(str) {
        runtime.stdout.write(str);
      },
      writeErr(str) {
        runtime.stderr.write(str);
      }
    })
    .exitOverride();

  registerQueryCommand(program, runtime, onExit);
  registerCompletionCommand(program, runtime, onExit);

  return program;
}

/**
 * Разбирает аргументы (без node и пути к скрипту) и выполняет команду
 *
 * @returns exit code
 */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(runtime, code => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // help, version и ошибки разбора аргументов: commander уже вывел сообщение
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
