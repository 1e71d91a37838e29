/**
 * Команда completion: скрипт автодополнения для bash/zsh
 */

import type { Command } from 'commander';
import { CliUsageError, classifyError, formatErrorMessage } from '../services/errors';
import type { CliRuntime } from './runtime';

export const SUPPORTED_SHELLS = ['bash', 'zsh'] as const;
export type SupportedShell = (typeof SUPPORTED_SHELLS)[number];

function isSupportedShell(shell: string): shell is SupportedShell {
  return (SUPPORTED_SHELLS as readonly string[]).includes(shell);
}

function optionFlags(command: Command): string[] {
  const flags: string[] = [];
  for (const option of command.options) {
    if (option.short) flags.push(option.short);
    if (option.long) flags.push(option.long);
  }
  return [...flags, '--help'];
}

/**
 * Скрипт строится по командам и опциям program
 */
export function generateCompletionScript(program: Command, shell: SupportedShell): string {
  const bin = program.name();
  const fn = `_${bin.replace(/[^A-Za-z0-9]/g, '_')}_completion`;
  const topLevel = [...program.commands.map(c => c.name()), ...optionFlags(program)];

  const cases = program.commands.map(command => {
    const words = command.name() === 'completion' ? [...SUPPORTED_SHELLS] : optionFlags(command);
    return `    ${command.name()}) COMPREPLY=( $(compgen -W "${words.join(' ')}" -- "$cur") ) ;;`;
  });

  const bashScript = [
    `${fn}() {`,
    '  local cur="${COMP_WORDS[COMP_CWORD]}"',
    '  if [ "$COMP_CWORD" -eq 1 ]; then',
    `    COMPREPLY=( $(compgen -W "${topLevel.join(' ')}" -- "$cur") )`,
    '    return',
    '  fi',
    '  case "${COMP_WORDS[1]}" in',
    ...cases,
    '  esac',
    '}',
    `complete -F ${fn} ${bin}`
  ];

  if (shell === 'zsh') {
    return [`#compdef ${bin}`, 'autoload -U +X bashcompinit && bashcompinit', ...bashScript].join('\n');
  }
  return bashScript.join('\n');
}

export function registerCompletionCommand(
  program: Command,
  runtime: CliRuntime,
  onExit: (code: number) => void
): Command {
  return program
    .command('completion')
    .description(`Print shell completion script (${SUPPORTED_SHELLS.join(', ')})`)
    .argument('<shell>', 'Target shell')
    .action((shell: string) => {
      try {
        if (!isSupportedShell(shell)) {
          throw new CliUsageError(
            `Unsupported shell: ${shell}. Supported shells: ${SUPPORTED_SHELLS.join(', ')}`
          );
        }
        runtime.stdout.write(`${generateCompletionScript(program, shell)}\n`);
        onExit(0);
      } catch (error) {
        const classified = classifyError(error);
        runtime.stderr.write(`${formatErrorMessage(classified)}\n`);
        onExit(classified.exitCode);
      }
    });
}
