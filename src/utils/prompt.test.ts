import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { PromptValidationError } from '../services/errors';
import { readStdin, resolvePrompt, validatePrompt } from './prompt';

const piped = (...chunks: string[]) => Readable.from(chunks);
const terminal = () => Object.assign(Readable.from([]), { isTTY: true });

describe('validatePrompt', () => {
  it('возвращает prompt без изменений', () => {
    expect(validatePrompt('Who won euro 2024?')).toBe('Who won euro 2024?');
    expect(validatePrompt('  spaced  ')).toBe('  spaced  ');
  });

  it('бросает ошибку без prompt', () => {
    expect(() => validatePrompt(undefined)).toThrow(PromptValidationError);
    expect(() => validatePrompt(undefined)).toThrow(/^No prompt provided/);
    expect(() => validatePrompt('')).toThrow(/^No prompt provided/);
  });
});

describe('readStdin', () => {
  it('читает и обрезает ввод', async () => {
    await expect(readStdin(piped('  Who won', ' euro 2024?\n'))).resolves.toBe('Who won euro 2024?');
  });

  it('собирает многобайтовый символ, разрезанный между chunks', async () => {
    const bytes = Buffer.from('  Привет, мир\n', 'utf8');
    const stdin = Readable.from([bytes.subarray(0, 3), bytes.subarray(3, 8), bytes.subarray(8)]);
    await expect(readStdin(stdin)).resolves.toBe('Привет, мир');
  });

  it('отклоняет терминал', async () => {
    await expect(readStdin(terminal())).rejects.toThrow(/^No input available from stdin/);
  });

  it('отклоняет пустой ввод', async () => {
    await expect(readStdin(piped('   \n'))).rejects.toThrow(/^Empty input received from stdin/);
  });
});

describe('resolvePrompt', () => {
  it('stdin имеет приоритет над аргументом', async () => {
    await expect(resolvePrompt('from argument', true, piped('from stdin'))).resolves.toBe('from stdin');
  });

  it('использует аргумент без --stdin', async () => {
    await expect(resolvePrompt('from argument', false, terminal())).resolves.toBe('from argument');
  });

  it('бросает PromptValidationError без аргумента и без --stdin', async () => {
    await expect(resolvePrompt(undefined, false, piped('ignored'))).rejects.toBeInstanceOf(PromptValidationError);
  });
});
