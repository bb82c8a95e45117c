import { CommandFailedError } from '../runner/errors.js';

/**
 * Код выхода CLI для ошибки: код упавшей команды или 1.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CommandFailedError) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Текст ошибки для stderr.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Неизвестная ошибка';
}
