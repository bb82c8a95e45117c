/**
 * Внешняя команда завершилась с ненулевым кодом.
 * exitCode пробрасывается в код выхода CLI.
 */
export class CommandFailedError extends Error {
  constructor(
    public readonly task: string,
    public readonly command: string,
    public readonly exitCode: number,
    public readonly signal: NodeJS.Signals | null = null,
    public cause?: Error,
  ) {
    super(CommandFailedError.describe(task, command, exitCode, signal, cause));
    this.name = 'CommandFailedError';
  }

  private static describe(
    task: string,
    command: string,
    exitCode: number,
    signal: NodeJS.Signals | null,
    cause?: Error,
  ): string {
    if (cause) {
      return `Task "${task}": failed to start "${command}": ${cause.message}`;
    }
    if (signal) {
      return `Task "${task}": "${command}" was terminated by ${signal}`;
    }
    return `Task "${task}": "${command}" exited with code ${exitCode}`;
  }
}

/**
 * Входной файл задачи отсутствует; ни одна команда задачи не запускалась.
 */
export class MissingInputError extends Error {
  constructor(
    public readonly task: string,
    public readonly path: string,
  ) {
    super(`Task "${task}": required input not found: ${path}`);
    this.name = 'MissingInputError';
  }
}

/**
 * Команды задачи отработали, но ожидаемый файл не появился.
 */
export class MissingOutputError extends Error {
  constructor(
    public readonly task: string,
    public readonly path: string,
  ) {
    super(`Task "${task}": expected output was not produced: ${path}`);
    this.name = 'MissingOutputError';
  }
}
