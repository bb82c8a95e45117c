/**
 * Задача с таким именем не объявлена.
 */
export class UnknownTaskError extends Error {
  constructor(
    public readonly taskName: string,
    public readonly available: string[],
    hint?: string,
  ) {
    super(UnknownTaskError.describe(taskName, available, hint));
    this.name = 'UnknownTaskError';
  }

  private static describe(taskName: string, available: string[], hint?: string): string {
    const list = available.length > 0 ? available.join(', ') : '(none)';
    return `No such task: "${taskName}"${hint ? ` (${hint})` : ''}. Available tasks: ${list}`;
  }
}

/**
 * Обнаружена циклическая зависимость между задачами.
 */
export class CircularDependencyError extends Error {
  /**
   * @param cycle - Task names forming the cycle, first name repeated at the end
   */
  constructor(
    message: string,
    public cycle: string[],
  ) {
    super(message);
    this.name = 'CircularDependencyError';
  }
}
