/**
 * Regex для имени задачи: kebab-case, начинается с буквы или цифры, не длиннее 50 символов
 */
export const TASK_NAME_REGEX = /^[a-z0-9][a-z0-9-]{0,49}$/;

/**
 * Проверяет формат имени задачи без выбрасывания ошибки.
 * @returns true если имя валидно, иначе false
 */
export function isValidTaskName(name: string): boolean {
  return TASK_NAME_REGEX.test(name);
}
