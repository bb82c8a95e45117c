import type { TaskDefinition } from '../config/types.js';

/**
 * Задача из реестра: определение из конфига плюс имя.
 */
export interface Task extends TaskDefinition {
  name: string;
}
