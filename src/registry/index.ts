export { UnknownTaskError, CircularDependencyError } from './errors.js';
export { createTaskRegistry, type TaskRegistry } from './registry.js';
export type { Task } from './types.js';
