export { CommandFailedError, MissingInputError, MissingOutputError } from './errors.js';
export { ShellExecutor, exitCodeForSignal } from './executor.js';
export { TaskRunner, type TaskRunnerOptions } from './runner.js';
export type {
  CommandExecutor,
  CommandOptions,
  CommandResult,
  RunHooks,
  RunOptions,
  RunReport,
  TaskRunReport,
} from './types.js';
