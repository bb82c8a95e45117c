import type { Task } from '../registry/types.js';

export interface CommandOptions {
  cwd: string;
}

export interface CommandResult {
  command: string;
  /** Exit code of the shell; signal terminations map to 128 + signal number */
  exitCode: number;
  signal: NodeJS.Signals | null;
  duration: number;
  /** Set when the shell could not be spawned at all */
  error?: Error;
}

/**
 * Выполняет одну командную строку, блокируясь до выхода процесса.
 */
export interface CommandExecutor {
  execute(command: string, options: CommandOptions): Promise<CommandResult>;
}

export interface RunHooks {
  onTaskStart?(task: Task): void;
  onCommand?(task: Task, command: string): void;
}

export interface RunOptions {
  /** Report the plan without executing anything */
  dryRun?: boolean;
  /** Run only the named task, not its dependencies */
  skipDependencies?: boolean;
}

export interface TaskRunReport {
  task: string;
  /** Empty for a dry run */
  results: CommandResult[];
  commands: string[];
}

export interface RunReport {
  target: string;
  dryRun: boolean;
  tasks: TaskRunReport[];
}
