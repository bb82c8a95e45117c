import * as defaultFs from 'node:fs/promises';
import * as path from 'node:path';
import type { TaskRegistry } from '../registry/registry.js';
import type { Task } from '../registry/types.js';
import { CommandFailedError, MissingInputError, MissingOutputError } from './errors.js';
import type {
  CommandExecutor,
  CommandResult,
  RunHooks,
  RunOptions,
  RunReport,
  TaskRunReport,
} from './types.js';

type FsModule = typeof defaultFs;

export interface TaskRunnerOptions {
  /** Working directory of every command; inputs and outputs resolve against it */
  rootDir: string;
  hooks?: RunHooks;
  fs?: FsModule;
}

/**
 * Последовательно выполняет задачи плана.
 * Первая неудачная команда прерывает всё оставшееся; выполненные шаги не откатываются.
 */
export class TaskRunner {
  private readonly rootDir: string;
  private readonly hooks: RunHooks;
  private readonly fs: FsModule;

  constructor(
    private readonly registry: TaskRegistry,
    private readonly executor: CommandExecutor,
    options: TaskRunnerOptions,
  ) {
    this.rootDir = options.rootDir;
    this.hooks = options.hooks ?? {};
    this.fs = options.fs ?? defaultFs;
  }

  /**
   * @throws {UnknownTaskError} до запуска каких-либо команд
   * @throws {MissingInputError} если входной файл задачи отсутствует
   * @throws {CommandFailedError} при ненулевом коде выхода
   * @throws {MissingOutputError} если задача не создала ожидаемый файл
   */
  async run(name: string, options: RunOptions = {}): Promise<RunReport> {
    const plan = options.skipDependencies ? [this.registry.get(name)] : this.registry.plan(name);
    const dryRun = options.dryRun ?? false;
    const tasks: TaskRunReport[] = [];

    for (const task of plan) {
      this.hooks.onTaskStart?.(task);

      if (dryRun) {
        for (const command of task.commands) {
          this.hooks.onCommand?.(task, command);
        }
        tasks.push({ task: task.name, commands: [...task.commands], results: [] });
        continue;
      }

      tasks.push(await this.runTask(task));
    }

    return { target: name, dryRun, tasks };
  }

  private async runTask(task: Task): Promise<TaskRunReport> {
    for (const input of task.inputs) {
      if (!(await this.exists(input))) {
        throw new MissingInputError(task.name, input);
      }
    }

    const results: CommandResult[] = [];
    for (const command of task.commands) {
      this.hooks.onCommand?.(task, command);

      const result = await this.executor.execute(command, { cwd: this.rootDir });
      results.push(result);

      if (result.error || result.exitCode !== 0) {
        throw new CommandFailedError(
          task.name,
          command,
          result.exitCode,
          result.signal,
          result.error,
        );
      }
    }

    for (const output of task.outputs) {
      if (!(await this.exists(output))) {
        throw new MissingOutputError(task.name, output);
      }
    }

    return { task: task.name, commands: [...task.commands], results };
  }

  private async exists(relativePath: string): Promise<boolean> {
    try {
      await this.fs.access(path.resolve(this.rootDir, relativePath));
      return true;
    } catch (e) {
      if (e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) {
        return false;
      }
      throw e;
    }
  }
}
