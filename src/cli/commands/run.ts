import type { Services } from '../services.js';
import { TaskRunner } from '../../runner/runner.js';
import type { RunReport } from '../../runner/types.js';

export interface RunCommandOptions {
  task: string;
  dryRun?: boolean;
  /** commander sets this to false for --no-deps */
  deps?: boolean;
}

/**
 * Main implementation of the run command.
 * Echoes each task and command line before it runs; the command's own output goes straight to the terminal.
 */
export async function runCommand(options: RunCommandOptions, services: Services): Promise<RunReport> {
  const runner = new TaskRunner(services.registry, services.executor, {
    rootDir: services.config.rootDir,
    hooks: {
      onTaskStart: (task) => console.log(`▶ ${task.name}`),
      onCommand: (_task, command) => console.log(`$ ${command}`),
    },
  });

  return runner.run(options.task, {
    dryRun: options.dryRun ?? false,
    skipDependencies: options.deps === false,
  });
}
