import type { Config, ConfigService } from '../config/types.js';
import type { TaskRegistry } from '../registry/registry.js';
import { configService } from '../config/index.js';
import { createTaskRegistry } from '../registry/registry.js';
import { ShellExecutor } from '../runner/executor.js';
import type { CommandExecutor } from '../runner/types.js';

export interface Services {
  config: Config;
  registry: TaskRegistry;
  executor: CommandExecutor;
}

export async function createServices(
  configPath?: string,
  loader: ConfigService = configService,
): Promise<Services> {
  // 1. Load config first (needed for tasks and rootDir)
  const config = await loader.load(configPath);

  // 2. Registry validates the dependency graph
  const registry = createTaskRegistry(config.tasks);

  return {
    config,
    registry,
    executor: new ShellExecutor(),
  };
}
