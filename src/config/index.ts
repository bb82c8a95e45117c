import { readFile, access, writeFile } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { CONFIG_FILE_NAME, type Config, type ConfigService, type TaskDefinition } from './types.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';
import { DEFAULT_TASKS } from './defaults.js';
import { TASK_NAME_REGEX } from '../utils/validation.js';

const taskNameSchema = z
  .string()
  .regex(
    TASK_NAME_REGEX,
    'Task name must be kebab-case (lowercase letters, numbers, hyphens only, up to 50 chars)',
  );

const taskSchema = z
  .object({
    description: z.string().optional(),
    commands: z.array(z.string().trim().min(1, 'command cannot be empty')).default([]),
    dependsOn: z.array(taskNameSchema).default([]),
    inputs: z.array(z.string().min(1)).default([]),
    outputs: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .refine((task) => task.commands.length > 0 || task.dependsOn.length > 0, {
    message: 'Task must declare at least one command or dependency',
    path: ['commands'],
  });

const configSchema = z
  .object({
    tasks: z
      .record(taskNameSchema, taskSchema)
      .refine((tasks) => Object.keys(tasks).length >= 1, 'tasks must contain at least one task'),
  })
  .strict();

export class ConfigServiceImpl implements ConfigService {
  async createDefault(dir: string = process.cwd()): Promise<{ created: boolean; message: string }> {
    const configPath = resolve(dir, CONFIG_FILE_NAME);

    try {
      // wx: fail instead of overwriting a config created in the meantime
      await writeFile(configPath, stringify({ tasks: DEFAULT_TASKS }), {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (e) {
      const error = e as NodeJS.ErrnoException;
      if (error.code === 'EEXIST') {
        return { created: false, message: `Конфигурация уже существует (${CONFIG_FILE_NAME})` };
      }
      throw error;
    }

    return { created: true, message: `Создан ${CONFIG_FILE_NAME}` };
  }

  /**
   * Find config file by traversing up the directory tree.
   * Returns the resolved path to the config file, or null if not found.
   */
  private async findConfigPath(startDir: string): Promise<string | null> {
    let currentDir = resolve(startDir);

    while (true) {
      const configPath = resolve(currentDir, CONFIG_FILE_NAME);

      try {
        await access(configPath);
        return configPath;
      } catch (e) {
        const error = e as NodeJS.ErrnoException;
        if (error.code !== 'ENOENT') {
          throw new ConfigLoadError(`Cannot access config at ${configPath}`, error);
        }
      }

      const parentDir = dirname(currentDir);
      if (parentDir === currentDir) {
        return null;
      }

      currentDir = parentDir;
    }
  }

  async load(path?: string): Promise<Config> {
    let configPath: string;

    if (path) {
      configPath = resolve(path);
      try {
        await access(configPath);
      } catch {
        throw new ConfigNotFoundError();
      }
    } else {
      const foundPath = await this.findConfigPath(process.cwd());
      if (!foundPath) {
        throw new ConfigNotFoundError();
      }
      configPath = foundPath;
    }

    const content = await readFile(configPath, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = parse(content);
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML in configuration file', e as Error);
    }

    if (!rawConfig || typeof rawConfig !== 'object') {
      throw new ConfigLoadError('Configuration file is empty or invalid');
    }

    const tasks = this.validateAndParse(rawConfig);

    return {
      configPath,
      rootDir: dirname(configPath),
      tasks,
    };
  }

  validate(raw: unknown): void {
    const result = configSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }
  }

  private validateAndParse(raw: unknown): Record<string, TaskDefinition> {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }

    this.validateDependencies(result.data.tasks);

    return result.data.tasks;
  }

  /**
   * dependsOn может ссылаться только на объявленные задачи.
   * Циклы длиннее одного шага проверяет реестр.
   */
  private validateDependencies(tasks: Record<string, TaskDefinition>): void {
    const issues: Array<{ message: string; path: string[] }> = [];

    for (const [name, task] of Object.entries(tasks)) {
      for (const dependency of task.dependsOn) {
        if (dependency === name) {
          issues.push({
            message: `Task "${name}" depends on itself`,
            path: ['tasks', name, 'dependsOn'],
          });
        } else if (!Object.hasOwn(tasks, dependency)) {
          issues.push({
            message: `Task "${name}" depends on unknown task "${dependency}"`,
            path: ['tasks', name, 'dependsOn'],
          });
        }
      }
    }

    if (issues.length > 0) {
      throw new ConfigValidationError(issues);
    }
  }
}

export const configService = new ConfigServiceImpl();
