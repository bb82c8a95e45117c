#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { listCommand, type ListCommandOptions } from './commands/list.js';
import { graphCommand, type GraphCommandOptions } from './commands/graph.js';
import { initCommand, type InitCommandOptions } from './commands/init.js';
import { createServices } from './services.js';
import { describeError, exitCodeFor } from './errors.js';
import { configService } from '../config/index.js';

type GlobalOptions = {
  config?: string;
};

/**
 * Prints the error and exits with the failing command's code (or 1).
 */
function fail(error: unknown): never {
  console.error(describeError(error));
  process.exit(exitCodeFor(error));
}

/**
 * Builds the commander program. Services are created per action, so `init` works without a config.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('flexrun')
    .description('Task runner for the Demand Flexibility Service dashboard')
    .version('1.0.0')
    .option('-c, --config <path>', 'Путь к flexrun.config.yml');

  const globalOptions = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('run <task>')
    .description('Выполнить задачу (сначала её зависимости)')
    .option('-n, --dry-run', 'Показать команды без выполнения')
    .option('--no-deps', 'Не выполнять зависимости задачи')
    .action(async (task: string, options: { dryRun?: boolean; deps?: boolean }) => {
      try {
        const services = await createServices(globalOptions().config);
        const report = await runCommand({ ...options, task }, services);
        if (report.dryRun) {
          console.log(`✓ План задачи ${task}: ${report.tasks.map((t) => t.task).join(' → ')}`);
        } else {
          console.log(`✓ Задача ${task} выполнена`);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('list')
    .description('Показать список задач')
    .option('--json', 'Вывод в формате JSON')
    .action(async (options: ListCommandOptions) => {
      try {
        const services = await createServices(globalOptions().config);
        listCommand(options, services);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('graph [task]')
    .description('Показать дерево зависимостей')
    .option('--json', 'Вывод в формате JSON')
    .action(async (task: string | undefined, options: Omit<GraphCommandOptions, 'task'>) => {
      try {
        const services = await createServices(globalOptions().config);
        graphCommand({ ...options, task }, services);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('init')
    .description('Создать flexrun.config.yml с задачами по умолчанию')
    .option('--dir <path>', 'Директория проекта')
    .action(async (options: InitCommandOptions) => {
      try {
        console.log(`✓ ${await initCommand(options, configService)}`);
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

/**
 * True when this file is the process entry, directly or through the npm bin symlink.
 */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry || !existsSync(entry)) {
    return false;
  }
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error('Критическая ошибка:', error);
    process.exit(1);
  });
}
