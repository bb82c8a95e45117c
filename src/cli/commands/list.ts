import type { Services } from '../services.js';

export interface ListCommandOptions {
  json?: boolean;
}

/**
 * Main implementation of the list command.
 */
export function listCommand(options: ListCommandOptions, services: Services): void {
  const tasks = services.registry.names().map((name) => services.registry.get(name));

  if (options.json) {
    const result = tasks.map((task) => ({
      name: task.name,
      description: task.description ?? null,
      commands: task.commands,
      dependsOn: task.dependsOn,
      inputs: task.inputs,
      outputs: task.outputs,
    }));
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (tasks.length === 0) {
    console.log('Нет задач');
    return;
  }

  const nameWidth = Math.max('TASK'.length, ...tasks.map((t) => t.name.length));
  const countWidth = 'COMMANDS'.length;

  console.log(`${'TASK'.padEnd(nameWidth)}  ${'COMMANDS'.padEnd(countWidth)}  DESCRIPTION`);

  for (const task of tasks) {
    const description = (task.description ?? '-').replace(/[\n\r\t]+/g, ' ');
    const count = String(task.commands.length).padEnd(countWidth);
    console.log(`${task.name.padEnd(nameWidth)}  ${count}  ${description}`);
  }
}
