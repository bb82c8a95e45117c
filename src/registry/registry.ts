import type { TaskDefinition } from '../config/types.js';
import { isValidTaskName } from '../utils/validation.js';
import { CircularDependencyError, UnknownTaskError } from './errors.js';
import type { Task } from './types.js';

type DependencyGraph = Map<string, string[]>;

/**
 * Реестр задач, ключ — имя задачи.
 */
export interface TaskRegistry {
  /**
   * Имена задач в порядке объявления в конфиге.
   */
  names(): string[];

  has(name: string): boolean;

  /**
   * @throws {UnknownTaskError} если задача не объявлена
   */
  get(name: string): Task;

  /**
   * Строит план выполнения: сначала зависимости (в глубину, в порядке
   * объявления), каждая задача не более одного раза, цель последней.
   * @throws {UnknownTaskError} если задача не объявлена
   */
  plan(name: string): Task[];
}

/**
 * DFS для обнаружения циклов.
 * Возвращает путь цикла если найден, иначе undefined.
 */
function detectCycle(
  name: string,
  graph: DependencyGraph,
  visiting: Set<string>,
  visited: Set<string>,
  path: string[],
): string[] | undefined {
  path.push(name);
  visiting.add(name);

  for (const dep of graph.get(name) ?? []) {
    if (visited.has(dep)) {
      continue;
    }
    if (visiting.has(dep)) {
      const cycleStart = path.indexOf(dep);
      return [...path.slice(cycleStart), dep];
    }
    const cycle = detectCycle(dep, graph, visiting, visited, path);
    if (cycle) {
      return cycle;
    }
  }

  visiting.delete(name);
  visited.add(name);
  path.pop();

  return undefined;
}

/**
 * @throws {CircularDependencyError} при обнаружении цикла
 */
function checkCircularDependencies(graph: DependencyGraph): void {
  const visiting = new Set<string>();
  const visited = new Set<string>();

  for (const name of graph.keys()) {
    if (visited.has(name)) {
      continue;
    }
    const cycle = detectCycle(name, graph, visiting, visited, []);
    if (cycle) {
      throw new CircularDependencyError(
        `Circular task dependency: ${cycle.join(' -> ')}`,
        cycle,
      );
    }
  }
}

class TaskRegistryImpl implements TaskRegistry {
  private readonly tasks: Map<string, Task>;

  constructor(definitions: Record<string, TaskDefinition>) {
    this.tasks = new Map(
      Object.entries(definitions).map(([name, definition]) => [name, { name, ...definition }]),
    );

    const graph: DependencyGraph = new Map(
      [...this.tasks.values()].map((task) => [task.name, task.dependsOn]),
    );
    checkCircularDependencies(graph);
  }

  names(): string[] {
    return [...this.tasks.keys()];
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get(name: string): Task {
    const task = this.tasks.get(name);
    if (!task) {
      const hint = isValidTaskName(name) ? undefined : 'not a valid task name';
      throw new UnknownTaskError(name, this.names(), hint);
    }
    return task;
  }

  plan(name: string): Task[] {
    const ordered: Task[] = [];
    const seen = new Set<string>();

    const visit = (task: Task): void => {
      if (seen.has(task.name)) {
        return;
      }
      seen.add(task.name);
      for (const dep of task.dependsOn) {
        visit(this.get(dep));
      }
      ordered.push(task);
    };

    visit(this.get(name));
    return ordered;
  }
}

/**
 * Создаёт реестр из определений задач конфига.
 * @throws {CircularDependencyError} если зависимости образуют цикл
 */
export function createTaskRegistry(definitions: Record<string, TaskDefinition>): TaskRegistry {
  return new TaskRegistryImpl(definitions);
}
