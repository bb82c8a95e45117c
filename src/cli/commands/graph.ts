import type { Services } from '../services.js';
import { buildTree, formatTree, treeToJson } from '../tree.js';

export interface GraphCommandOptions {
  task?: string;
  json?: boolean;
}

/**
 * Main implementation of the graph command.
 * Shows the dependency tree of one task, or of every task when none is given.
 */
export function graphCommand(options: GraphCommandOptions, services: Services): void {
  const roots = options.task ? [options.task] : services.registry.names();
  const tree = buildTree(services.registry, roots);

  if (options.json) {
    console.log(JSON.stringify(treeToJson(tree), null, 2));
    return;
  }

  console.log(formatTree(tree));
}
