import type { TaskRegistry } from '../registry/registry.js';

/**
 * Tree node representation.
 * Children are the task's dependencies, in declaration order.
 */
export interface TreeNode {
  task: { name: string; description?: string; commands: number };
  children: TreeNode[];
}

/**
 * Builds dependency trees rooted at the given tasks (all tasks by default).
 * A dependency shared by several tasks appears under each of them.
 *
 * @throws {UnknownTaskError} if a root is not declared
 */
export function buildTree(registry: TaskRegistry, roots: string[] = registry.names()): TreeNode[] {
  const build = (name: string): TreeNode => {
    const task = registry.get(name);
    return {
      task: { name: task.name, description: task.description, commands: task.commands.length },
      children: task.dependsOn.map(build),
    };
  };

  return roots.map(build);
}

/**
 * Formats a tree structure as text with box-drawing characters.
 *
 * @param nodes - Tree nodes to format
 * @param prefix - Current line prefix (for recursion)
 */
export function formatTree(nodes: TreeNode[], prefix = ''): string {
  const lines: string[] = [];

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    const isLastChild = i === nodes.length - 1;

    const connector = isLastChild ? '└──' : '├──';
    const childPrefix = prefix + (isLastChild ? '   ' : '│  ');

    // Format: name (N commands)  description
    let line = `${prefix}${connector}${node.task.name} (${node.task.commands})`;
    if (node.task.description) {
      line += `  ${node.task.description}`;
    }
    lines.push(line);

    if (node.children.length > 0) {
      lines.push(formatTree(node.children, childPrefix));
    }
  }

  return lines.join('\n');
}

/**
 * Converts tree nodes to minimal JSON schema (name, description, commands, dependencies).
 */
export function treeToJson(nodes: TreeNode[]): Array<Record<string, unknown>> {
  return nodes.map((node) => ({
    name: node.task.name,
    description: node.task.description ?? null,
    commands: node.task.commands,
    dependencies: treeToJson(node.children),
  }));
}
