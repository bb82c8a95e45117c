import { spawn } from 'node:child_process';
import { constants } from 'node:os';
import type { CommandExecutor, CommandOptions, CommandResult } from './types.js';

/**
 * Код выхода, который шелл сообщает для процесса, убитого сигналом.
 */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

/**
 * Exit code when the shell itself cannot be started ("command not found").
 */
const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Runs command lines through the system shell with inherited stdio.
 * The child owns the terminal until it exits; signals are not intercepted.
 */
export class ShellExecutor implements CommandExecutor {
  execute(command: string, options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise((resolve) => {
      const child = spawn(command, {
        cwd: options.cwd,
        shell: true,
        stdio: 'inherit',
      });

      // 'error' and 'close' can both fire for a failed spawn
      let settled = false;

      child.on('error', (error) => {
        if (settled) return;
        settled = true;
        resolve({
          command,
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          signal: null,
          duration: Date.now() - startTime,
          error,
        });
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        resolve({
          command,
          exitCode: signal ? exitCodeForSignal(signal) : (code ?? 0),
          signal,
          duration: Date.now() - startTime,
        });
      });
    });
  }
}
