import type { ConfigService } from '../../config/types.js';

export interface InitCommandOptions {
  dir?: string;
}

/**
 * Main implementation of the init command.
 */
export async function initCommand(
  options: InitCommandOptions,
  config: ConfigService,
): Promise<string> {
  const result = await config.createDefault(options.dir ?? process.cwd());
  return result.message;
}
