/** Имя файла конфигурации, который ищется вверх от рабочей директории */
export const CONFIG_FILE_NAME = 'flexrun.config.yml';

export interface TaskDefinition {
  description?: string;
  /** Shell command lines, executed in order */
  commands: string[];
  /** Tasks that must run before this one */
  dependsOn: string[];
  /** Files relative to rootDir that must exist before the first command */
  inputs: string[];
  /** Files relative to rootDir the task must have produced */
  outputs: string[];
}

export interface Config {
  /** Absolute path of the loaded config file */
  configPath: string;
  /** Directory of the config file; commands run here */
  rootDir: string;
  tasks: Record<string, TaskDefinition>;
}

export interface ConfigService {
  load(path?: string): Promise<Config>;
  validate(raw: unknown): void;
  createDefault(dir?: string): Promise<{ created: boolean; message: string }>;
}
