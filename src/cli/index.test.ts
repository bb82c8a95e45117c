import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, existsSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createProgram } from './index.js';

const configContent = `
tasks:
  setup:
    commands:
      - touch installed
      - touch hook
  broken:
    commands:
      - exit 7
      - touch after-broken
`;

describe('flexrun CLI', () => {
  let tempDir: string;
  let configPath: string;
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'flexrun-cli-'));
    configPath = join(tempDir, 'flexrun.config.yml');
    writeFileSync(configPath, configContent);
    logs = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((msg) => logs.push(String(msg)));
    vi.spyOn(console, 'error').mockImplementation((msg) => errors.push(String(msg)));
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  const run = (...args: string[]): Promise<unknown> =>
    createProgram().parseAsync(['node', 'flexrun', '--config', configPath, ...args]);

  it('должен выполнить задачу и сообщить об успехе', async () => {
    await run('run', 'setup');

    expect(existsSync(join(tempDir, 'installed'))).toBe(true);
    expect(existsSync(join(tempDir, 'hook'))).toBe(true);
    expect(logs).toEqual(['▶ setup', '$ touch installed', '$ touch hook', '✓ Задача setup выполнена']);
  });

  it('должен завершиться с кодом 1 для неизвестной задачи', async () => {
    await expect(run('run', 'deploy')).rejects.toThrow('process.exit(1)');

    expect(errors).toEqual(['No such task: "deploy". Available tasks: setup, broken']);
    expect(existsSync(join(tempDir, 'installed'))).toBe(false);
  });

  it('должен завершиться с кодом упавшей команды', async () => {
    await expect(run('run', 'broken')).rejects.toThrow('process.exit(7)');

    expect(errors).toEqual(['Task "broken": "exit 7" exited with code 7']);
    expect(existsSync(join(tempDir, 'after-broken'))).toBe(false);
  });

  it('должен показать план без выполнения с --dry-run', async () => {
    await run('run', 'setup', '--dry-run');

    expect(existsSync(join(tempDir, 'installed'))).toBe(false);
    expect(logs[logs.length - 1]).toBe('✓ План задачи setup: setup');
  });

  it('должен завершиться с кодом 1, если конфиг не найден', async () => {
    rmSync(configPath);

    await expect(run('list')).rejects.toThrow('process.exit(1)');
    expect(errors[0]).toContain('Configuration file not found (flexrun.config.yml)');
  });

  it('должен создать конфиг командой init', async () => {
    rmSync(configPath);

    await run('init', '--dir', tempDir);

    expect(logs).toEqual(['✓ Создан flexrun.config.yml']);
    expect(readFileSync(configPath, 'utf8')).toContain('poetry install');
  });
});
