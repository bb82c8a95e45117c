import { describe, it, expect } from 'vitest';
import type { TaskDefinition } from '../config/types.js';
import { createTaskRegistry, CircularDependencyError, UnknownTaskError } from './index.js';

const task = (commands: string[], dependsOn: string[] = []): TaskDefinition => ({
  commands,
  dependsOn,
  inputs: [],
  outputs: [],
});

const defaultTasks: Record<string, TaskDefinition> = {
  setup: task(['poetry install', 'poetry run pre-commit install']),
  'dfs-app': task(['poetry run streamlit run app.py']),
  requirements: task(['poetry export -f requirements.txt --output requirements.txt']),
};

describe('TaskRegistry', () => {
  describe('names()', () => {
    it('должен возвращать имена в порядке объявления', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(registry.names()).toEqual(['setup', 'dfs-app', 'requirements']);
    });
  });

  describe('get()', () => {
    it('должен возвращать задачу с именем и командами', () => {
      const registry = createTaskRegistry(defaultTasks);

      const setup = registry.get('setup');

      expect(setup.name).toBe('setup');
      expect(setup.commands).toEqual(['poetry install', 'poetry run pre-commit install']);
    });

    it('должен выбросить UnknownTaskError для необъявленной задачи', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(() => registry.get('deploy')).toThrow(UnknownTaskError);
      expect(() => registry.get('deploy')).toThrow(
        'No such task: "deploy". Available tasks: setup, dfs-app, requirements',
      );
    });

    it('должен подсказывать, что имя невалидно', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(() => registry.get('Dfs_App')).toThrow(
        'No such task: "Dfs_App" (not a valid task name). Available tasks: setup, dfs-app, requirements',
      );
    });

    it('должен сохранять имя задачи и список доступных в ошибке', () => {
      const registry = createTaskRegistry(defaultTasks);

      try {
        registry.get('deploy');
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(UnknownTaskError);
        expect(e).toMatchObject({
          taskName: 'deploy',
          available: ['setup', 'dfs-app', 'requirements'],
        });
      }
    });
  });

  describe('has()', () => {
    it('должен сообщать о наличии задачи', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(registry.has('requirements')).toBe(true);
      expect(registry.has('lint')).toBe(false);
    });
  });

  describe('plan()', () => {
    it('должен возвращать только цель, если зависимостей нет', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(registry.plan('dfs-app').map((t) => t.name)).toEqual(['dfs-app']);
    });

    it('должен ставить зависимости перед зависимой задачей', () => {
      const registry = createTaskRegistry({
        ...defaultTasks,
        'dfs-app': task(['poetry run streamlit run app.py'], ['setup']),
      });

      expect(registry.plan('dfs-app').map((t) => t.name)).toEqual(['setup', 'dfs-app']);
    });

    it('должен включать общую зависимость один раз', () => {
      const registry = createTaskRegistry({
        setup: task(['poetry install']),
        requirements: task(['poetry export'], ['setup']),
        'dfs-app': task(['streamlit run app.py'], ['setup']),
        all: task([], ['requirements', 'dfs-app']),
      });

      expect(registry.plan('all').map((t) => t.name)).toEqual([
        'setup',
        'requirements',
        'dfs-app',
        'all',
      ]);
    });

    it('должен обходить транзитивные зависимости в глубину', () => {
      const registry = createTaskRegistry({
        c: task(['echo c']),
        b: task(['echo b'], ['c']),
        a: task(['echo a'], ['b']),
      });

      expect(registry.plan('a').map((t) => t.name)).toEqual(['c', 'b', 'a']);
    });

    it('должен выбросить UnknownTaskError для необъявленной цели', () => {
      const registry = createTaskRegistry(defaultTasks);

      expect(() => registry.plan('deploy')).toThrow(UnknownTaskError);
    });

    it('должен выбросить UnknownTaskError для зависимости с именем свойства Object.prototype', () => {
      const registry = createTaskRegistry({ setup: task(['ls'], ['constructor']) });

      expect(registry.has('constructor')).toBe(false);
      expect(() => registry.plan('setup')).toThrow(
        'No such task: "constructor". Available tasks: setup',
      );
    });
  });

  describe('циклические зависимости', () => {
    it('должен отклонять цикл из двух задач', () => {
      expect(() =>
        createTaskRegistry({
          a: task(['echo a'], ['b']),
          b: task(['echo b'], ['a']),
        }),
      ).toThrow('Circular task dependency: a -> b -> a');
    });

    it('должен отклонять самозависимость', () => {
      expect(() => createTaskRegistry({ a: task(['echo a'], ['a']) })).toThrow(
        CircularDependencyError,
      );
    });

    it('должен сохранять путь цикла', () => {
      try {
        createTaskRegistry({
          a: task(['echo a'], ['b']),
          b: task(['echo b'], ['c']),
          c: task(['echo c'], ['b']),
        });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(CircularDependencyError);
        expect((e as CircularDependencyError).cycle).toEqual(['b', 'c', 'b']);
      }
    });

    it('должен принимать ромбовидный граф без цикла', () => {
      expect(() =>
        createTaskRegistry({
          base: task(['echo base']),
          left: task(['echo left'], ['base']),
          right: task(['echo right'], ['base']),
          top: task(['echo top'], ['left', 'right']),
        }),
      ).not.toThrow();
    });
  });
});
