/**
 * role-resolver.test.ts
 *
 * Tests for RoleResolver covering:
 *   1. Conventional lookup of tasks/main and meta/main (.yml before .yaml)
 *   2. roles directories at any depth, hidden directories skipped
 *   3. Dependency entries as strings and mappings
 *   4. Transitive closure, including cycles and role references inside
 *      resolved task trees
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { RoleResolver } from '../role-resolver.js';
import { FileService } from '../../../services/file-service.js';
import { CollectingLogger, SilentLogger } from '../../../services/logger.js';
import { LookupCache } from '../../../services/lookup-cache.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'playbook-graph-roles-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeFile(relPath: string, text: string): string {
  const abs = path.join(tmpDir, relPath);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, text, 'utf-8');
  return abs;
}

function writeRole(name: string, tasks: string[], deps?: string[]): void {
  writeFile(
    `roles/${name}/tasks/main.yml`,
    tasks.map((t) => `- name: ${t}\n`).join(''),
  );
  if (deps !== undefined) {
    const body = deps.length > 0 ? deps.map((d) => `  - ${d}\n`).join('') : '  []\n';
    writeFile(`roles/${name}/meta/main.yml`, `dependencies:\n${body}`);
  }
}

function makeResolver(): { resolver: RoleResolver; logger: CollectingLogger } {
  const logger = new CollectingLogger();
  return { resolver: new RoleResolver(new FileService(tmpDir), logger), logger };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('RoleResolver', () => {
  describe('candidate paths', () => {
    it('lists .yml candidates before .yaml candidates', () => {
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      fs.mkdirSync(path.join(tmpDir, 'site', 'roles'), { recursive: true });
      const { resolver } = makeResolver();

      expect(resolver.candidatePaths('web', 'tasks')).toEqual([
        path.join(tmpDir, 'roles', 'web', 'tasks', 'main.yml'),
        path.join(tmpDir, 'site', 'roles', 'web', 'tasks', 'main.yml'),
        path.join(tmpDir, 'roles', 'web', 'tasks', 'main.yaml'),
        path.join(tmpDir, 'site', 'roles', 'web', 'tasks', 'main.yaml'),
      ]);
    });

    it('skips roles directories under hidden directories', () => {
      fs.mkdirSync(path.join(tmpDir, '.cache', 'roles'), { recursive: true });
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      const { resolver } = makeResolver();
      expect(resolver.rolesDirectories()).toEqual([path.join(tmpDir, 'roles')]);
    });

    it('scans the working copy once per cache', () => {
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      const cache = new LookupCache();
      const resolver = new RoleResolver(new FileService(tmpDir), undefined, cache);

      resolver.rolesDirectories();
      fs.mkdirSync(path.join(tmpDir, 'more', 'roles'), { recursive: true });
      expect(resolver.rolesDirectories()).toEqual([path.join(tmpDir, 'roles')]);
      expect(cache.size).toBe(1);
    });

    it('reports the cached lookups when a closure finishes', () => {
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      const logger = new CollectingLogger(new SilentLogger(), 'debug');
      const resolver = new RoleResolver(new FileService(tmpDir), logger);

      resolver.resolveClosure(['ghost']);
      const summary = logger.diagnostics.find((d) => d.message === 'Role closure resolved');
      expect(summary?.context).toEqual({ roles: 1, cachedLookups: 1 });
    });
  });

  describe('findRoleTasks', () => {
    it('reads tasks/main.yml', () => {
      writeRole('nginx', ['Install nginx', 'Start nginx']);
      const { resolver } = makeResolver();
      expect(resolver.findRoleTasks('nginx').map((t) => t.name)).toEqual([
        'Install nginx',
        'Start nginx',
      ]);
    });

    it('reads tasks/main.yaml', () => {
      writeFile('roles/db/tasks/main.yaml', '- name: Install db\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleTasks('db').map((t) => t.name)).toEqual(['Install db']);
    });

    it('prefers main.yml over main.yaml', () => {
      writeFile('roles/db/tasks/main.yml', '- name: From yml\n');
      writeFile('roles/db/tasks/main.yaml', '- name: From yaml\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleTasks('db').map((t) => t.name)).toEqual(['From yml']);
    });

    it('finds roles in a nested roles directory', () => {
      writeFile('ansible/roles/app/tasks/main.yml', '- name: Deploy\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleTasks('app').map((t) => t.name)).toEqual(['Deploy']);
    });

    it('skips an empty task file and uses the next candidate', () => {
      writeFile('roles/app/tasks/main.yml', '');
      writeFile('roles/app/tasks/main.yaml', '- name: Fallback\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleTasks('app').map((t) => t.name)).toEqual(['Fallback']);
    });

    it('resolves role task includes relative to the role task file', () => {
      writeFile('roles/app/tasks/main.yml', '- include_tasks: install.yml\n');
      writeFile('roles/app/tasks/install.yml', '- name: Install app\n');
      const { resolver } = makeResolver();

      const [include] = resolver.findRoleTasks('app');
      if (include?.kind !== 'Include') throw new Error('expected an Include');
      expect(include.included.map((t) => t.name)).toEqual(['Install app']);
    });

    it('returns [] and warns when the role has no tasks', () => {
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      const { resolver, logger } = makeResolver();
      expect(resolver.findRoleTasks('ghost')).toEqual([]);
      expect(logger.diagnostics).toEqual([
        { level: 'warn', message: 'Role tasks not found', context: { role: 'ghost' } },
      ]);
    });
  });

  describe('findRoleDependencies', () => {
    it('reads string and mapping dependency entries', () => {
      writeFile(
        'roles/app/meta/main.yml',
        ['dependencies:', '  - common', '  - role: nginx', '    vars:', '      port: 80', '  - name: ufw', ''].join('\n'),
      );
      const { resolver } = makeResolver();
      expect(resolver.findRoleDependencies('app')).toEqual(['common', 'nginx', 'ufw']);
    });

    it('returns [] when meta has no dependencies key', () => {
      writeFile('roles/app/meta/main.yml', 'galaxy_info:\n  author: ops\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleDependencies('app')).toEqual([]);
    });

    it('returns [] when there is no meta file', () => {
      writeRole('app', ['Run']);
      const { resolver, logger } = makeResolver();
      expect(resolver.findRoleDependencies('app')).toEqual([]);
      expect(logger.diagnostics).toEqual([]);
    });

    it('reads meta/main.yaml', () => {
      writeFile('roles/app/meta/main.yaml', 'dependencies:\n  - common\n');
      const { resolver } = makeResolver();
      expect(resolver.findRoleDependencies('app')).toEqual(['common']);
    });

    it('warns about a malformed meta file and keeps looking', () => {
      writeFile('roles/app/meta/main.yml', 'dependencies: [common\n');
      writeFile('roles/app/meta/main.yaml', 'dependencies:\n  - base\n');
      const { resolver, logger } = makeResolver();
      expect(resolver.findRoleDependencies('app')).toEqual(['base']);
      expect(logger.diagnostics.map((d) => d.message)).toEqual(['Could not load role meta']);
    });
  });

  describe('resolveClosure', () => {
    it('follows a dependency chain', () => {
      writeRole('x', ['X task'], ['y']);
      writeRole('y', ['Y task'], ['z']);
      writeRole('z', ['Z task'], []);
      const { resolver } = makeResolver();

      const result = resolver.resolveClosure(['x']);
      expect([...result.roles]).toEqual(['x', 'y', 'z']);
      expect(result.tasks.get('z')?.map((t) => t.name)).toEqual(['Z task']);
      expect([...result.dependencies.entries()]).toEqual([
        ['x', ['y']],
        ['y', ['z']],
        ['z', []],
      ]);
    });

    it('resolves single-letter role names literally', () => {
      writeRole('X', ['X task'], ['Y']);
      writeRole('Y', ['Y task'], ['Z']);
      writeRole('Z', ['Z task'], []);
      const { resolver, logger } = makeResolver();

      const result = resolver.resolveClosure(['X']);
      expect([...result.roles]).toEqual(['X', 'Y', 'Z']);
      expect(result.tasks.get('Y')?.map((t) => t.name)).toEqual(['Y task']);
      expect(logger.diagnostics).toEqual([]);
    });

    it('processes each role of a cycle once', () => {
      writeRole('x', ['X task'], ['y']);
      writeRole('y', ['Y task'], ['x']);
      const { resolver } = makeResolver();
      const findTasks = vi.spyOn(resolver, 'findRoleTasks');

      const result = resolver.resolveClosure(['x']);
      expect([...result.roles]).toEqual(['x', 'y']);
      expect(findTasks).toHaveBeenCalledTimes(2);
      expect(result.dependencies.get('y')).toEqual(['x']);
    });

    it('adds roles referenced from resolved role tasks', () => {
      writeFile('roles/site/tasks/main.yml', '- include_role:\n    name: helper\n');
      writeRole('helper', ['Help']);
      const { resolver } = makeResolver();

      const result = resolver.resolveClosure(['site']);
      expect([...result.roles]).toEqual(['site', 'helper']);
      expect(result.tasks.get('helper')?.map((t) => t.name)).toEqual(['Help']);
    });

    it('keeps roles without files with empty entries', () => {
      fs.mkdirSync(path.join(tmpDir, 'roles'));
      const { resolver, logger } = makeResolver();

      const result = resolver.resolveClosure(['ghost']);
      expect([...result.roles]).toEqual(['ghost']);
      expect(result.tasks.get('ghost')).toEqual([]);
      expect(result.dependencies.get('ghost')).toEqual([]);
      expect(logger.diagnostics.map((d) => d.message)).toEqual(['Role tasks not found']);
    });

    it('returns an empty resolution for no roles', () => {
      const { resolver } = makeResolver();
      const result = resolver.resolveClosure([]);
      expect(result.roles.size).toBe(0);
      expect(result.tasks.size).toBe(0);
      expect(result.dependencies.size).toBe(0);
    });
  });
});
