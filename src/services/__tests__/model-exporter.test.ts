/**
 * model-exporter.test.ts
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ModelExporter } from '../model-exporter.js';
import type { Playbook, RepositoryModel, RepositoryModelStats } from '../../models/repository-model.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'playbook-graph-export-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const STATS: RepositoryModelStats = { groups: 1, hosts: 1, playbooks: 0, plays: 0, tasks: 0, roles: 1 };

function makeModel(): RepositoryModel {
  return {
    groups: new Map([['web', ['web1']]]),
    playbooks: new Map<string, Playbook>(),
    roles: new Set(['nginx']),
    roleTasks: new Map([['nginx', []]]),
    roleDependencies: new Map([['nginx', []]]),
  };
}

describe('ModelExporter', () => {
  describe('toJson', () => {
    it('sorts object keys and Map keys, keeps Set order', () => {
      const value = {
        zeta: 1,
        alpha: new Map<string, unknown>([
          ['b', true],
          ['a', { y: 2, x: 1 }],
        ]),
        order: new Set(['second', 'first']),
      };
      expect(ModelExporter.toJson(value)).toBe(
        [
          '{',
          '  "alpha": {',
          '    "a": {',
          '      "x": 1,',
          '      "y": 2',
          '    },',
          '    "b": true',
          '  },',
          '  "order": [',
          '    "second",',
          '    "first"',
          '  ],',
          '  "zeta": 1',
          '}',
        ].join('\n'),
      );
    });

    it('produces identical text for equal models', () => {
      expect(ModelExporter.toJson(makeModel())).toBe(ModelExporter.toJson(makeModel()));
    });
  });

  describe('writeDiagram', () => {
    it('creates parent directories and ends the file with a newline', () => {
      const out = path.join(tmpDir, 'out', 'repo', 'diagram.mmd');
      ModelExporter.writeDiagram('graph LR', out);
      expect(fs.readFileSync(out, 'utf-8')).toBe('graph LR\n');
    });
  });

  describe('writeDebugArtifacts', () => {
    it('writes model, stats, diagnostics and diagram files', () => {
      const outDir = path.join(tmpDir, 'json');
      ModelExporter.writeDebugArtifacts(
        makeModel(),
        STATS,
        [{ level: 'warn', message: 'Role tasks not found', context: { role: 'x' } }],
        'graph LR',
        outDir,
      );

      expect(fs.readdirSync(outDir).sort()).toEqual([
        'diagnostics.json',
        'diagram.mmd',
        'model.json',
        'stats.json',
      ]);

      const model: unknown = JSON.parse(fs.readFileSync(path.join(outDir, 'model.json'), 'utf-8'));
      expect(model).toEqual({
        groups: { web: ['web1'] },
        playbooks: {},
        roleDependencies: { nginx: [] },
        roleTasks: { nginx: [] },
        roles: ['nginx'],
      });

      const stats: unknown = JSON.parse(fs.readFileSync(path.join(outDir, 'stats.json'), 'utf-8'));
      expect(stats).toEqual(STATS);

      const diagnostics: unknown = JSON.parse(
        fs.readFileSync(path.join(outDir, 'diagnostics.json'), 'utf-8'),
      );
      expect(diagnostics).toEqual([
        { context: { role: 'x' }, level: 'warn', message: 'Role tasks not found' },
      ]);
      expect(fs.readFileSync(path.join(outDir, 'diagram.mmd'), 'utf-8')).toBe('graph LR\n');
    });
  });
});
