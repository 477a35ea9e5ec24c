import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { changeset, defineModel } from '@trailkeep/protocol';
import { createInMemoryRepositoryContext } from '@trailkeep/repositories';
import { DuplicateStepError, UnknownStepError } from '../errors.js';
import { createCapturingLogger } from '../logger.js';
import { Multi } from './multi.js';
import { transact } from './transact.js';

const Company = defineModel({
  name: 'SimpleCompany',
  table: 'simple_companies',
  schema: z.object({ name: z.string().min(1), city: z.string().nullable().optional() }),
});

describe('Multi', () => {
  describe('building', () => {
    it('lists steps in the order they were added', () => {
      const multi = Multi.new()
        .run('first', () => 1)
        .runInternal('hidden', () => 2)
        .error('third', 'nope');

      expect(multi.toList()).toEqual([
        { name: 'first', kind: 'run', internal: false },
        { name: 'hidden', kind: 'run', internal: true },
        { name: 'third', kind: 'error', internal: false },
      ]);
    });

    it('rejects duplicate step names', () => {
      const multi = Multi.new().run('company', () => 1);
      expect(() => multi.run('company', () => 2)).toThrow(DuplicateStepError);
      expect(() => multi.run('company', () => 2)).toThrow(
        'Step "company" is already part of this operation'
      );
    });

    it('is immutable', () => {
      const base = Multi.new().run('a', () => 1);
      base.run('b', () => 2);
      expect(base.toList().map((s) => s.name)).toEqual(['a']);
    });

    it('appends and prepends other plans', () => {
      const middle = Multi.new().run('b', () => 2);
      const multi = middle.prepend(Multi.new().run('a', () => 1)).append(Multi.new().run('c', () => 3));
      expect(multi.toList().map((s) => s.name)).toEqual(['a', 'b', 'c']);
    });

    it('rejects duplicates across appended plans', () => {
      const a = Multi.new().run('same', () => 1);
      const b = Multi.new().run('same', () => 2);
      expect(() => a.append(b)).toThrow(DuplicateStepError);
    });

    it('names merge steps by position', () => {
      const multi = Multi.new()
        .merge(() => Multi.new())
        .merge(() => Multi.new());
      expect(multi.toList().map((s) => s.name)).toEqual(['merge:1', 'merge:2']);
    });

    it('keeps internal and merge names private to the plan that declared them', () => {
      const plan = (key: string) =>
        Multi.new()
          .runInternal('rows', () => key)
          .merge(() => Multi.new());

      const multi = plan('a').append(plan('b')).prepend(plan('c'));

      expect(multi.toList().map((s) => s.name)).toEqual([
        'rows',
        'merge:1',
        'rows',
        'merge:1',
        'rows',
        'merge:1',
      ]);
      expect(multi.has('rows')).toBe(true);
      expect(plan('a').append(Multi.new().run('x', () => 1)).has('x')).toBe(true);
    });

    it('rejects internal names that clash with public ones', () => {
      const withPublic = Multi.new().run('rows', () => 1);
      expect(() => withPublic.runInternal('rows', () => 2)).toThrow(DuplicateStepError);
      expect(() => withPublic.append(Multi.new().runInternal('rows', () => 2))).toThrow(
        DuplicateStepError
      );
      expect(() => Multi.new().runInternal('rows', () => 1).run('rows', () => 2)).toThrow(
        DuplicateStepError
      );
    });
  });

  describe('transact', () => {
    it('runs steps in order, each seeing earlier results', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .run('a', () => 2)
        .run('b', (_repos, results) => results.a + 3)
        .run('c', async (_repos, results) => results.a * results.b);

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: true, data: { a: 2, b: 5, c: 10 } });
    });

    it('strips internal steps from the data', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .runInternal('secret', () => 'hidden')
        .run('visible', (_repos, results) => results.secret.length);

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: true, data: { visible: 6 } });
    });

    it('returns a single step with returnOperation', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .run('a', () => 1)
        .run('b', () => 'two');

      const result = await transact(repos, multi, { returnOperation: 'b' });

      expect(result).toEqual({ success: true, data: 'two' });
    });

    it('throws for an unknown returnOperation and rolls back', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new().insert('company', changeset(Company, {}, { name: 'Acme LLC' }));

      await expect(transact(repos, multi, { returnOperation: 'missing' })).rejects.toThrow(
        UnknownStepError
      );
      expect(await repos.records.count('simple_companies')).toBe(0);
    });

    it('reports the failing step with its error and the completed steps', async () => {
      const repos = createInMemoryRepositoryContext();
      const boom = new Error('boom');
      const multi = Multi.new()
        .run('a', () => 1)
        .run('b', () => {
          throw boom;
        })
        .run('c', () => 3);

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: false, failedStep: 'b', error: boom, completed: { a: 1 } });
    });

    it('fails error steps with their value', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .run('a', () => 1)
        .error('b', { reason: 'not allowed' });

      const result = await transact(repos, multi);

      expect(result).toEqual({
        success: false,
        failedStep: 'b',
        error: { reason: 'not allowed' },
        completed: { a: 1 },
      });
    });

    it('rolls back every write when a later step fails', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .insert('company', changeset(Company, {}, { name: 'Acme LLC' }))
        .run('fail', () => {
          throw new Error('later failure');
        });

      const result = await transact(repos, multi);

      expect(result.success).toBe(false);
      expect(await repos.records.count('simple_companies')).toBe(0);
    });

    it('fails invalid changesets without opening a transaction', async () => {
      const repos = createInMemoryRepositoryContext();
      const transaction = vi.spyOn(repos, 'transaction');
      const invalid = changeset(Company, {}, { city: 'Greenwich' });
      const multi = Multi.new()
        .run('a', () => 1)
        .insert('company', invalid);

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: false, failedStep: 'company', error: invalid, completed: {} });
      expect(transaction).not.toHaveBeenCalled();
    });

    it('inserts, updates and deletes records', async () => {
      const repos = createInMemoryRepositoryContext();
      const inserted = await transact(
        repos,
        Multi.new().insert('company', changeset(Company, {}, { name: 'Acme LLC' })),
        { returnOperation: 'company' }
      );
      if (!inserted.success) throw new Error('insert failed');

      const updated = await transact(
        repos,
        Multi.new().update('company', changeset(Company, inserted.data, { city: 'Hong Kong' })),
        { returnOperation: 'company' }
      );
      expect(updated).toEqual({
        success: true,
        data: { id: 1, name: 'Acme LLC', city: 'Hong Kong' },
      });

      const deleted = await transact(
        repos,
        Multi.new().delete('company', changeset(Company, { id: 1, name: 'Acme LLC' }))
      );
      expect(deleted.success).toBe(true);
      expect(await repos.records.get('simple_companies', 1)).toBeNull();
    });

    it('skips the write for an update without changes', async () => {
      const repos = createInMemoryRepositoryContext();
      const update = vi.spyOn(repos.records, 'update');
      const company = { id: 4, name: 'Acme LLC' };

      const result = await transact(
        repos,
        Multi.new().update('company', changeset(Company, company, { name: 'Acme LLC' }))
      );

      expect(result).toEqual({ success: true, data: { company } });
      expect(update).not.toHaveBeenCalled();
    });

    it('runs bulk steps', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .insertAll('inserted', Company, [{ name: 'Acme LLC' }, { name: 'Initech' }])
        .updateAll('moved', Company, { name: 'Initech' }, { city: 'Austin' });

      const result = await transact(repos, multi);

      expect(result).toEqual({
        success: true,
        data: { inserted: { count: 2, rows: null }, moved: { count: 1 } },
      });
    });

    it('runs merged steps right after the merge', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .run('count', () => 2)
        .merge((_repos, results) => {
          let plan = Multi.new();
          for (let i = 1; i <= results.count; i++) {
            plan = plan.run(`item:${i}`, () => i * 10);
          }
          return plan;
        })
        .run('after', (_repos, results) => Object.keys(results));

      const result = await transact(repos, multi);

      expect(result).toEqual({
        success: true,
        data: {
          count: 2,
          'item:1': 10,
          'item:2': 20,
          after: ['count', 'item:1', 'item:2'],
        },
      });
    });

    it('fails a merge whose steps clash with earlier results', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .run('a', () => 1)
        .merge(() => Multi.new().run('a', () => 2));

      const result = await transact(repos, multi);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.failedStep).toBe('merge:1');
      expect(result.error).toBeInstanceOf(DuplicateStepError);
      expect(result.completed).toEqual({ a: 1 });
    });

    it('fails a step whose name a merge already produced', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .merge(() => Multi.new().run('item:1', () => 'merged'))
        .run('item:1', () => 'outer');

      const result = await transact(repos, multi);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.failedStep).toBe('item:1');
      expect(result.error).toBeInstanceOf(DuplicateStepError);
      expect(result.completed).toEqual({ 'item:1': 'merged' });
    });

    it('fails a merge whose steps clash with internal results', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new()
        .runInternal('hidden', () => 1)
        .merge(() => Multi.new().run('hidden', () => 2));

      const result = await transact(repos, multi);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.failedStep).toBe('merge:1');
      expect(result.error).toBeInstanceOf(DuplicateStepError);
      expect(result.completed).toEqual({});
    });

    it('runs appended plans with their own internal and merge steps', async () => {
      const repos = createInMemoryRepositoryContext();
      const plan = (key: string, count: number) =>
        Multi.new()
          .runInternal('count', () => count)
          .merge((_repos, results) => {
            let items = Multi.new();
            for (let i = 1; i <= results.count; i++) {
              items = items.run(`${key}:${i}`, () => i);
            }
            return items;
          })
          .run(key, (_repos, results) => results.count);

      const result = await transact(repos, plan('a', 1).append(plan('b', 2)));

      expect(result).toEqual({
        success: true,
        data: { 'a:1': 1, a: 1, 'b:1': 1, 'b:2': 2, b: 2 },
      });
    });

    it('reports a failed internal step under the public name it serves', async () => {
      const repos = createInMemoryRepositoryContext();
      const boom = new Error('boom');
      const multi = Multi.new()
        .run('a', () => 1)
        .runInternal(
          'prepare',
          () => {
            throw boom;
          },
          { reportAs: 'b' }
        )
        .run('b', () => 2);

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: false, failedStep: 'b', error: boom, completed: { a: 1 } });
    });

    it('reports the merged step that failed', async () => {
      const repos = createInMemoryRepositoryContext();
      const multi = Multi.new().merge(() => Multi.new().error('inner', 'bad'));

      const result = await transact(repos, multi);

      expect(result).toEqual({ success: false, failedStep: 'inner', error: 'bad', completed: {} });
    });

    it('logs steps, commits and failures', async () => {
      const repos = createInMemoryRepositoryContext();
      const logger = createCapturingLogger();

      await transact(repos, Multi.new().run('a', () => 1), { logger });
      await transact(repos, Multi.new().error('b', 'bad'), { logger });

      expect(logger.entries.map((e) => [e.level, e.message])).toEqual([
        ['debug', 'Running step'],
        ['info', 'Transaction committed'],
        ['debug', 'Running step'],
        ['warn', 'Transaction rolled back'],
      ]);
      expect(logger.entries[1]?.data).toEqual({ steps: ['a'] });
      expect(logger.entries[3]?.data).toEqual({ step: 'b', error: 'bad' });
    });
  });
});
