import { describe, it, expect } from 'vitest';
import { InMemoryDataContext } from '../../src/context/in-memory-context.js';
import { ConcurrencyError, DataContextError } from '../../src/errors.js';
import { sort } from '../../src/query/sorter.js';
import { spec } from '../../src/specification/specification.js';
import { accountModel, employeeModel, makeEmployees, ids } from './fixtures.js';
import type { Account, Employee } from './fixtures.js';

const NOW = new Date('2024-03-01T00:00:00Z');
const byId = sort.by((e: Employee) => e.id);

function makeContext(): InMemoryDataContext {
  return new InMemoryDataContext({ seed: { employees: makeEmployees() }, clock: () => NOW });
}

describe('InMemoryDataContext', () => {

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------
  describe('getRecords()', () => {
    it('returns the requested page, filtered and sorted', async () => {
      const ctx = makeContext();
      const page = await ctx.getRecords(
        employeeModel,
        2,
        0,
        sort.by((e: Employee) => e.department).thenByDescending((e) => e.salary),
        spec.where((e: Employee) => e.department !== 'admin'),
      );
      expect(ids(page)).toEqual([1, 8]);
    });

    it('tracks returned records as unchanged', async () => {
      const ctx = makeContext();
      const page = await ctx.getRecords(employeeModel, 3, 0, byId);
      expect(ctx.getTrackedObjects()).toEqual(page);
      expect(await ctx.saveChanges()).toBe(0);
    });

    it('hands out the tracked instance for a record read again', async () => {
      const ctx = makeContext();
      const [ada] = await ctx.getRecords(employeeModel, 1, 0, byId);
      const raised = { ...ada!, salary: 1500 };
      ctx.updateRecord(employeeModel, raised);
      const [again] = await ctx.getRecords(employeeModel, 1, 0, byId);
      expect(again).toBe(raised);
      expect(ctx.getTrackedObjects()).toEqual([raised]);
    });

    it('returns an empty page for a model with no records', async () => {
      const ctx = makeContext();
      expect(await ctx.getRecords(accountModel, 5, 0, sort.by((a: Account) => a.id))).toEqual([]);
    });

    it('rejects a stored record that does not match the schema', async () => {
      const ctx = new InMemoryDataContext({ seed: { employees: [{ id: 'not-a-number' }] } });
      await expect(ctx.getRecords(employeeModel, 5, 0, byId)).rejects.toBeInstanceOf(DataContextError);
    });

    it('rejects when the signal is already aborted', async () => {
      const ctx = makeContext();
      const controller = new AbortController();
      controller.abort(new Error('stop'));
      await expect(ctx.getRecords(employeeModel, 5, 0, byId, null, controller.signal)).rejects.toThrow('stop');
      expect(ctx.getTrackedObjects()).toEqual([]);
    });

    it('getDataModel() exposes the unpaged source', async () => {
      const ctx = makeContext();
      expect(await ctx.getDataModel(employeeModel).count()).toBe(10);
    });
  });

  // ---------------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------------
  describe('saveChanges()', () => {
    it('inserts added records', async () => {
      const ctx = makeContext();
      ctx.addRecord(employeeModel, { id: 11, name: 'Kit', department: 'eng', salary: 800, age: 26 });
      expect(await ctx.saveChanges()).toBe(1);
      expect(await ctx.getDataModel(employeeModel).count()).toBe(11);
    });

    it('replaces updated records by key', async () => {
      const ctx = makeContext();
      const [ada] = await ctx.getRecords(employeeModel, 1, 0, byId);
      ctx.updateRecord(employeeModel, { ...ada!, salary: 1500 });
      expect(await ctx.saveChanges()).toBe(1);
      const [reloaded] = await ctx.getRecords(employeeModel, 1, 0, byId);
      expect(reloaded!.salary).toBe(1500);
    });

    it('removes deleted records', async () => {
      const ctx = makeContext();
      const page = await ctx.getRecords(employeeModel, 2, 0, byId);
      for (const e of page) ctx.deleteRecord(employeeModel, e);
      expect(await ctx.saveChanges()).toBe(2);
      expect(ids(await ctx.getRecords(employeeModel, 2, 0, byId))).toEqual([3, 4]);
      expect(ctx.getTrackedObjects()).toHaveLength(2);
    });

    it('returns 0 and writes nothing without pending changes', async () => {
      expect(await makeContext().saveChanges()).toBe(0);
    });

    it('marks saved records unchanged', async () => {
      const ctx = makeContext();
      const kit = { id: 11, name: 'Kit', department: 'eng', salary: 800, age: 26 };
      ctx.addRecord(employeeModel, kit);
      await ctx.saveChanges();
      expect(await ctx.saveChanges()).toBe(0);
      expect(ctx.getTrackedObjects()).toEqual([kit]);
    });

    it('throws ConcurrencyError for an update of a missing key and applies nothing', async () => {
      const ctx = makeContext();
      const kit = { id: 11, name: 'Kit', department: 'eng', salary: 800, age: 26 };
      const ghost = { id: 404, name: 'Ghost', department: 'eng', salary: 1, age: 1 };
      ctx.addRecord(employeeModel, kit);
      ctx.updateRecord(employeeModel, ghost);
      await expect(ctx.saveChanges()).rejects.toBeInstanceOf(ConcurrencyError);
      expect(await ctx.getDataModel(employeeModel).count()).toBe(10);
      expect(ctx.getTrackedObjects()).toEqual([kit, ghost]);
    });

    it('throws ConcurrencyError for a delete of a missing key', async () => {
      const ctx = makeContext();
      const [ada] = await ctx.getRecords(employeeModel, 1, 0, byId);
      ctx.deleteRecord(employeeModel, ada!);
      await ctx.saveChanges();
      ctx.deleteRecord(employeeModel, { ...ada! });
      await expect(ctx.saveChanges()).rejects.toThrow('"employees" record 1 no longer exists');
    });

    it('throws DataContextError when an added key already exists', async () => {
      const ctx = makeContext();
      ctx.addRecord(employeeModel, { id: 1, name: 'Dup', department: 'eng', salary: 1, age: 1 });
      await expect(ctx.saveChanges()).rejects.toThrow('Failed to add "employees" record: key 1 already exists');
    });

    it('keeps a change made while a save is running for the next save', async () => {
      const ctx = makeContext();
      const [ada] = await ctx.getRecords(employeeModel, 1, 0, byId);
      ctx.updateRecord(employeeModel, ada!);
      const saving = ctx.saveChanges();
      ctx.deleteRecord(employeeModel, ada!);
      expect(await saving).toBe(1);
      expect(await ctx.saveChanges()).toBe(1);
      expect(ids(await ctx.getRecords(employeeModel, 1, 0, byId))).toEqual([2]);
    });

    it('rejects a second save while one is running', async () => {
      const ctx = makeContext();
      ctx.addRecord(employeeModel, { id: 11, name: 'Kit', department: 'eng', salary: 800, age: 26 });
      const first = ctx.saveChanges();
      await expect(ctx.saveChanges()).rejects.toThrow('saveChanges() is already running on this context');
      expect(await first).toBe(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Aggregate locks
  // ---------------------------------------------------------------------------
  describe('aggregate locks', () => {
    it('stamps version 1 on insert', async () => {
      const ctx = makeContext();
      const account: Account = { id: 'acc-1', owner: 'Ada', balance: 100 };
      ctx.addRecord(accountModel, account);
      await ctx.saveChanges();
      expect(account.lock).toEqual({ version: 1, timestamp: NOW });
    });

    it('increments the version on update', async () => {
      const ctx = new InMemoryDataContext({
        seed: { accounts: [{ id: 'acc-1', owner: 'Ada', balance: 100, lock: { version: 3, timestamp: new Date(0) } }] },
        clock: () => NOW,
      });
      const [account] = await ctx.getRecords(accountModel, 1, 0, sort.by((a: Account) => a.id));
      account!.balance = 150;
      ctx.updateRecord(accountModel, account!);
      await ctx.saveChanges();
      expect(account!.lock).toEqual({ version: 4, timestamp: NOW });
    });

    it('leaves the lock alone when the save fails', async () => {
      const ctx = makeContext();
      const account: Account = { id: 'acc-1', owner: 'Ada', balance: 100 };
      ctx.addRecord(accountModel, account);
      ctx.updateRecord(employeeModel, { id: 404, name: 'Ghost', department: 'eng', salary: 1, age: 1 });
      await expect(ctx.saveChanges()).rejects.toBeInstanceOf(ConcurrencyError);
      expect(account.lock).toBeUndefined();
    });

    it('does not stamp records of models without a lock', async () => {
      const ctx = makeContext();
      const kit = { id: 11, name: 'Kit', department: 'eng', salary: 800, age: 26 };
      ctx.addRecord(employeeModel, kit);
      await ctx.saveChanges();
      expect('lock' in kit).toBe(false);
    });
  });
});
