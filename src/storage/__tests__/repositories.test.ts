import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Ledger } from '../ledger.js';
import { createTempLedger } from './test-utils.js';

describe('SubPromptRepository', () => {
  let ledger: Ledger;
  let cleanup: () => void;

  beforeEach(() => {
    ({ ledger, cleanup } = createTempLedger());
  });

  afterEach(() => {
    cleanup();
  });

  it('inserts and returns the stored row', () => {
    const sub = ledger.subPrompts.insert({
      type: 'intro',
      parentId: null,
      version: '1',
      contents: 'Hello {{ name }}',
      commitMessage: 'first',
    });

    expect(sub.id).toBe(1);
    expect(sub.type).toBe('intro');
    expect(sub.parentId).toBeNull();
    expect(sub.version).toBe('1');
    expect(sub.contents).toBe('Hello {{ name }}');
    expect(sub.commitMessage).toBe('first');
    expect(sub.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('finds rows by contents', () => {
    const a = ledger.subPrompts.insert({
      type: 'intro', parentId: null, version: '1', contents: 'A', commitMessage: 'm',
    });

    expect(ledger.subPrompts.getByContents('A')?.id).toBe(a.id);
    expect(ledger.subPrompts.getByContents('missing')).toBeNull();
  });

  it('getByIds preserves the requested order and skips unknown ids', () => {
    const a = ledger.subPrompts.insert({
      type: 'a', parentId: null, version: '1', contents: 'A', commitMessage: 'm',
    });
    const b = ledger.subPrompts.insert({
      type: 'b', parentId: null, version: '1', contents: 'B', commitMessage: 'm',
    });

    expect(ledger.subPrompts.getByIds([b.id, 42, a.id]).map((s) => s.id)).toEqual([b.id, a.id]);
    expect(ledger.subPrompts.getByIds([])).toEqual([]);
  });

  it('lists children by parent id', () => {
    const root = ledger.subPrompts.insert({
      type: 'a', parentId: null, version: '1', contents: 'v1', commitMessage: 'm',
    });
    const c1 = ledger.subPrompts.insert({
      type: 'a', parentId: root.id, version: '2', contents: 'v2', commitMessage: 'm',
    });
    const c2 = ledger.subPrompts.insert({
      type: 'a', parentId: root.id, version: '1.1', contents: 'v1.1', commitMessage: 'm',
    });

    expect(ledger.subPrompts.listChildIds(root.id)).toEqual([c1.id, c2.id]);
    expect(ledger.subPrompts.listChildIds(c1.id)).toEqual([]);
  });

  it('deletes by id', () => {
    const a = ledger.subPrompts.insert({
      type: 'a', parentId: null, version: '1', contents: 'A', commitMessage: 'm',
    });
    ledger.subPrompts.deleteById(a.id);
    expect(ledger.subPrompts.getById(a.id)).toBeNull();
    expect(ledger.subPrompts.listAll()).toEqual([]);
  });
});

describe('MasterPromptRepository', () => {
  let ledger: Ledger;
  let cleanup: () => void;

  beforeEach(() => {
    ({ ledger, cleanup } = createTempLedger());
    for (const contents of ['A', 'B', 'C']) {
      ledger.subPrompts.insert({
        type: contents.toLowerCase(), parentId: null, version: '1', contents, commitMessage: 'm',
      });
    }
  });

  afterEach(() => {
    cleanup();
  });

  it('inserts a current master and round-trips the id list', () => {
    const master = ledger.masters.insertCurrent({
      parentId: null, version: '1', subPromptIds: [3, 1, 2], commitMessage: 'first',
    });

    expect(master.isCurrent).toBe(true);
    expect(master.subPromptIds).toEqual([3, 1, 2]);
    expect(ledger.masters.getCurrent()?.id).toBe(master.id);

    const raw = ledger.database.db
      .prepare('SELECT contents FROM master_prompts WHERE id = ?')
      .pluck()
      .get(master.id);
    expect(raw).toBe('[3,1,2]');
  });

  it('getBySubPromptIds matches the exact ordered list', () => {
    const master = ledger.masters.insertCurrent({
      parentId: null, version: '1', subPromptIds: [1, 2], commitMessage: 'm',
    });

    expect(ledger.masters.getBySubPromptIds([1, 2])?.id).toBe(master.id);
    expect(ledger.masters.getBySubPromptIds([2, 1])).toBeNull();
  });

  it('clearCurrent and setCurrent move the current flag', () => {
    const first = ledger.masters.insertCurrent({
      parentId: null, version: '1', subPromptIds: [1], commitMessage: 'm',
    });
    ledger.masters.clearCurrent();
    const second = ledger.masters.insertCurrent({
      parentId: first.id, version: '2', subPromptIds: [1, 2], commitMessage: 'm',
    });

    expect(ledger.masters.getById(first.id)?.isCurrent).toBe(false);
    expect(ledger.masters.getCurrent()?.id).toBe(second.id);

    ledger.masters.deleteById(second.id);
    expect(ledger.masters.getCurrent()).toBeNull();

    ledger.masters.setCurrent(first.id);
    expect(ledger.masters.getCurrent()?.id).toBe(first.id);
  });

  it('setCurrent throws for an unknown id', () => {
    expect(() => ledger.masters.setCurrent(99)).toThrow('Master prompt not found: 99');
  });

  it('countReferencing counts other masters holding a sub-prompt', () => {
    const m1 = ledger.masters.insertCurrent({
      parentId: null, version: '1', subPromptIds: [1, 2], commitMessage: 'm',
    });
    ledger.masters.clearCurrent();
    const m2 = ledger.masters.insertCurrent({
      parentId: m1.id, version: '2', subPromptIds: [1, 3], commitMessage: 'm',
    });

    expect(ledger.masters.countReferencing(1, m2.id)).toBe(1);
    expect(ledger.masters.countReferencing(3, m2.id)).toBe(0);
    expect(ledger.masters.countReferencing(2, m2.id)).toBe(1);
    expect(ledger.masters.countReferencing(2, m1.id)).toBe(0);
  });
});
