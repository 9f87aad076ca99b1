import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadHistory, recordBatch, rollbackBatch } from '../src/history.js';
import { applyPlans } from '../src/renamer.js';
import type { RenamePlan } from '../src/types.js';

describe('rename history', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'history-test-'));
    file = path.join(dir, 'config', 'history.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function moveOne(name: string) {
    const from = path.join(dir, name);
    fs.writeFileSync(from, name);
    const plan: RenamePlan = {
      from,
      to: path.join(dir, 'out', name),
      action: 'rename',
      dryRun: false,
      meta: { type: 'movie', title: name },
    };
    return applyPlans([plan]).results;
  }

  it('starts empty', () => {
    expect(loadHistory(file)).toEqual([]);
  });

  it('numbers batches and stores them as JSON', () => {
    const first = recordBatch(moveOne('a.mkv'), { file, libraryId: 'films', now: new Date('2026-01-02T03:04:05Z') });
    const second = recordBatch(moveOne('b.mkv'), { file });
    expect(first.id).toBe(1);
    expect(second.id).toBe(2);

    const stored = loadHistory(file);
    expect(stored).toHaveLength(2);
    expect(stored[0]).toEqual({
      id: 1,
      appliedAt: '2026-01-02T03:04:05.000Z',
      status: 'completed',
      libraryId: 'films',
      operations: [{ from: path.join(dir, 'a.mkv'), to: path.join(dir, 'out', 'a.mkv'), action: 'rename' }],
    });
  });

  it('rolls back the latest completed batch by default', () => {
    recordBatch(moveOne('a.mkv'), { file });
    recordBatch(moveOne('b.mkv'), { file });

    const undone = rollbackBatch(undefined, file, new Date('2026-03-04T00:00:00Z'));
    expect(undone?.id).toBe(2);
    expect(fs.existsSync(path.join(dir, 'b.mkv'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'out', 'a.mkv'))).toBe(true);

    const [first, second] = loadHistory(file);
    expect(first.status).toBe('completed');
    expect(second).toMatchObject({ status: 'rolled_back', rolledBackAt: '2026-03-04T00:00:00.000Z' });
    expect(second.failed).toBeUndefined();

    expect(rollbackBatch(undefined, file)?.id).toBe(1);
    expect(rollbackBatch(undefined, file)).toBeNull();
  });

  it('rolls back a batch by id once', () => {
    recordBatch(moveOne('a.mkv'), { file });
    recordBatch(moveOne('b.mkv'), { file });
    expect(rollbackBatch(1, file)?.id).toBe(1);
    expect(fs.existsSync(path.join(dir, 'a.mkv'))).toBe(true);
    expect(rollbackBatch(1, file)).toBeNull();
    expect(rollbackBatch(9, file)).toBeNull();
  });

  it('records what could not be restored', () => {
    const results = moveOne('a.mkv');
    recordBatch(results, { file });
    fs.rmSync(results[0].to);

    const undone = rollbackBatch(undefined, file);
    expect(undone?.status).toBe('rolled_back');
    expect(undone?.failed).toEqual([results[0].to]);
    expect(loadHistory(file)[0].failed).toEqual([results[0].to]);
  });

  it('skips damaged entries', () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify([
        { id: 1, appliedAt: '2026-01-01T00:00:00.000Z', status: 'completed', operations: [{ from: 'a', to: 'b', action: 'move' }] },
        { id: 2, appliedAt: '2026-01-01T00:00:00.000Z', status: 'completed', operations: [] },
      ]),
    );
    expect(loadHistory(file).map(b => b.id)).toEqual([2]);
  });
});
