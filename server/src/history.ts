import fs from 'fs';
import path from 'path';
import { historyPath, readJson } from './config.js';
import { log } from './logging.js';
import { undoResults } from './renamer.js';
import { isRecord } from './safeCast.js';
import type { FileAction, RenameResult } from './types.js';

export type BatchStatus = 'completed' | 'rolled_back';

/** One /api/rename call that changed the filesystem. */
export interface HistoryBatch {
  id: number;
  appliedAt: string;
  status: BatchStatus;
  libraryId?: string;
  operations: RenameResult[];
  rolledBackAt?: string;
  /** Targets a rollback could not restore. */
  failed?: string[];
}

export interface RecordOptions {
  libraryId?: string;
  file?: string;
  now?: Date;
}

const ACTIONS: readonly FileAction[] = ['rename', 'hardlink', 'copy'];
const STATUSES: readonly BatchStatus[] = ['completed', 'rolled_back'];

function parseOperation(value: unknown): RenameResult | null {
  if (!isRecord(value)) return null;
  const action = ACTIONS.find(a => a === value.action);
  if (typeof value.from !== 'string' || typeof value.to !== 'string' || !action) return null;
  return { from: value.from, to: value.to, action };
}

function parseBatch(value: unknown): HistoryBatch | null {
  if (!isRecord(value) || !Array.isArray(value.operations)) return null;
  const { id, appliedAt, libraryId, rolledBackAt, failed } = value;
  const status = STATUSES.find(s => s === value.status);
  if (typeof id !== 'number' || !Number.isInteger(id) || typeof appliedAt !== 'string' || !status) return null;

  const operations: RenameResult[] = [];
  for (const entry of value.operations) {
    const op = parseOperation(entry);
    if (!op) return null;
    operations.push(op);
  }
  return {
    id,
    appliedAt,
    status,
    libraryId: typeof libraryId === 'string' ? libraryId : undefined,
    operations,
    rolledBackAt: typeof rolledBackAt === 'string' ? rolledBackAt : undefined,
    failed: Array.isArray(failed) ? failed.filter((f): f is string => typeof f === 'string') : undefined,
  };
}

export function loadHistory(file = historyPath()): HistoryBatch[] {
  const raw = readJson(file);
  if (!Array.isArray(raw)) return [];
  const batches: HistoryBatch[] = [];
  for (const entry of raw) {
    const batch = parseBatch(entry);
    if (batch) batches.push(batch);
    else log('warn', `Skipping invalid history entry in ${file}`);
  }
  return batches;
}

export function saveHistory(batches: HistoryBatch[], file = historyPath()) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(batches, null, 2));
}

export function recordBatch(operations: RenameResult[], options: RecordOptions = {}): HistoryBatch {
  const file = options.file ?? historyPath();
  const batches = loadHistory(file);
  const batch: HistoryBatch = {
    id: batches.reduce((max, b) => Math.max(max, b.id), 0) + 1,
    appliedAt: (options.now ?? new Date()).toISOString(),
    status: 'completed',
    libraryId: options.libraryId,
    operations,
  };
  saveHistory([...batches, batch], file);
  log('info', `Recorded batch ${batch.id} with ${operations.length} operation(s)`);
  return batch;
}

/**
 * Undoes a completed batch, the latest one when no id is given. Returns null
 * when there is no such batch or it was already rolled back.
 */
export function rollbackBatch(id?: number, file = historyPath(), now = new Date()): HistoryBatch | null {
  const batches = loadHistory(file);
  const completed = batches.filter(b => b.status === 'completed');
  const batch = id === undefined ? completed.at(-1) : completed.find(b => b.id === id);
  if (!batch) {
    log('warn', id === undefined ? 'No completed batch to roll back' : `No completed batch ${id} to roll back`);
    return null;
  }

  const failed = undoResults(batch.operations);
  batch.status = 'rolled_back';
  batch.rolledBackAt = now.toISOString();
  if (failed.length) batch.failed = failed;
  saveHistory(batches, file);
  log(failed.length ? 'warn' : 'info', `Rolled back batch ${batch.id}: ${batch.operations.length - failed.length} restored, ${failed.length} failed`);
  return batch;
}
