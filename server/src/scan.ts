import crypto from 'crypto';
import fg from 'fast-glob';
import fs from 'fs';
import path from 'path';
import { log } from './logging.js';
import { extractShowInfo } from './parse.js';
import { matchSubtitlesToMedia, SUBTITLE_EXTENSIONS } from './subtitles.js';
import type { Library, ScanItem } from './types.js';

export const MEDIA_EXTENSIONS = ['mkv', 'mp4', 'avi', 'm4v', 'mov', 'wmv', 'ts', 'mp3', 'flac', 'm4a', 'ogg'] as const;

export interface ScanOptions {
  offset?: number;
  limit?: number;
}

export function normalizePathForCache(p: string) {
  return p.replace(/\\+/g, '/');
}

function isSubtitle(file: string) {
  const ext = path.extname(file).slice(1).toLowerCase();
  return SUBTITLE_EXTENSIONS.some(e => e === ext);
}

/** Stable id for a file: its normalized path and size. */
export function itemId(filePath: string, size: number) {
  return crypto.createHash('sha1').update(`${normalizePathForCache(filePath)}|${size}`).digest('hex');
}

/**
 * Lists media files under a library's input root, sorted by path, with what
 * each filename says about itself and the subtitles found beside it.
 */
export async function scanLibrary(lib: Library, options: ScanOptions = {}): Promise<ScanItem[]> {
  if (!fs.existsSync(lib.inputRoot)) {
    log('warn', `Library path not found on host: ${lib.inputRoot}`);
    return [];
  }
  const patterns = [`**/*.{${MEDIA_EXTENSIONS.join(',')}}`, `**/*.{${SUBTITLE_EXTENSIONS.join(',')}}`];
  const found = await fg(patterns, { cwd: lib.inputRoot, absolute: true, caseSensitiveMatch: false, suppressErrors: true, onlyFiles: true });
  found.sort();
  const files = found.filter(f => !isSubtitle(f));
  const subtitles = matchSubtitlesToMedia(files, found.filter(isSubtitle));

  const offset = Math.max(0, options.offset ?? 0);
  const slice = options.limit === undefined ? files.slice(offset) : files.slice(offset, offset + options.limit);
  const items = slice.map((f): ScanItem => {
    const size = fs.statSync(f).size;
    return {
      id: itemId(f, size),
      path: normalizePathForCache(f),
      size,
      ext: path.extname(f),
      libraryId: lib.id,
      inferred: extractShowInfo(f),
      subtitles: (subtitles.get(f) ?? []).map(s => ({ ...s, path: normalizePathForCache(s.path) })),
    };
  });
  log('info', `Scan of ${lib.name} found ${files.length} file(s), returning ${items.length}`);
  return items;
}
