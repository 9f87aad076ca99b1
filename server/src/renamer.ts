import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors.js';
import { log } from './logging.js';
import { subtitleTarget } from './subtitles.js';
import { DEFAULT_TEMPLATES, formatEpisodeCode, renderTemplate, type TemplateVars } from './templates.js';
import type { FileAction, Library, LinkMode, MatchCandidate, MediaType, PlannedSubtitle, RenamePlan, RenameResult, ScanItem } from './types.js';

export interface PlanOptions {
  templates?: Readonly<Record<MediaType, string>>;
  /** Title from a catalog lookup; wins over the one parsed from the filename. */
  episodeTitle?: string;
}

/**
 * Keeps the original text apart from characters most filesystems reject,
 * with whitespace collapsed and leading/trailing dots and spaces removed.
 */
export function sanitize(s: string) {
  return s
    .replace(/[<>:"/\\|?*\u0000-\u001F]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^[. ]+|[. ]+$/g, '');
}

export function templateVars(item: ScanItem, candidate?: MatchCandidate | null, episodeTitle?: string): TemplateVars {
  const info = item.inferred;
  const title = sanitize(candidate?.name || info?.title || '');
  const epTitle = sanitize(episodeTitle ?? info?.episodeTitle ?? '');
  const special = info?.specialType !== undefined;
  return {
    title,
    year: candidate?.year ?? info?.year,
    season: special ? 0 : info?.season ?? 1,
    episodeCode: formatEpisodeCode(info?.episodes ?? []),
    episodeTitle: epTitle,
    episodeTitleSuffix: epTitle ? ` - ${epTitle}` : '',
    quality: info?.quality,
  };
}

/**
 * Destination for one scanned file under its library's output root. Returns
 * null when nothing usable was parsed from the name.
 */
export function planRename(item: ScanItem, lib: Library, candidate?: MatchCandidate | null, options: PlanOptions = {}): RenamePlan | null {
  const info = item.inferred;
  if (!info || !(candidate?.name || info.title)) return null;
  const isEpisodic = lib.type !== 'movie';
  if (isEpisodic && !info.episodes.length && info.specialType === undefined) {
    log('debug', `planRename: ${item.path} has no episode number, skipping`);
    return null;
  }

  const vars = templateVars(item, candidate, options.episodeTitle);
  const template = (options.templates ?? DEFAULT_TEMPLATES)[lib.type];
  const segments = renderTemplate(template, vars).split('/').map(sanitize).filter(Boolean);
  const to = path.join(lib.outputRoot, ...segments) + item.ext;

  const plan: RenamePlan = {
    from: item.path,
    to,
    action: lib.linkMode ?? 'hardlink',
    dryRun: true,
    meta: {
      type: lib.type,
      title: String(vars.title),
      year: candidate?.year ?? info.year,
      season: isEpisodic ? Number(vars.season) : undefined,
      episodes: isEpisodic ? [...info.episodes] : undefined,
      source: candidate?.source,
      metadataId: candidate?.id,
    },
  };
  if (item.subtitles.length) plan.subtitles = followVideo(to, item.subtitles.map(s => ({ from: s.path, language: s.language, forced: s.forced, sdh: s.sdh })));
  log('debug', `planRename: ${item.path} -> ${to}`);
  return plan;
}

function uniquePath(p: string) {
  if (!fs.existsSync(p)) return p;
  const dir = path.dirname(p);
  const ext = path.extname(p);
  const base = path.basename(p, ext);
  for (let i = 2; ; i++) {
    const cand = path.join(dir, `${base} (${i})${ext}`);
    if (!fs.existsSync(cand)) return cand;
  }
}

function followVideo(videoTarget: string, subs: readonly Omit<PlannedSubtitle, 'to'>[], free = false): PlannedSubtitle[] {
  return subs.map(s => {
    const to = subtitleTarget(videoTarget, { ...s, extension: path.extname(s.from).toLowerCase() });
    return { from: s.from, to: free ? uniquePath(to) : to, language: s.language, forced: s.forced, sdh: s.sdh };
  });
}

/** Moves the plan's target, and its subtitles', to free names when the planned ones are taken. */
export function finalizePlan(p: RenamePlan): RenamePlan {
  const to = uniquePath(p.to);
  return p.subtitles ? { ...p, to, subtitles: followVideo(to, p.subtitles, true) } : { ...p, to };
}

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

function place(from: string, to: string, action: LinkMode, allowCopyFallback: boolean): FileAction {
  if (action === 'rename') {
    fs.renameSync(from, to);
    return 'rename';
  }
  try {
    fs.linkSync(from, to);
    return 'hardlink';
  } catch (e) {
    if (!allowCopyFallback) throw e;
    log('warn', `link failed (${errnoCode(e) ?? errorMessage(e)}), copying ${from} -> ${to}`);
    fs.copyFileSync(from, to);
    return 'copy';
  }
}

function undoOne(r: RenameResult) {
  if (r.action === 'rename') {
    if (!fs.existsSync(r.to)) throw new Error(`${r.to} no longer exists`);
    if (fs.existsSync(r.from)) throw new Error(`${r.from} is occupied`);
    fs.mkdirSync(path.dirname(r.from), { recursive: true });
    fs.renameSync(r.to, r.from);
    return;
  }
  // a link or copy is only removed while the original is still there
  if (!fs.existsSync(r.from)) throw new Error(`source ${r.from} is gone`);
  if (fs.existsSync(r.to)) fs.unlinkSync(r.to);
}

/**
 * Reverts completed operations, newest first: links and copies are removed,
 * renames are moved back. Returns the targets that could not be restored.
 */
export function undoResults(results: readonly RenameResult[]): string[] {
  const failed: string[] = [];
  for (const r of [...results].reverse()) {
    try {
      undoOne(r);
    } catch (e) {
      log('error', `rollback failed for ${r.to}: ${errorMessage(e)}`);
      failed.push(r.to);
    }
  }
  return failed;
}

/**
 * Carries out every non-dry-run plan, subtitles included. On the first
 * failure, everything already done is undone before the error is rethrown.
 */
export function applyPlans(plans: RenamePlan[], allowCopyFallback = false): { results: RenameResult[] } {
  const results: RenameResult[] = [];
  try {
    for (const p of plans) {
      if (p.dryRun) continue;
      log('info', `applyPlans - processing: ${p.from} -> ${p.to} (action=${p.action})`);
      fs.mkdirSync(path.dirname(p.to), { recursive: true });
      const target = uniquePath(p.to);
      results.push({ from: p.from, to: target, action: place(p.from, target, p.action, allowCopyFallback) });

      for (const sub of followVideo(target, p.subtitles ?? [], true)) {
        results.push({ from: sub.from, to: sub.to, action: place(sub.from, sub.to, p.action, allowCopyFallback) });
      }
    }
  } catch (e) {
    log('error', `applyPlans failed, rolling back ${results.length} operation(s): ${errorMessage(e)}`);
    undoResults(results);
    throw e;
  }
  return { results };
}
