import path from 'path';
import { log } from './logging.js';

export const SUBTITLE_EXTENSIONS = ['srt', 'ass', 'ssa', 'sub', 'idx', 'vtt'] as const;

const LANGUAGE_RE = /^[a-z]{2,3}$/i;
const MIN_SIMILARITY = 0.5;

export interface SubtitleFile {
  path: string;
  /** Lower-cased, with the dot. */
  extension: string;
  /** Two or three letter language tag, `und` when the name has none. */
  language: string;
  forced: boolean;
  sdh: boolean;
  /** The stem without language and flag tags. */
  mediaName: string;
}

export interface SubtitleNameOptions {
  /** `null` leaves the language out. */
  language?: string | null;
  forced?: boolean;
  sdh?: boolean;
  extension?: string;
}

function stemOf(file: string) {
  const base = path.basename(file);
  return base.slice(0, base.length - path.extname(base).length);
}

// Reads `.lang`, `.forced` and `.sdh` off the end of a dotted name.
function readTags(parts: string[]) {
  let forced = false;
  let sdh = false;
  let language = 'und';
  for (;;) {
    const last = parts.at(-1)?.toLowerCase();
    if (last === 'forced') forced = true;
    else if (last === 'sdh') sdh = true;
    else break;
    parts.pop();
  }
  const last = parts.at(-1);
  if (last !== undefined && LANGUAGE_RE.test(last)) {
    language = last.toLowerCase();
    parts.pop();
  }
  return { language, forced, sdh };
}

/**
 * Language and flags from a subtitle's name. With `mediaStem`, only the text
 * after that stem is read as tags, so a title ending in a short word is not
 * taken for a language.
 */
export function describeSubtitle(filePath: string, mediaStem?: string): SubtitleFile {
  const extension = path.extname(filePath).toLowerCase();
  const stem = stemOf(filePath);

  if (mediaStem !== undefined && (stem === mediaStem || stem.startsWith(`${mediaStem}.`))) {
    const tags = readTags(stem.slice(mediaStem.length).split('.').filter(Boolean));
    return { path: filePath, extension, ...tags, mediaName: mediaStem };
  }

  const parts = stem.split('.');
  // a bare name is never all tags
  const head = parts.shift() ?? '';
  const tags = readTags(parts);
  return { path: filePath, extension, ...tags, mediaName: [head, ...parts].join('.') };
}

/** `<media stem>.<language>[.forced][.sdh]<extension>` */
export function generateSubtitleFilename(mediaFilename: string, options: SubtitleNameOptions = {}): string {
  const { language = 'en', forced = false, sdh = false, extension = '.srt' } = options;
  const parts = [stemOf(mediaFilename)];
  if (language) parts.push(language);
  if (forced) parts.push('forced');
  if (sdh) parts.push('sdh');
  return parts.join('.') + (extension.startsWith('.') ? extension : `.${extension}`);
}

/** Where a subtitle goes when its video is placed at `videoTarget`. */
export function subtitleTarget(videoTarget: string, sub: Pick<SubtitleFile, 'language' | 'forced' | 'sdh' | 'extension'>) {
  const name = generateSubtitleFilename(path.basename(videoTarget), {
    language: sub.language === 'und' ? null : sub.language,
    forced: sub.forced,
    sdh: sub.sdh,
    extension: sub.extension,
  });
  return path.join(path.dirname(videoTarget), name);
}

function similarity(a: string, b: string) {
  const left = new Set(a);
  const right = new Set(b);
  let shared = 0;
  for (const c of left) if (right.has(c)) shared++;
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}

// A subtitle sits beside its video or one folder below it (e.g. Subs/).
function sameFolder(media: string, sub: string) {
  const dir = path.dirname(sub);
  return path.dirname(media) === dir || path.dirname(media) === path.dirname(dir);
}

function matchOne(mediaFiles: readonly string[], subPath: string): [string, SubtitleFile] | null {
  const nearby = mediaFiles.filter(m => sameFolder(m, subPath));
  const stem = stemOf(subPath);

  // exact name, or the name followed by tags; the longest video stem wins
  let best: string | undefined;
  for (const media of nearby) {
    const mediaStem = stemOf(media);
    if (stem !== mediaStem && !stem.startsWith(`${mediaStem}.`)) continue;
    if (best === undefined || mediaStem.length > stemOf(best).length) best = media;
  }
  if (best !== undefined) return [best, describeSubtitle(subPath, stemOf(best))];

  const sub = describeSubtitle(subPath);
  const name = sub.mediaName.toLowerCase();
  let score = MIN_SIMILARITY;
  for (const media of nearby) {
    const mediaStem = stemOf(media).toLowerCase();
    if (!mediaStem.includes(name) && !name.includes(mediaStem)) continue;
    const s = similarity(name, mediaStem);
    if (s > score) {
      score = s;
      best = media;
    }
  }
  return best === undefined ? null : [best, sub];
}

/** Subtitles grouped under the video each belongs to; unmatched ones are left out. */
export function matchSubtitlesToMedia(mediaFiles: readonly string[], subtitleFiles: readonly string[]): Map<string, SubtitleFile[]> {
  const matched = new Map<string, SubtitleFile[]>();
  for (const subPath of subtitleFiles) {
    const hit = matchOne(mediaFiles, subPath);
    if (!hit) {
      log('debug', `No video found for subtitle ${subPath}`);
      continue;
    }
    const [media, sub] = hit;
    const list = matched.get(media) ?? [];
    list.push(sub);
    matched.set(media, list);
  }
  return matched;
}
