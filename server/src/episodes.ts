import path from 'path';
import { log } from './logging.js';

// Episode and special markers found in release filenames. Every table below
// is tried top to bottom and the first hit wins, so more specific shapes
// must come before the looser ones they would otherwise be shadowed by.

export type SpecialType = 'special' | 'ova' | 'movie';

export interface SpecialMatch {
  type: SpecialType;
  number: number | null;
}

export interface EpisodeType {
  isAnthology: boolean;
  segmentCount: number;
  isFinale: boolean;
  isPremiere: boolean;
  isMultiPart: boolean;
}

/** Show, season, first episode and trailing title of an episode filename stem. */
export interface EpisodeMarker {
  show: string;
  season: number;
  episode: number;
  title: string;
}

/**
 * `allGroups` reads every capture group that took part in the match.
 * `skipFirstGroup` reads every number in the matched text except the first
 * (the season), since a repeated group only keeps its last capture.
 */
export type GroupExtraction = 'allGroups' | 'skipFirstGroup';

export interface EpisodePattern {
  name: string;
  pattern: RegExp;
  extract: GroupExtraction;
}

const LIST_SEP = String.raw`(?:\s+to\s+|\s*[&+,]\s*)`;

export const MULTI_EPISODE_PATTERNS: readonly EpisodePattern[] = [
  { name: 'repeat', pattern: /S(\d+)E(\d+)(?:E(\d+))+/i, extract: 'skipFirstGroup' },
  { name: 'hyphen', pattern: /S\d+E(\d+)-E(\d+)/i, extract: 'allGroups' },
  { name: 'short-hyphen', pattern: /S\d+E(\d+)-(\d+)/i, extract: 'allGroups' },
  { name: 'x-range', pattern: /\d+x(\d+)-(\d+)/i, extract: 'allGroups' },
  { name: 'space', pattern: /S\d+E(\d+)\s+E(\d+)(?:\s+E(\d+))?(?:\s+E(\d+))?/i, extract: 'allGroups' },
  {
    name: 'list',
    pattern: new RegExp(String.raw`S\d+E(\d+)${LIST_SEP}E(\d+)(?:${LIST_SEP}E(\d+))?(?:${LIST_SEP}E(\d+))?`, 'i'),
    extract: 'allGroups',
  },
];

// the NxNN branch captures the episode, not the season
const SINGLE_EPISODE_PATTERN = /S\d+E(\d+)|\d+x(\d+)|Episode\s*(\d+)/i;

export const SPECIAL_PATTERNS: readonly { pattern: RegExp; type: SpecialType }[] = [
  { pattern: /S00E(\d+)/i, type: 'special' },
  { pattern: /Specials?\.(\d+)/i, type: 'special' },
  { pattern: /Specials?\s*(\d+)/i, type: 'special' },
  { pattern: /Specials?/i, type: 'special' },
  { pattern: /OVAs?\.(\d+)/i, type: 'ova' },
  { pattern: /OVAs?\s*(\d+)/i, type: 'ova' },
  { pattern: /OVAs?/i, type: 'ova' },
  { pattern: /Movie\.(\d+)|Film\.(\d+)/i, type: 'movie' },
  { pattern: /Movie\s*(\d+)|Film\s*(\d+)/i, type: 'movie' },
  { pattern: /Movie|Film/i, type: 'movie' },
];

// Best effort: a bare `.7.` segment. Years or resolutions wrapped in dots match too.
const STANDALONE_NUMBER = /\.(\d+)\./;

const MARKER_PATTERNS: readonly RegExp[] = [
  /^(?<show>.*?)[.\s_-]*S(?<season>\d+)[.\s_-]*E(?<episode>\d+)(?:-?E\d+|-\d+)*(?:[.\s_-]+(?<title>.*))?$/i,
  /^(?<show>.*?)[.\s_-]*(?<season>\d+)x(?<episode>\d+)(?:-\d+)*(?:[.\s_-]+(?<title>.*))?$/i,
  /^(?<show>.+?)[.\s_-]+Season[.\s_-]+(?<season>\d+)[.\s_-]+Episode[.\s_-]+(?<episode>\d+)(?:[.\s_:-]+(?<title>.*))?$/i,
];

const FINALE_PATTERNS = [/(?:season|series)[\s-]*finale/, /final[\s.-]*episode/, /finale/];
const PREMIERE_PATTERNS = [/(?:season|series)[\s-]*premiere/, /first[\s-]*episode/, /premiere/, /pilot/];
const PART = '(?:\\d+|one|two|three|four|five|i|ii|iii|iv|v)';
const MULTI_PART_PATTERNS = [
  new RegExp(`part[\\s.-]*${PART}`),
  new RegExp(`pt[\\s.-]*${PART}`),
  new RegExp(`${PART}\\s*of\\s*${PART}`),
  new RegExp(`\\(${PART}[ .]of[ .]${PART}\\)`),
];

const MAX_RANGE = 20;

/** Episode 0 is not a real episode and is dropped. */
function extractNumbers(match: RegExpMatchArray, extract: GroupExtraction): number[] {
  const digits =
    extract === 'skipFirstGroup'
      ? (match[0].match(/\d+/g) ?? []).slice(1)
      : match.slice(1).filter((g): g is string => g !== undefined);
  return digits.map(Number).filter(n => n > 0);
}

/**
 * Episode numbers encoded in a filename, in order of appearance. Ranges
 * such as `S01E01-E05` yield their two ends, not the expanded range.
 * Returns an empty list when no episode marker is present.
 */
export function detectMultiEpisodes(filename: string): number[] {
  for (const { name, pattern, extract } of MULTI_EPISODE_PATTERNS) {
    const match = filename.match(pattern);
    if (!match) continue;
    const episodes = extractNumbers(match, extract);
    log('debug', `detectMultiEpisodes: ${filename} matched ${name} -> [${episodes.join(', ')}]`);
    return episodes;
  }

  const single = filename.match(SINGLE_EPISODE_PATTERN);
  if (single) {
    const [episode] = extractNumbers(single, 'allGroups');
    if (episode !== undefined) return [episode];
  }
  return [];
}

export function detectSpecialEpisodes(filename: string): SpecialMatch | null {
  const standalone = filename.match(STANDALONE_NUMBER);
  const fallback = standalone ? Number(standalone[1]) : null;

  for (const { pattern, type } of SPECIAL_PATTERNS) {
    const match = filename.match(pattern);
    if (!match) continue;
    const [number] = extractNumbers(match, 'allGroups');
    const result: SpecialMatch = { type, number: number ?? fallback };
    log('debug', `detectSpecialEpisodes: ${filename} -> ${type} ${result.number ?? '-'}`);
    return result;
  }
  return null;
}

/** Inclusive episode range, at most 20 episodes long. */
export function parseEpisodeRange(start: number, end: number): number[] {
  if (start <= 0 || end <= 0) throw new RangeError('Episode numbers must be positive integers');
  if (end < start) throw new RangeError(`Invalid episode range: ${start} to ${end}`);
  const last = Math.min(end, start + MAX_RANGE - 1);
  const out: number[] = [];
  for (let i = start; i <= last; i++) out.push(i);
  return out;
}

export function areSequential(numbers: readonly number[]): boolean {
  for (let i = 1; i < numbers.length; i++) {
    if (numbers[i] !== numbers[i - 1] + 1) return false;
  }
  return true;
}

/** Splits a combined episode title (`A & B`, `A, B`, `A - B`, `A and B`) into segments. */
export function splitTitleBySeparators(title: string): string[] {
  if (!title.trim()) return [];
  return title
    .split(/\s*[&,+]\s*|\s+-\s+|\s+and\s+/)
    .map(s => s.trim())
    .filter(Boolean);
}

/** Matches a filename stem (no extension) against the known episode layouts. */
export function matchEpisodeMarker(stem: string): EpisodeMarker | null {
  for (const pattern of MARKER_PATTERNS) {
    const groups = stem.match(pattern)?.groups;
    if (!groups) continue;
    return {
      show: groups.show ?? '',
      season: Number(groups.season),
      episode: Number(groups.episode),
      title: groups.title ?? '',
    };
  }
  return null;
}

function episodeTitle(filename: string): string | null {
  const base = path.basename(filename);
  const marker = matchEpisodeMarker(base.slice(0, base.length - path.extname(base).length));
  if (!marker) return null;
  return marker.title.replace(/[._]+/g, ' ').trim();
}

function anyMatch(patterns: readonly RegExp[], filename: string): boolean {
  const lower = filename.toLowerCase();
  return patterns.some(p => p.test(lower));
}

export function detectSeasonFinale(filename: string): boolean {
  return anyMatch(FINALE_PATTERNS, filename);
}

/** Only an explicit premiere/pilot keyword counts; episode 1 alone does not. */
export function detectSeasonPremiere(filename: string): boolean {
  return anyMatch(PREMIERE_PATTERNS, filename);
}

export function isMultiPartEpisode(filename: string): boolean {
  return anyMatch(MULTI_PART_PATTERNS, filename);
}

export function isAnthologyEpisode(filename: string): boolean {
  const title = episodeTitle(filename);
  if (title === null) return false;
  if (splitTitleBySeparators(title).length > 1) return true;
  return detectMultiEpisodes(filename).length > 1;
}

export function getSegmentCount(filename: string): number {
  if (!isAnthologyEpisode(filename)) return 1;
  const episodes = detectMultiEpisodes(filename);
  if (episodes.length === 2 && episodes[1] - episodes[0] > 1) {
    return episodes[1] - episodes[0] + 1;
  }
  if (episodes.length > 1) return episodes.length;
  const segments = splitTitleBySeparators(episodeTitle(filename) ?? '');
  return segments.length > 1 ? segments.length : 1;
}

export function getEpisodeType(filename: string): EpisodeType {
  const isAnthology = isAnthologyEpisode(filename);
  const result: EpisodeType = {
    isAnthology,
    segmentCount: isAnthology ? getSegmentCount(filename) : 1,
    isFinale: detectSeasonFinale(filename),
    isPremiere: detectSeasonPremiere(filename),
    isMultiPart: isMultiPartEpisode(filename),
  };
  log('debug', `getEpisodeType: ${filename} -> ${JSON.stringify(result)}`);
  return result;
}
