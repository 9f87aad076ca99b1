import path from 'path';
import { detectMultiEpisodes, detectSpecialEpisodes, matchEpisodeMarker } from './episodes.js';
import { log } from './logging.js';
import type { ShowInfo } from './types.js';

// Filename parsing: a fansub anime layout first, then the episode markers,
// then `Name.Year`, then bare specials. The first layout that fits wins.

const ANIME_RE = /^\[(?<group>[^\]]+)\][\s_]*(?<show>.+?)[\s_]+-[\s_]+(?<episode>\d{1,4})(?:v(?<version>\d+))?(?:[\s_]*[[(].*)?$/i;
const MOVIE_RE = /^(?<movie>.+)[.\s_([-]+(?<year>19\d{2}|20\d{2})(?!\d)/;
const TRAILING_YEAR_RE = /[.\s_(-]*\(?(19\d{2}|20\d{2})\)?$/;
const QUALITY_RE = /\b(\d{3,4}p|4k)\b/i;
const SPECIAL_KEYWORD_RE = /S00E\d+|Specials?|OVAs?|Movie|Film/i;
const EXTENSION_RE = /^\.(?=[a-z0-9]*[a-z])[a-z0-9]{2,4}$/i;

// Release tags that never belong in a title
const NOISE_RE_LIST: RegExp[] = [
  /\[[^\]]+\]/g,
  /\{[^}]+\}/g,
  /\b(480p|576p|720p|1080p|2160p|4k)\b/ig,
  /\b(x\.?264|x\.?265|h\.?264|h\.?265|hevc|avc|aac2?\.?0?|ac3|dts)\b/ig,
  /\b(BluRay|Blu-ray|BDRip|WEB[-_.]?DL|WEB[-_.]?Rip|HDTV|DVDRip|HDRip|BRRip)\b/ig,
  /\b(PROPER|REPACK|INTERNAL)\b/ig,
];

export type ParsedMediaField = keyof ShowInfo;
export type ParsedMediaValue = ShowInfo[ParsedMediaField] | null;

/** Serialized field order of `ParsedMediaName.toRecord()`. */
export const PARSED_MEDIA_FIELDS = [
  'mediaType',
  'title',
  'extension',
  'quality',
  'season',
  'episodes',
  'episodeTitle',
  'year',
  'group',
  'version',
  'specialType',
  'specialNumber',
] as const satisfies readonly ParsedMediaField[];

export class ParsedMediaName implements ShowInfo {
  mediaType: ShowInfo['mediaType'];
  title: string;
  extension: string;
  quality?: string;
  season?: number;
  episodes: number[];
  episodeTitle?: string;
  year?: number;
  group?: string;
  version?: number;
  specialType?: ShowInfo['specialType'];
  specialNumber?: number;

  constructor(info: ShowInfo) {
    this.mediaType = info.mediaType;
    this.title = info.title;
    this.extension = info.extension;
    this.quality = info.quality;
    this.season = info.season;
    this.episodes = [...info.episodes];
    this.episodeTitle = info.episodeTitle;
    this.year = info.year;
    this.group = info.group;
    this.version = info.version;
    this.specialType = info.specialType;
    this.specialNumber = info.specialNumber;
  }

  get isSpecial() { return this.specialType !== undefined; }

  /** Every known field, absent ones as null. */
  toRecord(): Record<string, ParsedMediaValue> {
    return Object.fromEntries(PARSED_MEDIA_FIELDS.map((f): [string, ParsedMediaValue] => [f, this[f] ?? null]));
  }
}

function stripNoise(s: string) {
  let out = s;
  for (const r of NOISE_RE_LIST) out = out.replace(r, ' ');
  return out;
}

/** Dots, underscores and hyphens become spaces; runs of spaces collapse. */
export function cleanShowName(name: string): string {
  return name.replace(/[._-]/g, ' ').replace(/\s+/g, ' ').trim();
}

function cleanTitle(raw: string): string | undefined {
  const out = cleanShowName(stripNoise(raw));
  return out || undefined;
}

// Show name from the enclosing folders, skipping a "Season NN" level.
function folderTitle(filePath: string): string {
  const dir = path.dirname(filePath);
  const parent = path.basename(dir);
  const name = /^(season\b|specials?$)/i.test(parent) ? path.basename(path.dirname(dir)) : parent;
  return name === '.' ? '' : cleanShowName(stripNoise(name));
}

function splitExtension(base: string) {
  const ext = path.extname(base);
  if (!EXTENSION_RE.test(ext)) return { stem: base, extension: '' };
  return { stem: base.slice(0, -ext.length), extension: ext };
}

/**
 * Reads what a media filename says about itself. Returns null when the
 * name carries no episode marker, year or special keyword.
 */
export function extractShowInfo(filePath: string): ParsedMediaName | null {
  const base = path.basename(filePath);
  const { stem, extension } = splitExtension(base);
  const quality = stem.match(QUALITY_RE)?.[1];

  const anime = stem.match(ANIME_RE)?.groups;
  if (anime) {
    return new ParsedMediaName({
      mediaType: 'anime',
      title: cleanShowName(anime.show ?? ''),
      extension,
      quality,
      episodes: [Number(anime.episode)],
      group: anime.group,
      version: anime.version ? Number(anime.version) : undefined,
    });
  }

  const marker = matchEpisodeMarker(stem);
  if (marker) {
    let show = marker.show;
    let year: number | undefined;
    const y = show.match(TRAILING_YEAR_RE);
    if (y && y.index !== undefined) {
      year = Number(y[1]);
      show = show.slice(0, y.index);
    }
    const episodes = detectMultiEpisodes(stem);
    const info = new ParsedMediaName({
      mediaType: 'series',
      title: cleanShowName(show) || folderTitle(filePath),
      extension,
      quality,
      season: marker.season,
      episodes: episodes.length || marker.episode === 0 ? episodes : [marker.episode],
      episodeTitle: cleanTitle(marker.title),
      year,
      specialType: marker.season === 0 ? 'special' : undefined,
      specialNumber: marker.season === 0 && marker.episode > 0 ? marker.episode : undefined,
    });
    log('debug', `extractShowInfo: ${base} -> ${info.title} S${info.season} E${info.episodes.join(',')}`);
    return info;
  }

  const movie = stem.match(MOVIE_RE)?.groups;
  if (movie) {
    return new ParsedMediaName({
      mediaType: 'movie',
      title: cleanShowName(stripNoise(movie.movie ?? '')),
      extension,
      quality,
      episodes: [],
      year: Number(movie.year),
    });
  }

  const special = detectSpecialEpisodes(stem);
  if (special) {
    const at = stem.search(SPECIAL_KEYWORD_RE);
    return new ParsedMediaName({
      mediaType: 'series',
      title: cleanShowName(stripNoise(stem.slice(0, Math.max(0, at)))) || folderTitle(filePath),
      extension,
      quality,
      season: 0,
      episodes: special.number === null ? [] : [special.number],
      specialType: special.type,
      specialNumber: special.number ?? undefined,
    });
  }

  log('warn', `Could not extract media info from ${base}`);
  return null;
}
