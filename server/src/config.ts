import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors.js';
import { log } from './logging.js';
import { isRecord, safeCast } from './safeCast.js';
import { DEFAULT_TEMPLATES } from './templates.js';
import type { Library, LinkMode, MediaType } from './types.js';

export interface ApiSettings {
  cacheSize: number;
  autoRetry: boolean;
  timeoutSeconds: number;
}

export interface MusicBrainzSettings {
  appName: string;
  appVersion: string;
  contact: string;
}

export interface Settings {
  port: number;
  tvdbApiKey: string;
  tvdbPin: string;
  tmdbApiKey: string;
  api: ApiSettings;
  musicbrainz: MusicBrainzSettings;
  templates: Record<MediaType, string>;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  port: 8080,
  tvdbApiKey: '',
  tvdbPin: '',
  tmdbApiKey: '',
  api: { cacheSize: 100, autoRetry: false, timeoutSeconds: 10 },
  musicbrainz: { appName: 'reelsort', appVersion: '1.0', contact: '' },
  templates: { ...DEFAULT_TEMPLATES },
};

const MEDIA_TYPES: readonly MediaType[] = ['movie', 'series', 'anime'];
const LINK_MODES: readonly LinkMode[] = ['hardlink', 'rename'];

export function settingsPath(env: Env = process.env) {
  return path.resolve(env.SETTINGS_PATH || 'config/settings.json');
}

export function librariesPath(env: Env = process.env) {
  return path.resolve(env.CONFIG_PATH || 'config/libraries.json');
}

/** Applied-rename history, kept beside the libraries file unless HISTORY_PATH says otherwise. */
export function historyPath(env: Env = process.env) {
  return path.resolve(env.HISTORY_PATH || path.join(path.dirname(librariesPath(env)), 'history.json'));
}

export function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    log('warn', `Ignoring unreadable config ${file}: ${errorMessage(e)}`);
    return undefined;
  }
}

function positiveInt(value: unknown, fallback: number) {
  const n = safeCast('integer', value, fallback);
  return n > 0 ? n : fallback;
}

function str(value: unknown, fallback: string) {
  return value === undefined || value === null ? fallback : safeCast('string', value, fallback);
}

function bool(value: unknown, fallback: boolean) {
  return value === undefined || value === null ? fallback : safeCast('boolean', value, fallback);
}

/**
 * Settings file overlaid with environment variables. Values that cannot be
 * coerced keep their defaults.
 */
export function loadSettings(env: Env = process.env, file = settingsPath(env)): Settings {
  const raw = readJson(file);
  const stored = isRecord(raw) ? raw : {};
  const api = safeCast('object', stored.api, {});
  const mb = safeCast('object', stored.musicbrainz, {});
  const templates = safeCast('object', stored.templates, {});
  const d = DEFAULT_SETTINGS;

  return {
    port: positiveInt(env.PORT ?? stored.port, d.port),
    tvdbApiKey: str(env.TVDB_API_KEY ?? stored.tvdbApiKey, d.tvdbApiKey),
    tvdbPin: str(env.TVDB_PIN ?? stored.tvdbPin, d.tvdbPin),
    tmdbApiKey: str(env.TMDB_API_KEY ?? stored.tmdbApiKey, d.tmdbApiKey),
    api: {
      cacheSize: positiveInt(env.API_CACHE_SIZE ?? api.cacheSize, d.api.cacheSize),
      autoRetry: bool(env.API_AUTO_RETRY ?? api.autoRetry, d.api.autoRetry),
      timeoutSeconds: positiveInt(env.API_TIMEOUT ?? api.timeoutSeconds, d.api.timeoutSeconds),
    },
    musicbrainz: {
      appName: str(env.MB_APP_NAME ?? mb.appName, d.musicbrainz.appName),
      appVersion: str(env.MB_APP_VERSION ?? mb.appVersion, d.musicbrainz.appVersion),
      contact: str(env.MB_CONTACT ?? mb.contact, d.musicbrainz.contact),
    },
    templates: {
      series: str(env.TV_TEMPLATE ?? templates.series, d.templates.series),
      movie: str(env.MOVIE_TEMPLATE ?? templates.movie, d.templates.movie),
      anime: str(env.ANIME_TEMPLATE ?? templates.anime, d.templates.anime),
    },
  };
}

export function saveSettings(settings: Settings, file = settingsPath()) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(settings, null, 2));
}

// Accept Windows-style separators from the UI
function normalizeRoot(p: string) {
  return path.resolve(p.trim().replace(/\\+/g, '/'));
}

/** A library record from untrusted JSON, or null when a field is missing or invalid. */
export function parseLibrary(value: unknown): Library | null {
  if (!isRecord(value)) return null;
  const { id, name, type, inputRoot, outputRoot, linkMode, allowCopyFallback } = value;
  if (typeof id !== 'string' || !id || typeof name !== 'string') return null;
  const mediaType = MEDIA_TYPES.find(t => t === type);
  if (!mediaType) return null;
  if (typeof inputRoot !== 'string' || !inputRoot.trim()) return null;
  if (typeof outputRoot !== 'string' || !outputRoot.trim()) return null;
  if (linkMode !== undefined && !LINK_MODES.some(m => m === linkMode)) return null;
  return {
    id,
    name,
    type: mediaType,
    inputRoot: normalizeRoot(inputRoot),
    outputRoot: normalizeRoot(outputRoot),
    linkMode: LINK_MODES.find(m => m === linkMode),
    allowCopyFallback: allowCopyFallback === undefined ? undefined : bool(allowCopyFallback, false),
  };
}

// Keeps the first library for each type + input + output combination.
function dedupe(libs: Library[]) {
  const seen = new Set<string>();
  return libs.filter(l => {
    const key = `${l.type}|${l.inputRoot}|${l.outputRoot}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function loadLibraries(file = librariesPath()): Library[] {
  const raw = readJson(file);
  if (!Array.isArray(raw)) return [];
  const libs: Library[] = [];
  for (const entry of raw) {
    const lib = parseLibrary(entry);
    if (lib) libs.push(lib);
    else log('warn', `Skipping invalid library entry in ${file}`);
  }
  return dedupe(libs);
}

export function saveLibraries(libs: Library[], file = librariesPath()) {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(dedupe(libs), null, 2));
}
