import type { ApiClient, FetchLike } from './apiClient.js';
import type { Settings } from './config.js';
import { isErrorKind } from './errors.js';
import { log } from './logging.js';
import { MusicBrainzClient } from './musicbrainz.js';
import type { Sleep } from './rateLimiter.js';
import { TmdbClient } from './tmdb.js';
import { TvdbClient } from './tvdb.js';
import { TvmazeClient } from './tvmaze.js';
import type { MatchCandidate, MediaType, ShowInfo } from './types.js';

export interface Clients {
  tvdb: TvdbClient;
  tmdb: TmdbClient;
  tvmaze: TvmazeClient;
  musicbrainz: MusicBrainzClient;
}

export interface LookupResult {
  candidate: MatchCandidate | null;
  episodeTitle?: string;
}

/** Transport overrides, for tests. */
export interface ClientOverrides {
  fetch?: FetchLike;
  sleep?: Sleep;
}

export function createClients(settings: Settings, overrides: ClientOverrides = {}): Clients {
  const common = {
    cacheSize: settings.api.cacheSize,
    autoRetry: settings.api.autoRetry,
    timeoutSeconds: settings.api.timeoutSeconds,
    ...overrides,
  };
  return {
    tvdb: new TvdbClient({ ...common, apiKey: settings.tvdbApiKey, pin: settings.tvdbPin }),
    tmdb: new TmdbClient({ ...common, apiKey: settings.tmdbApiKey }),
    tvmaze: new TvmazeClient(common),
    musicbrainz: new MusicBrainzClient({
      ...common,
      appName: settings.musicbrainz.appName,
      appVersion: settings.musicbrainz.appVersion,
      contactEmail: settings.musicbrainz.contact,
    }),
  };
}

export function clearCaches(clients: Clients) {
  const all: ApiClient[] = [clients.tvdb, clients.tmdb, clients.tvmaze, clients.musicbrainz];
  for (const c of all) c.clearCache();
}

/**
 * Resolves parsed file info against the catalogs: TMDB for movies, TVDB
 * for shows when a key is configured, TVMaze otherwise. The first search
 * hit is taken. A missing episode is not an error.
 */
export class MetadataService {
  constructor(private readonly clients: Clients, private readonly settings: Pick<Settings, 'tvdbApiKey' | 'tmdbApiKey'>) {}

  async lookup(info: ShowInfo, type: MediaType): Promise<LookupResult> {
    if (type === 'movie') {
      const [candidate] = await this.clients.tmdb.searchMovie(info.title, info.year);
      return { candidate: candidate ?? null };
    }

    const season = info.specialType ? 0 : info.season ?? 1;
    const episode = info.episodes[0];

    if (this.settings.tvdbApiKey) {
      const [series] = await this.clients.tvdb.searchSeries(info.title, info.year);
      if (!series) return { candidate: null };
      const candidate: MatchCandidate = { ...series, type };
      if (episode === undefined) return { candidate };
      const ep = await this.clients.tvdb.getEpisodeByAiredOrder(series.id, season, episode);
      return { candidate, episodeTitle: ep?.name || undefined };
    }

    const [show] = await this.clients.tvmaze.searchShows(info.title);
    if (!show) return { candidate: null };
    const candidate: MatchCandidate = { ...show, type };
    if (episode === undefined) return { candidate };
    const ep = await this.clients.tvmaze.getEpisodeByNumber(show.id, season, episode);
    return { candidate, episodeTitle: ep?.name || undefined };
  }

  /** Like `lookup`, but a catalog miss (404) yields no candidate instead of an error. */
  async lookupOrSkip(info: ShowInfo, type: MediaType): Promise<LookupResult> {
    try {
      return await this.lookup(info, type);
    } catch (err) {
      if (!isErrorKind(err, 'NotFound')) throw err;
      log('warn', `No catalog entry for ${info.title}`);
      return { candidate: null };
    }
  }
}
