import { ApiClient, type ApiClientOptions, type QueryParams } from './apiClient.js';
import { log } from './logging.js';
import { isRecord, safeCast } from './safeCast.js';
import type { MatchCandidate, MediaType } from './types.js';

export const TVDB_BASE_URL = 'https://api4.thetvdb.com/v4';

// Tokens are valid for a month; refresh well before that.
const TOKEN_TTL_MS = 23 * 60 * 60 * 1000;

export interface TvdbOptions extends Omit<ApiClientOptions, 'baseUrl'> {
  baseUrl?: string;
  apiKey?: string;
  /** Subscriber PIN, for user-supported keys. */
  pin?: string;
  language?: string;
  now?: () => number;
}

export interface TvdbEpisode {
  id: number;
  seasonNumber: number;
  number: number;
  name: string;
  aired?: string;
}

function dataOf(response: unknown): unknown {
  return isRecord(response) ? response.data : undefined;
}

function yearOf(value: unknown): number | undefined {
  const y = safeCast('string', value, '').slice(0, 4);
  return /^\d{4}$/.test(y) ? Number(y) : undefined;
}

// Prefer an English translation when the search hit carries one.
function preferredName(d: Record<string, unknown>): string {
  const translations = d.translations;
  if (isRecord(translations) && typeof translations.eng === 'string' && translations.eng) return translations.eng;
  return safeCast('string', d.name, '');
}

function toCandidate(d: Record<string, unknown>, type: MediaType): MatchCandidate {
  return {
    id: safeCast('integer', d.tvdb_id ?? d.id, 0),
    name: preferredName(d),
    year: yearOf(d.year) ?? yearOf(d.first_air_time),
    type,
    source: 'tvdb',
  };
}

function toEpisode(e: Record<string, unknown>): TvdbEpisode {
  return {
    id: safeCast('integer', e.id, 0),
    seasonNumber: safeCast('integer', e.seasonNumber, 0),
    number: safeCast('integer', e.number, 0),
    name: safeCast('string', e.name, ''),
    aired: typeof e.aired === 'string' ? e.aired : undefined,
  };
}

/**
 * TheTVDB v4. A single API-key login yields a bearer token, fetched on the
 * first request and renewed once it ages out.
 */
export class TvdbClient extends ApiClient {
  protected override readonly vendor = 'tvdb' as const;
  private readonly apiKey: string;
  private readonly pin: string;
  private readonly language: string;
  private readonly now: () => number;
  private token: string | null = null;
  private tokenExpiresAt = 0;

  constructor(options: TvdbOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? TVDB_BASE_URL });
    this.apiKey = options.apiKey ?? '';
    this.pin = options.pin ?? '';
    this.language = options.language ?? 'eng';
    this.now = options.now ?? Date.now;
  }

  get hasToken() { return this.token !== null && this.now() < this.tokenExpiresAt; }

  async authenticate(): Promise<void> {
    if (!this.apiKey) {
      throw this.error('ClientConfigurationFailure', 'TVDB API key not set');
    }
    this.token = null;
    const body: Record<string, string> = { apikey: this.apiKey };
    if (this.pin) body.pin = this.pin;
    const data = dataOf(await this.post('login', { body }));
    const token = isRecord(data) ? data.token : undefined;
    if (typeof token !== 'string' || !token) {
      throw this.error('AuthenticationFailure', 'TVDB login returned no token');
    }
    this.token = token;
    this.tokenExpiresAt = this.now() + TOKEN_TTL_MS;
    log('info', 'TVDB token refreshed');
  }

  invalidateToken() {
    this.token = null;
    this.tokenExpiresAt = 0;
  }

  protected override authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  private async fetchData(endpoint: string, params?: QueryParams): Promise<unknown> {
    if (!this.hasToken) await this.authenticate();
    return dataOf(await this.get(endpoint, { params }));
  }

  async searchSeries(query: string, year?: number): Promise<MatchCandidate[]> {
    const data = await this.fetchData('search', { query, type: 'series', year });
    const hits = Array.isArray(data) ? data.filter(isRecord) : [];
    log('debug', `searchSeries: query=${query} year=${year ?? ''} results=${hits.length}`);
    return hits.map(d => toCandidate(d, 'series'));
  }

  async getSeries(id: number): Promise<Record<string, unknown>> {
    const data = await this.fetchData(`series/${id}`);
    return isRecord(data) ? data : {};
  }

  async getEpisodes(seriesId: number, season?: number): Promise<TvdbEpisode[]> {
    const data = await this.fetchData(`series/${seriesId}/episodes/default`, { page: 0, season, language: this.language });
    const episodes = isRecord(data) && Array.isArray(data.episodes) ? data.episodes.filter(isRecord) : [];
    return episodes.map(toEpisode);
  }

  async getEpisodeByAiredOrder(seriesId: number, season: number, episode: number): Promise<TvdbEpisode | null> {
    const episodes = await this.getEpisodes(seriesId, season);
    return episodes.find(e => e.seasonNumber === season && e.number === episode) ?? null;
  }
}
