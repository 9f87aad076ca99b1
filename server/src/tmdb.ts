import { ApiClient, type ApiClientOptions, type QueryParams } from './apiClient.js';
import { log } from './logging.js';
import { isRecord, safeCast } from './safeCast.js';
import type { MatchCandidate, MediaType } from './types.js';

export const TMDB_BASE_URL = 'https://api.themoviedb.org/3';

export interface TmdbOptions extends Omit<ApiClientOptions, 'baseUrl'> {
  baseUrl?: string;
  apiKey?: string;
  language?: string;
}

function results(response: unknown): Record<string, unknown>[] {
  if (!isRecord(response) || !Array.isArray(response.results)) return [];
  return response.results.filter(isRecord);
}

function toCandidate(d: Record<string, unknown>, type: MediaType): MatchCandidate {
  const name = type === 'movie' ? d.title : d.name;
  const date = safeCast('string', type === 'movie' ? d.release_date : d.first_air_date, '');
  return {
    id: safeCast('integer', d.id, 0),
    name: safeCast('string', name, ''),
    year: /^\d{4}/.test(date) ? Number(date.slice(0, 4)) : undefined,
    type,
    source: 'tmdb',
  };
}

/** The Movie Database v3, keyed by an `api_key` query parameter. */
export class TmdbClient extends ApiClient {
  protected override readonly vendor = 'tmdb' as const;
  private readonly apiKey: string;
  private readonly language: string;

  constructor(options: TmdbOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? TMDB_BASE_URL });
    this.apiKey = options.apiKey ?? '';
    this.language = options.language ?? 'en-US';
  }

  // The key travels with every request, so there is nothing to exchange.
  async authenticate(): Promise<void> {
    if (!this.apiKey) throw this.error('ClientConfigurationFailure', 'TMDB API key not set');
  }

  private async fetchJson(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    await this.authenticate();
    return this.get(endpoint, { params: { ...params, api_key: this.apiKey, language: this.language } });
  }

  async searchMovie(query: string, year?: number): Promise<MatchCandidate[]> {
    const hits = results(await this.fetchJson('search/movie', { query, year }));
    log('debug', `searchMovie: query=${query} year=${year ?? ''} results=${hits.length}`);
    return hits.map(d => toCandidate(d, 'movie'));
  }

  async searchTv(query: string, year?: number): Promise<MatchCandidate[]> {
    const hits = results(await this.fetchJson('search/tv', { query, first_air_date_year: year }));
    log('debug', `searchTv: query=${query} year=${year ?? ''} results=${hits.length}`);
    return hits.map(d => toCandidate(d, 'series'));
  }

  async getMovie(id: number): Promise<Record<string, unknown>> {
    const data = await this.fetchJson(`movie/${id}`);
    return isRecord(data) ? data : {};
  }

  async getTv(id: number): Promise<Record<string, unknown>> {
    const data = await this.fetchJson(`tv/${id}`);
    return isRecord(data) ? data : {};
  }
}
