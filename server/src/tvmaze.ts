import { ApiClient, type ApiClientOptions } from './apiClient.js';
import { isErrorKind } from './errors.js';
import { isRecord, safeCast } from './safeCast.js';
import type { MatchCandidate } from './types.js';

export const TVMAZE_BASE_URL = 'https://api.tvmaze.com';

export interface TvmazeOptions extends Omit<ApiClientOptions, 'baseUrl'> {
  baseUrl?: string;
}

export interface TvmazeEpisode {
  id: number;
  season: number;
  number: number;
  name: string;
  airdate?: string;
}

export class TvmazeClient extends ApiClient {
  protected override readonly vendor = 'tvmaze' as const;

  constructor(options: TvmazeOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? TVMAZE_BASE_URL });
  }

  // public API, no credentials
  async authenticate(): Promise<void> {}

  async searchShows(query: string): Promise<MatchCandidate[]> {
    const hits = await this.get('search/shows', { params: { q: query } });
    if (!Array.isArray(hits)) return [];
    return hits.filter(isRecord).flatMap(hit => {
      const show = hit.show;
      if (!isRecord(show)) return [];
      const premiered = safeCast('string', show.premiered, '');
      return [{
        id: safeCast('integer', show.id, 0),
        name: safeCast('string', show.name, ''),
        year: /^\d{4}/.test(premiered) ? Number(premiered.slice(0, 4)) : undefined,
        type: 'series' as const,
        source: 'tvmaze' as const,
      }];
    });
  }

  async getShow(id: number): Promise<Record<string, unknown>> {
    const data = await this.get(`shows/${id}`);
    return isRecord(data) ? data : {};
  }

  /** The episode at that position, or null when the show has none there. */
  async getEpisodeByNumber(showId: number, season: number, episode: number): Promise<TvmazeEpisode | null> {
    let data: unknown;
    try {
      data = await this.get(`shows/${showId}/episodebynumber`, { params: { season, number: episode } });
    } catch (err) {
      if (isErrorKind(err, 'NotFound')) return null;
      throw err;
    }
    if (!isRecord(data)) return null;
    return {
      id: safeCast('integer', data.id, 0),
      season: safeCast('integer', data.season, season),
      number: safeCast('integer', data.number, episode),
      name: safeCast('string', data.name, ''),
      airdate: typeof data.airdate === 'string' ? data.airdate : undefined,
    };
  }
}
