import type { QueryParams } from './apiClient.js';
import { log } from './logging.js';
import { canonicalJson, LruCache } from './lruCache.js';
import { RateLimitedApiClient, type RateLimitedClientOptions } from './rateLimitedClient.js';
import { isRecord, safeCast } from './safeCast.js';

export const MUSICBRAINZ_BASE_URL = 'https://musicbrainz.org/ws/2';

export type MusicBrainzEntity = Record<string, unknown>;

export interface MusicBrainzOptions extends Omit<RateLimitedClientOptions, 'baseUrl'> {
  baseUrl?: string;
  appName?: string;
  appVersion?: string;
  contactEmail?: string;
}

export interface MusicMatch {
  artist: string;
  artistId: string;
  artistScore: number;
  album?: string;
  albumId?: string;
  albumScore?: number;
  year?: string | null;
  track?: string;
  trackId?: string;
  trackScore?: number;
  trackNumber?: string;
  discNumber?: number;
}

export interface MusicVerification {
  match: MusicMatch | null;
  confidence: number;
}

const DEFAULT_SCORE = 0.8;

export function buildUserAgent(appName: string, appVersion: string, contact = ''): string {
  const base = `${appName}/${appVersion}`;
  return contact ? `${base} ( ${contact} )` : base;
}

function entityList(response: unknown, key: string): MusicBrainzEntity[] {
  if (!isRecord(response)) return [];
  const list = response[key];
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

function entity(response: unknown): MusicBrainzEntity {
  return isRecord(response) ? response : {};
}

function str(value: unknown): string {
  return safeCast('string', value, '');
}

/**
 * MusicBrainz web service client. MusicBrainz allows one request per
 * second per client and requires a descriptive User-Agent.
 */
export class MusicBrainzClient extends RateLimitedApiClient {
  protected override readonly vendor = 'musicbrainz' as const;
  readonly userAgent: string;
  private readonly listMemo: LruCache<MusicBrainzEntity[]>;
  private readonly entityMemo: LruCache<MusicBrainzEntity>;

  constructor(options: MusicBrainzOptions = {}) {
    super({ ...options, baseUrl: options.baseUrl ?? MUSICBRAINZ_BASE_URL });
    this.userAgent = buildUserAgent(options.appName ?? 'reelsort', options.appVersion ?? '1.0', options.contactEmail ?? '');
    this.listMemo = new LruCache<MusicBrainzEntity[]>(options.cacheSize ?? 100);
    this.entityMemo = new LruCache<MusicBrainzEntity>(options.cacheSize ?? 100);
    log('debug', `Initialized MusicBrainz client with user-agent: ${this.userAgent}`);
  }

  async authenticate(): Promise<void> {
    // anonymous read access only
  }

  protected override authHeaders(): Record<string, string> {
    return { 'User-Agent': this.userAgent };
  }

  override clearCache(): void {
    this.listMemo.clear();
    this.entityMemo.clear();
    super.clearCache();
  }

  searchArtist(query: string): Promise<MusicBrainzEntity[]> {
    return memoize(this.listMemo, 'searchArtist', [query], async () => entityList(await this.lookup('artist', { query }), 'artists'));
  }

  getArtist(mbid: string, includeReleases = false): Promise<MusicBrainzEntity> {
    return memoize(this.entityMemo, 'getArtist', [mbid, includeReleases], async () =>
      entity(await this.lookup(`artist/${mbid}`, includeReleases ? { inc: 'releases' } : {})));
  }

  searchRelease(query: string): Promise<MusicBrainzEntity[]> {
    return memoize(this.listMemo, 'searchRelease', [query], async () => entityList(await this.lookup('release', { query }), 'releases'));
  }

  getRelease(mbid: string, includeRecordings = false): Promise<MusicBrainzEntity> {
    return memoize(this.entityMemo, 'getRelease', [mbid, includeRecordings], async () =>
      entity(await this.lookup(`release/${mbid}`, includeRecordings ? { inc: 'recordings' } : {})));
  }

  searchTrack(query: string): Promise<MusicBrainzEntity[]> {
    return memoize(this.listMemo, 'searchTrack', [query], async () => entityList(await this.lookup('recording', { query }), 'recordings'));
  }

  getTrack(mbid: string): Promise<MusicBrainzEntity> {
    return memoize(this.entityMemo, 'getTrack', [mbid], async () => entity(await this.lookup(`recording/${mbid}`, {})));
  }

  /**
   * Looks up artist, then album within that artist, then the track within
   * the first matching release. Takes the first result at each step.
   */
  async verifyMusicFile(artist: string, album?: string, track?: string): Promise<MusicVerification> {
    const artists = await this.searchArtist(artist);
    if (!artists.length) {
      log('warn', `No artists found matching '${artist}'`);
      return { match: null, confidence: 0 };
    }

    const bestArtist = artists[0];
    const match: MusicMatch = {
      artist: str(bestArtist.name),
      artistId: str(bestArtist.id),
      artistScore: DEFAULT_SCORE,
    };

    if (album) {
      const releases = await this.searchRelease(`release:${album} AND artist:${match.artist}`);
      const bestRelease = releases[0];
      if (bestRelease) {
        const date = typeof bestRelease.date === 'string' ? bestRelease.date : null;
        match.album = str(bestRelease.title);
        match.albumId = str(bestRelease.id);
        match.albumScore = DEFAULT_SCORE;
        match.year = date === null ? null : date.split('-')[0];

        if (track && match.albumId) {
          const details = await this.getRelease(match.albumId, true);
          const found = findTrack(details, track);
          if (found) Object.assign(match, found, { trackScore: DEFAULT_SCORE });
        }
      }
    }

    let confidence = match.artistScore;
    if (match.albumScore !== undefined) confidence = (confidence + match.albumScore) / 2;
    if (match.trackScore !== undefined) confidence = (confidence + match.trackScore) / 3;
    return { match, confidence };
  }

  private lookup(endpoint: string, params: QueryParams): Promise<unknown> {
    // memoized one level up, so the response cache would only duplicate it
    return this.get(endpoint, { params: { ...params, fmt: 'json' }, useCache: false });
  }

}

async function memoize<T>(cache: LruCache<T>, method: string, args: unknown[], load: () => Promise<T>): Promise<T> {
  const key = `${method}:${canonicalJson(args)}`;
  const hit = cache.get(key);
  if (hit !== undefined) return hit;
  const value = await load();
  cache.set(key, value);
  return value;
}

function findTrack(release: MusicBrainzEntity, wanted: string): Pick<MusicMatch, 'track' | 'trackId' | 'trackNumber' | 'discNumber'> | null {
  const media = Array.isArray(release.media) ? release.media.filter(isRecord) : [];
  const needle = wanted.toLowerCase();
  for (const medium of media) {
    const tracks = Array.isArray(medium.tracks) ? medium.tracks.filter(isRecord) : [];
    for (const info of tracks) {
      const title = str(info.title);
      if (title.toLowerCase().includes(needle)) {
        return {
          track: title,
          trackId: str(info.id),
          trackNumber: str(info.number),
          discNumber: safeCast('integer', medium.position, 0),
        };
      }
    }
  }
  return null;
}
