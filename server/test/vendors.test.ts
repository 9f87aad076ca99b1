import { describe, expect, it } from 'vitest';
import { TmdbClient } from '../src/tmdb.js';
import { TvdbClient } from '../src/tvdb.js';
import { TvmazeClient } from '../src/tvmaze.js';
import { failure, json, queueFetch, requestHeaders, requestUrl, text } from './helpers.js';

const login = () => json({ status: 'success', data: { token: 'test-token' } });

describe('TvdbClient', () => {
  function setup(responses: Parameters<typeof queueFetch>, options: { apiKey?: string; pin?: string } = { apiKey: 'test-secret' }) {
    const fetch = queueFetch(...responses);
    const clock = { now: 0 };
    const client = new TvdbClient({ ...options, fetch, now: () => clock.now });
    return { client, fetch, clock };
  }

  it('needs an API key', async () => {
    const { client, fetch } = setup([], {});
    const err = await failure(client.searchSeries('Show'));
    expect(err.kind).toBe('ClientConfigurationFailure');
    expect(err.vendor).toBe('tvdb');
    expect(err.message).toBe('TVDB API key not set');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('logs in before the first lookup and sends the token', async () => {
    const { client, fetch } = setup(
      [
        login(),
        json({
          data: [
            { tvdb_id: '121361', name: 'Show Original', translations: { eng: 'Show English' }, year: '2011' },
            { id: 5, name: 'Other', first_air_time: '2001-03-04' },
          ],
        }),
      ],
      { apiKey: 'test-secret', pin: '1234' },
    );

    await expect(client.searchSeries('Show')).resolves.toEqual([
      { id: 121361, name: 'Show English', year: 2011, type: 'series', source: 'tvdb' },
      { id: 5, name: 'Other', year: 2001, type: 'series', source: 'tvdb' },
    ]);

    expect(requestUrl(fetch, 0)).toBe('https://api4.thetvdb.com/v4/login');
    expect(fetch.mock.calls[0][1].body).toBe('{"apikey":"test-secret","pin":"1234"}');
    expect(requestHeaders(fetch, 0).get('authorization')).toBeNull();
    expect(requestUrl(fetch, 1)).toBe('https://api4.thetvdb.com/v4/search?query=Show&type=series');
    expect(requestHeaders(fetch, 1).get('authorization')).toBe('Bearer test-token');
    expect(client.hasToken).toBe(true);
  });

  it('reuses the token until it ages out', async () => {
    const { client, fetch, clock } = setup([login(), json({ data: [] }), json({ data: [] }), login(), json({ data: [] })]);
    await client.searchSeries('One');
    await client.searchSeries('Two');
    expect(fetch).toHaveBeenCalledTimes(3);

    clock.now = 24 * 60 * 60 * 1000;
    expect(client.hasToken).toBe(false);
    await client.searchSeries('Three');
    expect(requestUrl(fetch, 3)).toBe('https://api4.thetvdb.com/v4/login');
    expect(fetch).toHaveBeenCalledTimes(5);
  });

  it('logs in again after the token is dropped', async () => {
    const { client, fetch } = setup([login(), json({ data: {} }), login(), json({ data: {} })]);
    await client.getSeries(1);
    client.invalidateToken();
    await client.getSeries(2);
    expect(fetch.mock.calls.map(c => c[0])).toEqual([
      'https://api4.thetvdb.com/v4/login',
      'https://api4.thetvdb.com/v4/series/1',
      'https://api4.thetvdb.com/v4/login',
      'https://api4.thetvdb.com/v4/series/2',
    ]);
  });

  it('reports a login without a token', async () => {
    const { client } = setup([json({ data: {} })]);
    const err = await failure(client.authenticate());
    expect(err.kind).toBe('AuthenticationFailure');
    expect(err.message).toBe('TVDB login returned no token');
  });

  it('reports a rejected key', async () => {
    const { client } = setup([text('invalid key', 401)]);
    const err = await failure(client.authenticate());
    expect(err.kind).toBe('AuthenticationFailure');
    expect(err.vendor).toBe('tvdb');
    expect(err.statusCode).toBe(401);
  });

  it('finds an episode by aired order', async () => {
    const { client, fetch } = setup([
      login(),
      json({
        data: {
          episodes: [
            { id: 1, seasonNumber: 2, number: 3, name: 'The Return', aired: '2012-01-01' },
            { id: 2, seasonNumber: 2, number: 4, name: 'Next' },
          ],
        },
      }),
    ]);
    await expect(client.getEpisodeByAiredOrder(77, 2, 3)).resolves.toEqual({
      id: 1,
      seasonNumber: 2,
      number: 3,
      name: 'The Return',
      aired: '2012-01-01',
    });
    expect(requestUrl(fetch, 1)).toBe('https://api4.thetvdb.com/v4/series/77/episodes/default?page=0&season=2&language=eng');
  });

  it('returns null for an episode the season does not have', async () => {
    const { client } = setup([login(), json({ data: { episodes: [] } })]);
    await expect(client.getEpisodeByAiredOrder(77, 2, 30)).resolves.toBeNull();
  });
});

describe('TmdbClient', () => {
  function setup(responses: Parameters<typeof queueFetch>, apiKey = 'test-secret') {
    const fetch = queueFetch(...responses);
    return { client: new TmdbClient({ apiKey, fetch }), fetch };
  }

  it('needs an API key', async () => {
    const { client } = setup([], '');
    const err = await failure(client.searchMovie('Film'));
    expect(err.kind).toBe('ClientConfigurationFailure');
    expect(err.vendor).toBe('tmdb');
  });

  it('searches movies', async () => {
    const { client, fetch } = setup([
      json({ results: [{ id: 603, title: 'The Great Film', release_date: '2019-02-01' }, { id: 7, title: 'Untitled' }] }),
    ]);
    await expect(client.searchMovie('Great Film', 2019)).resolves.toEqual([
      { id: 603, name: 'The Great Film', year: 2019, type: 'movie', source: 'tmdb' },
      { id: 7, name: 'Untitled', year: undefined, type: 'movie', source: 'tmdb' },
    ]);
    expect(requestUrl(fetch, 0)).toBe('https://api.themoviedb.org/3/search/movie?query=Great+Film&year=2019&api_key=test-secret&language=en-US');
  });

  it('searches shows by first air year', async () => {
    const { client, fetch } = setup([json({ results: [{ id: 1399, name: 'Some Show', first_air_date: '2011-04-17' }] })]);
    await expect(client.searchTv('Some Show', 2011)).resolves.toEqual([
      { id: 1399, name: 'Some Show', year: 2011, type: 'series', source: 'tmdb' },
    ]);
    expect(requestUrl(fetch, 0)).toBe(
      'https://api.themoviedb.org/3/search/tv?query=Some+Show&first_air_date_year=2011&api_key=test-secret&language=en-US',
    );
  });

  it('caches detail lookups', async () => {
    const { client, fetch } = setup([json({ id: 603, title: 'The Great Film' })]);
    await client.getMovie(603);
    await expect(client.getMovie(603)).resolves.toEqual({ id: 603, title: 'The Great Film' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });
});

describe('TvmazeClient', () => {
  function setup(responses: Parameters<typeof queueFetch>) {
    const fetch = queueFetch(...responses);
    return { client: new TvmazeClient({ fetch }), fetch };
  }

  it('searches shows', async () => {
    const { client, fetch } = setup([
      json([{ score: 0.9, show: { id: 82, name: 'Show', premiered: '2011-04-17' } }, { score: 0.1 }]),
    ]);
    await expect(client.searchShows('Show')).resolves.toEqual([
      { id: 82, name: 'Show', year: 2011, type: 'series', source: 'tvmaze' },
    ]);
    expect(requestUrl(fetch, 0)).toBe('https://api.tvmaze.com/search/shows?q=Show');
  });

  it('looks up an episode by number', async () => {
    const { client, fetch } = setup([json({ id: 4953, season: 1, number: 2, name: 'Second Step', airdate: '2011-04-24' })]);
    await expect(client.getEpisodeByNumber(82, 1, 2)).resolves.toEqual({
      id: 4953,
      season: 1,
      number: 2,
      name: 'Second Step',
      airdate: '2011-04-24',
    });
    expect(requestUrl(fetch, 0)).toBe('https://api.tvmaze.com/shows/82/episodebynumber?season=1&number=2');
  });

  it('returns null for a missing episode', async () => {
    const { client } = setup([text('', 404)]);
    await expect(client.getEpisodeByNumber(82, 9, 9)).resolves.toBeNull();
  });

  it('passes other failures on', async () => {
    const { client } = setup([text('down', 500)]);
    const err = await failure(client.getEpisodeByNumber(82, 1, 1));
    expect(err.kind).toBe('ServerFailure');
    expect(err.vendor).toBe('tvmaze');
  });
});
