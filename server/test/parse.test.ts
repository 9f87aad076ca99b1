import { describe, expect, it } from 'vitest';
import { cleanShowName, extractShowInfo } from '../src/parse.js';

describe('cleanShowName', () => {
  it('turns separators into single spaces', () => {
    expect(cleanShowName('Some.Show_Name - Here ')).toBe('Some Show Name Here');
  });
});

describe('extractShowInfo', () => {
  it('reads a dotted episode release', () => {
    expect(extractShowInfo('/in/Breaking.Show.S02E03.The.Return.720p.mkv')?.toRecord()).toEqual({
      mediaType: 'series',
      title: 'Breaking Show',
      extension: '.mkv',
      quality: '720p',
      season: 2,
      episodes: [3],
      episodeTitle: 'The Return',
      year: null,
      group: null,
      version: null,
      specialType: null,
      specialNumber: null,
    });
  });

  it('moves a year out of the show name', () => {
    const info = extractShowInfo('Doctor.Show.2005.S01E01.mkv');
    expect(info?.title).toBe('Doctor Show');
    expect(info?.year).toBe(2005);
    expect(info?.episodes).toEqual([1]);
    expect(info?.episodeTitle).toBeUndefined();
  });

  it('moves a parenthesized year out of the show name', () => {
    const info = extractShowInfo('Show (2010) - S01E02.mkv');
    expect(info?.title).toBe('Show');
    expect(info?.year).toBe(2010);
  });

  it('reads the NxNN layout', () => {
    const info = extractShowInfo('Old Show - 3x04 - Something.avi');
    expect(info?.title).toBe('Old Show');
    expect(info?.season).toBe(3);
    expect(info?.episodes).toEqual([4]);
    expect(info?.episodeTitle).toBe('Something');
    expect(info?.extension).toBe('.avi');
  });

  it('reads the spelled-out layout', () => {
    const info = extractShowInfo('The Show - Season 2 Episode 5 - Finale.mp4');
    expect(info?.title).toBe('The Show');
    expect(info?.season).toBe(2);
    expect(info?.episodes).toEqual([5]);
    expect(info?.episodeTitle).toBe('Finale');
  });

  it('keeps every episode of a multi-episode file', () => {
    expect(extractShowInfo('Show.S01E01E02.mkv')?.episodes).toEqual([1, 2]);
  });

  it('reads a movie with its year', () => {
    const info = extractShowInfo('The.Great.Film.2019.1080p.BluRay.mkv');
    expect(info?.mediaType).toBe('movie');
    expect(info?.title).toBe('The Great Film');
    expect(info?.year).toBe(2019);
    expect(info?.quality).toBe('1080p');
    expect(info?.episodes).toEqual([]);
  });

  it('reads a fansub anime release', () => {
    const info = extractShowInfo('[SubGroup] Some Anime - 05v2 [1080p].mkv');
    expect(info?.mediaType).toBe('anime');
    expect(info?.title).toBe('Some Anime');
    expect(info?.episodes).toEqual([5]);
    expect(info?.group).toBe('SubGroup');
    expect(info?.version).toBe(2);
    expect(info?.quality).toBe('1080p');
  });

  it('files season zero as a special', () => {
    const info = extractShowInfo('Show.S00E03.Behind.The.Scenes.mkv');
    expect(info?.isSpecial).toBe(true);
    expect(info?.specialType).toBe('special');
    expect(info?.specialNumber).toBe(3);
    expect(info?.season).toBe(0);
  });

  it('keeps no episode for an E00 marker', () => {
    const info = extractShowInfo('Show.S01E00.Pilot.Pitch.mkv');
    expect(info?.season).toBe(1);
    expect(info?.episodes).toEqual([]);
  });

  it('reads a bare special keyword', () => {
    const info = extractShowInfo('Show.OVA.2.mkv');
    expect(info?.title).toBe('Show');
    expect(info?.season).toBe(0);
    expect(info?.episodes).toEqual([2]);
    expect(info?.specialType).toBe('ova');
    expect(info?.specialNumber).toBe(2);
  });

  it('takes the show from the folders when the name has none', () => {
    const info = extractShowInfo('/media/Great Show/Season 01/S01E02.mkv');
    expect(info?.title).toBe('Great Show');
    expect(info?.season).toBe(1);
    expect(info?.episodes).toEqual([2]);
  });

  it('does not mistake a marker for an extension', () => {
    expect(extractShowInfo('Show.S01E01')?.extension).toBe('');
  });

  it('returns null when nothing is recognized', () => {
    expect(extractShowInfo('random_notes.txt')).toBeNull();
  });
});
