import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DEFAULT_SETTINGS,
  historyPath,
  librariesPath,
  loadLibraries,
  loadSettings,
  parseLibrary,
  saveLibraries,
  saveSettings,
  settingsPath,
} from '../src/config.js';
import { DEFAULT_TEMPLATES } from '../src/templates.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-test-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, value: unknown) {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
}

describe('file locations', () => {
  it('reads overrides from the environment', () => {
    expect(settingsPath({ SETTINGS_PATH: '/etc/app/settings.json' })).toBe('/etc/app/settings.json');
    expect(librariesPath({ CONFIG_PATH: '/etc/app/libraries.json' })).toBe('/etc/app/libraries.json');
    expect(librariesPath({})).toBe(path.resolve('config/libraries.json'));
  });

  it('keeps the rename history beside the libraries', () => {
    expect(historyPath({})).toBe(path.resolve('config/history.json'));
    expect(historyPath({ CONFIG_PATH: '/etc/app/libraries.json' })).toBe('/etc/app/history.json');
    expect(historyPath({ CONFIG_PATH: '/etc/app/libraries.json', HISTORY_PATH: '/var/lib/app/history.json' })).toBe('/var/lib/app/history.json');
  });
});

describe('loadSettings', () => {
  it('uses the defaults without a file or environment', () => {
    expect(loadSettings({}, path.join(dir, 'missing.json'))).toEqual(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS.templates).toEqual(DEFAULT_TEMPLATES);
  });

  it('reads the settings file', () => {
    const file = writeJson('settings.json', {
      port: 9000,
      tvdbApiKey: 'file-key',
      api: { cacheSize: 50, autoRetry: true },
      templates: { movie: '{title}' },
    });
    const settings = loadSettings({}, file);
    expect(settings.port).toBe(9000);
    expect(settings.tvdbApiKey).toBe('file-key');
    expect(settings.api).toEqual({ cacheSize: 50, autoRetry: true, timeoutSeconds: 10 });
    expect(settings.templates.movie).toBe('{title}');
    expect(settings.templates.series).toBe(DEFAULT_TEMPLATES.series);
  });

  it('lets the environment win over the file', () => {
    const file = writeJson('settings.json', { port: 9000, api: { cacheSize: 50, autoRetry: true } });
    const settings = loadSettings(
      { PORT: '7000', TVDB_API_KEY: 'test-secret', API_AUTO_RETRY: 'no', API_CACHE_SIZE: 'abc', MB_CONTACT: 'dev@example.test' },
      file,
    );
    expect(settings.port).toBe(7000);
    expect(settings.tvdbApiKey).toBe('test-secret');
    expect(settings.api.autoRetry).toBe(false);
    // an unusable value falls back to the default, not the file
    expect(settings.api.cacheSize).toBe(100);
    expect(settings.musicbrainz.contact).toBe('dev@example.test');
  });

  it('rejects non-positive numbers', () => {
    expect(loadSettings({ PORT: '-1', API_TIMEOUT: '0' }, path.join(dir, 'missing.json'))).toMatchObject({
      port: 8080,
      api: { timeoutSeconds: 10 },
    });
  });

  it('ignores a corrupt file', () => {
    const file = path.join(dir, 'settings.json');
    fs.writeFileSync(file, '{ not json');
    expect(loadSettings({}, file)).toEqual(DEFAULT_SETTINGS);
  });

  it('reads back what it saved', () => {
    const file = path.join(dir, 'nested', 'settings.json');
    const settings = { ...DEFAULT_SETTINGS, port: 9100, tmdbApiKey: 'test-secret' };
    saveSettings(settings, file);
    expect(loadSettings({}, file)).toEqual(settings);
  });
});

describe('parseLibrary', () => {
  const valid = { id: 'tv', name: 'TV', type: 'series', inputRoot: '/media//tv\\shows', outputRoot: '/library/tv' };

  it('normalizes the roots', () => {
    expect(parseLibrary(valid)).toEqual({
      id: 'tv',
      name: 'TV',
      type: 'series',
      inputRoot: '/media/tv/shows',
      outputRoot: '/library/tv',
    });
  });

  it('reads link options', () => {
    const lib = parseLibrary({ ...valid, linkMode: 'rename', allowCopyFallback: 'yes' });
    expect(lib?.linkMode).toBe('rename');
    expect(lib?.allowCopyFallback).toBe(true);
  });

  it.each([
    ['a missing id', { ...valid, id: '' }],
    ['an unknown type', { ...valid, type: 'music' }],
    ['a blank root', { ...valid, outputRoot: '  ' }],
    ['an unknown link mode', { ...valid, linkMode: 'symlink' }],
    ['a non-object', 'tv'],
  ])('rejects %s', (_label, entry) => {
    expect(parseLibrary(entry)).toBeNull();
  });
});

describe('library storage', () => {
  it('returns nothing when the file is missing', () => {
    expect(loadLibraries(path.join(dir, 'libraries.json'))).toEqual([]);
  });

  it('skips invalid entries and duplicates', () => {
    const file = writeJson('libraries.json', [
      { id: 'a', name: 'A', type: 'movie', inputRoot: '/in', outputRoot: '/out' },
      { id: 'broken' },
      { id: 'b', name: 'B', type: 'movie', inputRoot: '/in', outputRoot: '/out' },
      { id: 'c', name: 'C', type: 'anime', inputRoot: '/in', outputRoot: '/out' },
    ]);
    expect(loadLibraries(file).map(l => l.id)).toEqual(['a', 'c']);
  });

  it('saves into a new folder', () => {
    const file = path.join(dir, 'config', 'libraries.json');
    saveLibraries([{ id: 'a', name: 'A', type: 'series', inputRoot: '/in', outputRoot: '/out' }], file);
    expect(loadLibraries(file)).toEqual([{ id: 'a', name: 'A', type: 'series', inputRoot: '/in', outputRoot: '/out' }]);
  });
});
