import type { SpecialType } from './episodes.js';
import type { SubtitleFile } from './subtitles.js';

export type MediaType = 'movie' | 'series' | 'anime';
export type LinkMode = 'hardlink' | 'rename';
/** What was done to one file; `copy` when a hardlink fell back. */
export type FileAction = LinkMode | 'copy';
export type MetadataSource = 'tvdb' | 'tmdb' | 'tvmaze';

export interface Library {
  id: string;
  name: string;
  type: MediaType;
  inputRoot: string;
  outputRoot: string;
  linkMode?: LinkMode;
  /** Copy when a hardlink crosses devices. */
  allowCopyFallback?: boolean;
}

/** What a filename alone says about the media it holds. */
export interface ShowInfo {
  mediaType: MediaType;
  title: string;
  extension: string;
  quality?: string;
  season?: number;
  /** Episode numbers in order of appearance; empty for movies. */
  episodes: number[];
  episodeTitle?: string;
  year?: number;
  /** Release group of a fansub-style anime name. */
  group?: string;
  version?: number;
  specialType?: SpecialType;
  specialNumber?: number;
}

export interface ScanItem {
  id: string;
  path: string;
  size: number;
  ext: string;
  libraryId: string;
  inferred: ShowInfo | null;
  /** Subtitle files that belong to this video. */
  subtitles: SubtitleFile[];
}

export interface MatchCandidate {
  id: number;
  name: string;
  year?: number;
  type: MediaType;
  source: MetadataSource;
}

export interface PlannedSubtitle {
  from: string;
  to: string;
  language: string;
  forced: boolean;
  sdh: boolean;
}

export interface RenamePlan {
  from: string;
  to: string;
  action: LinkMode;
  dryRun: boolean;
  /** Moved or linked along with the video, renamed to follow it. */
  subtitles?: PlannedSubtitle[];
  meta: {
    type: MediaType;
    title: string;
    year?: number;
    season?: number;
    episodes?: number[];
    source?: MetadataSource;
    metadataId?: number;
  };
}

export interface RenameResult {
  from: string;
  to: string;
  action: FileAction;
}
