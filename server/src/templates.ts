import { areSequential } from './episodes.js';
import type { MediaType } from './types.js';

export type TemplateVars = Record<string, string | number | undefined>;

export class TemplateError extends Error {
  constructor(message: string, readonly template: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

const EPISODE_TEMPLATE = '{title}/Season {season:02}/{title} - S{season:02}{episodeCode}{episodeTitleSuffix}';

export const DEFAULT_TEMPLATES: Readonly<Record<MediaType, string>> = {
  series: EPISODE_TEMPLATE,
  anime: EPISODE_TEMPLATE,
  movie: '{title} ({year})/{title} ({year})',
};

const TOKEN_RE = /\{([^{}]*)\}/g;
const TOKEN_BODY_RE = /^(\w+)(?::(\d+))?$/;

function pad(n: number, width = 2) {
  return String(n).padStart(width, '0');
}

/** `E01`, `E01-E03` for a consecutive run, otherwise `E01E05`. */
export function formatEpisodeCode(episodes: readonly number[]): string {
  if (!episodes.length) return '';
  if (episodes.length === 1) return `E${pad(episodes[0])}`;
  if (areSequential(episodes)) return `E${pad(episodes[0])}-E${pad(episodes[episodes.length - 1])}`;
  return episodes.map(e => `E${pad(e)}`).join('');
}

function checkBraces(template: string) {
  let open = 0;
  for (const ch of template) {
    if (ch === '{') open++;
    else if (ch === '}') open--;
    if (open < 0) throw new TemplateError('Template syntax error: unexpected }', template);
    if (open > 1) throw new TemplateError('Template syntax error: nested {', template);
  }
  if (open !== 0) throw new TemplateError('Template syntax error: missing }', template);
}

/**
 * Renders `{name}` and zero-padded `{name:02}` tokens. Unknown names render
 * empty, and so does a `()` or `[]` pair left with nothing inside.
 */
export function renderTemplate(template: string, vars: TemplateVars): string {
  checkBraces(template);
  const out = template.replace(TOKEN_RE, (_m, inner: string) => {
    const token = inner.trim().match(TOKEN_BODY_RE);
    if (!token) throw new TemplateError(`Template syntax error: bad token {${inner}}`, template);
    const [, name, width] = token;
    const value = vars[name];
    if (value === undefined || value === '') return '';
    if (width === undefined) return String(value);
    return String(value).padStart(Number(width), '0');
  });
  return out.replace(/\s*\(\s*\)|\s*\[\s*\]/g, '');
}

export function validateTemplate(template: string): boolean {
  try {
    renderTemplate(template, {});
    return true;
  } catch (err) {
    if (err instanceof TemplateError) return false;
    throw err;
  }
}
