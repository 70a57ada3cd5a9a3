/**
 * Glob matching for target patterns and copy exclusions.
 *
 * Paths are POSIX-style and relative to the directory being searched.
 * Supported: `*`, `?`, `[abc]` / `[!abc]`, `{a,b}` and `**` (zero or more directory levels).
 */

const REGEX_SPECIALS = new Set(['.', '+', '^', '$', '(', ')', '|', '\\', '/', ']', '}', ',']);

const _cache: Map<string, RegExp> = new Map();

function translate(pattern: string): string {
  let out = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        const atSegmentStart = i === 0 || pattern[i - 1] === '/';
        const next = pattern[i + 2];
        if (atSegmentStart && next === '/') {
          out += '(?:[^/]*/)*';
          i += 3;
          continue;
        }
        if (atSegmentStart && next === undefined) {
          out += '.*';
          i += 2;
          continue;
        }
        // '**' inside a segment behaves like '*'
        out += '[^/]*';
        i += 2;
        continue;
      }
      out += '[^/]*';
      i += 1;
      continue;
    }

    if (ch === '?') {
      out += '[^/]';
      i += 1;
      continue;
    }

    if (ch === '[') {
      const close = pattern.indexOf(']', i + 2);
      if (close === -1) {
        out += '\\[';
        i += 1;
        continue;
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('!') || body.startsWith('^')) {
        negate = true;
        body = body.slice(1);
      }
      body = body.replace(/\\/g, '\\\\').replace(/\]/g, '\\]');
      out += negate ? `[^/${body}]` : `[${body}]`;
      i = close + 1;
      continue;
    }

    if (ch === '{') {
      const close = pattern.indexOf('}', i + 1);
      if (close === -1) {
        out += '\\{';
        i += 1;
        continue;
      }
      const alternatives = pattern.slice(i + 1, close).split(',');
      out += `(?:${alternatives.map(translate).join('|')})`;
      i = close + 1;
      continue;
    }

    out += REGEX_SPECIALS.has(ch) ? `\\${ch}` : ch;
    i += 1;
  }
  return out;
}

export function normalizeRelativePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

export function globToRegExp(pattern: string): RegExp {
  const normalized = normalizeRelativePath(pattern);
  const cached = _cache.get(normalized);
  if (cached) return cached;
  const regex = new RegExp(`^${translate(normalized)}$`);
  _cache.set(normalized, regex);
  return regex;
}

export function matchGlob(pattern: string, relativePath: string): boolean {
  return globToRegExp(pattern).test(normalizeRelativePath(relativePath));
}

/**
 * Match an exclusion the way rsync reads `--exclude`: a pattern without a slash
 * matches the basename at any depth, a trailing slash restricts it to directories,
 * and any other slash anchors it to the copy root.
 */
export function matchExclusion(pattern: string, relativePath: string, isDirectory: boolean): boolean {
  let p = pattern.trim();
  if (!p) return false;
  const directoryOnly = p.endsWith('/');
  if (directoryOnly) {
    if (!isDirectory) return false;
    p = p.replace(/\/+$/, '');
  }

  const rel = normalizeRelativePath(relativePath);
  const anchored = p.startsWith('/') || p.includes('/');
  if (anchored) {
    return matchGlob(p, rel);
  }
  const slash = rel.lastIndexOf('/');
  const base = slash === -1 ? rel : rel.slice(slash + 1);
  return matchGlob(p, base);
}

export function isExcluded(exclusions: readonly string[], relativePath: string, isDirectory: boolean): boolean {
  return exclusions.some((pattern) => matchExclusion(pattern, relativePath, isDirectory));
}
