/**
 * Filename-style wildcards (`*`, `?`) and Ant-style path patterns (`**`).
 */

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/** `*` matches any run of characters, `?` exactly one. */
export function wildcardMatch(text: string, pattern: string, caseSensitive = false): boolean {
  const source = pattern
    .split('')
    .map((ch) => (ch === '*' ? '.*' : ch === '?' ? '.' : escapeRegExp(ch)))
    .join('');
  return new RegExp(`^${source}$`, caseSensitive ? 's' : 'is').test(text);
}

/** Whether `pattern` contains Ant wildcards rather than a literal path. */
export function isAntPattern(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

/**
 * Ant-style match. `**` spans any number of directories, `*` and `?` stay
 * within one segment. A leading `/` must appear on both or neither.
 */
export function antPathMatch(pattern: string, path: string): boolean {
  if (pattern.startsWith('/') !== path.startsWith('/')) {
    return false;
  }
  return matchSegments(segmentsOf(pattern), 0, segmentsOf(path), 0);
}

function segmentsOf(value: string): string[] {
  return value.split('/').filter((segment) => segment !== '');
}

function matchSegments(
  pattern: readonly string[],
  pi: number,
  path: readonly string[],
  si: number,
): boolean {
  const segment = pattern[pi];
  if (segment === undefined) {
    return si === path.length;
  }
  if (segment === '**') {
    for (let next = si; next <= path.length; next++) {
      if (matchSegments(pattern, pi + 1, path, next)) return true;
    }
    return false;
  }
  const current = path[si];
  if (current === undefined) {
    return false;
  }
  return wildcardMatch(current, segment, true) && matchSegments(pattern, pi + 1, path, si + 1);
}
