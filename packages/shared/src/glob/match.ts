const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;
const CLASS_SPECIALS = /[\\\]\[^-]/;

const compiled = new Map<string, RegExp>();

function escapeClassChar(ch: string): string {
  return CLASS_SPECIALS.test(ch) ? `\\${ch}` : ch;
}

/**
 * Regex source for the body of a `[...]` group. A leading `!` negates, ranges
 * whose bounds are out of order are dropped, and a group left empty can never
 * match (or matches any character when negated).
 */
function bracketSource(body: string): string {
  const negate = body.startsWith('!');
  const members = negate ? body.slice(1) : body;

  const parts: string[] = [];
  let k = 0;
  while (k < members.length) {
    const lo = members[k];
    if (k + 2 < members.length && members[k + 1] === '-') {
      const hi = members[k + 2];
      if (lo <= hi) {
        parts.push(`${escapeClassChar(lo)}-${escapeClassChar(hi)}`);
      }
      k += 3;
    } else {
      parts.push(escapeClassChar(lo));
      k += 1;
    }
  }

  if (parts.length === 0) {
    return negate ? '.' : '(?!)';
  }
  return `[${negate ? '^' : ''}${parts.join('')}]`;
}

/**
 * Compiles a shell-style wildcard pattern with `fnmatch` rules: `*` matches
 * any run of characters (path separators and leading dots included), `?`
 * matches one character and `[...]` a character set. Braces, extglobs and
 * globstars have no special meaning, and an unclosed `[` is literal.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;
  let lastWasStar = false;

  while (i < pattern.length) {
    const ch = pattern[i++];
    if (ch === '*') {
      if (!lastWasStar) source += '.*';
      lastWasStar = true;
      continue;
    }
    lastWasStar = false;

    if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      let j = i;
      if (j < pattern.length && pattern[j] === '!') j++;
      if (j < pattern.length && pattern[j] === ']') j++;
      while (j < pattern.length && pattern[j] !== ']') j++;
      if (j >= pattern.length) {
        source += '\\[';
      } else {
        source += bracketSource(pattern.slice(i, j));
        i = j + 1;
      }
    } else {
      source += ch.replace(REGEX_SPECIALS, '\\$&');
    }
  }

  return new RegExp(`^(?:${source})$`, 's');
}

/**
 * Tests a name or relative path against a wildcard pattern; see {@link wildcardToRegExp}.
 */
export function fnmatch(value: string, pattern: string): boolean {
  let re = compiled.get(pattern);
  if (!re) {
    re = wildcardToRegExp(pattern);
    compiled.set(pattern, re);
  }
  return re.test(value);
}

/**
 * Decides whether a directory should be skipped entirely, treating every
 * pattern as a wildcard on the bare directory name. The name is also tried
 * with a trailing `/` so directory-style patterns such as `build/` or `src/*`
 * apply.
 */
export function isExcludedName(name: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => fnmatch(name, pattern) || fnmatch(`${name}/`, pattern));
}
