/**
 * Glob matching for cache key patterns.
 *
 * Supports the subset shared with Redis `MATCH`: `*` (any run, including
 * empty), `?` (one character) and `\x` (literal x). Everything else is literal.
 */

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/-]/g;

const escapeRegex = (value: string): string => value.replace(REGEX_SPECIALS, '\\$&');

/**
 * Compile a glob pattern to an anchored regular expression.
 */
export const globToRegExp = (pattern: string): RegExp => {
  let source = '';

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);

    if (char === '\\' && i + 1 < pattern.length) {
      i++;
      source += escapeRegex(pattern.charAt(i));
    } else if (char === '*') {
      source += '[\\s\\S]*';
    } else if (char === '?') {
      source += '[\\s\\S]';
    } else {
      source += escapeRegex(char);
    }
  }

  return new RegExp(`^${source}$`);
};

/**
 * Build a predicate testing keys against a glob pattern.
 */
export const createGlobMatcher = (pattern: string): ((key: string) => boolean) => {
  const regex = globToRegExp(pattern);
  return (key: string) => regex.test(key);
};
