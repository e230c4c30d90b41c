/**
 * Compiles a Redis-style glob (`*`, `?`, `[abc]`, `[^a]`, `[a-z]`, `\x`) into an
 * anchored regular expression, so the memory store matches the same keys
 * `SCAN ... MATCH` would.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '^';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '\\' && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[i + 1]);
      i += 2;
      continue;
    }

    if (ch === '*') {
      source += '[\\s\\S]*';
    } else if (ch === '?') {
      source += '[\\s\\S]';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
      } else {
        let body = pattern.slice(i + 1, close);
        let negate = false;
        if (body.startsWith('^')) {
          negate = true;
          body = body.slice(1);
        }
        const cls = body.replace(/[\\\]]/g, '\\$&');
        source += negate ? `[^${cls}]` : `[${cls}]`;
        i = close;
      }
    } else {
      source += escapeRegExp(ch);
    }
    i += 1;
  }

  return new RegExp(source + '$');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\\/-]/g, '\\$&');
}
