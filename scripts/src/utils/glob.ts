/**
 * Shell-style pattern matching over metric paths.
 *
 * Supports `*` (any run of characters, `/` and `#` included), `?` (one
 * character), `[abc]`, `[a-z]` and `[!abc]`. Matching is case-sensitive,
 * anchored at both ends and works on code points. An unterminated `[` is a
 * literal.
 */

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

export function globToRegExp(pattern: string): RegExp {
  let source = "";
  let index = 0;
  while (index < pattern.length) {
    const char = pattern[index];
    index += 1;
    if (char === "*") {
      while (pattern[index] === "*") {
        index += 1;
      }
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      let end = index;
      if (pattern[end] === "!") {
        end += 1;
      }
      if (pattern[end] === "]") {
        end += 1;
      }
      while (end < pattern.length && pattern[end] !== "]") {
        end += 1;
      }
      if (end >= pattern.length) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(index, end).replace(/\\/g, "\\\\").replace(/\]/g, "\\]");
      index = end + 1;
      if (body.startsWith("!")) {
        body = `^${body.slice(1)}`;
      } else if (body.startsWith("^")) {
        body = `\\${body}`;
      }
      source += `[${body}]`;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, "su");
}

/**
 * Compile `patterns` once and return a predicate that is true when a value
 * matches any of them.
 */
export function globMatcher(patterns: Iterable<string>): (value: string) => boolean {
  const compiled = Array.from(patterns, globToRegExp);
  return (value) => compiled.some((regex) => regex.test(value));
}
