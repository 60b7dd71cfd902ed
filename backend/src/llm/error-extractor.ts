/**
 * ErrorExtractor – finds the error object inside an arbitrary backend body.
 *
 * Error bodies arrive as plain JSON, as an event stream whose last `data:`
 * frame carries the error, or as text with JSON embedded somewhere in it.
 *
 * Brace matching counts every `{` and `}`, including those inside quoted
 * strings, so a message containing a literal brace can shift the match.
 */

/**
 * Return the most relevant complete JSON object in `body`, or null.
 *
 * 1. A body that is already one `{...}` object is returned unchanged.
 * 2. Otherwise the last `data:` line whose payload starts with `{`.
 * 3. Otherwise the first `{` anywhere in the body.
 */
export function extractErrorObject(body: string): string | null {
  const trimmed = body.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    return body;
  }

  const lines = body.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith('data:')) {
      continue;
    }
    const payload = line.slice('data:'.length).trim();
    if (!payload.startsWith('{')) {
      continue;
    }
    const end = matchBraces(payload, 0);
    return end > 0 ? payload.slice(0, end) : payload;
  }

  const start = body.indexOf('{');
  if (start >= 0) {
    const end = matchBraces(body, start);
    if (end > 0) {
      return body.slice(start, end);
    }
  }

  return null;
}

/**
 * Index just past the brace closing the one at `start`, or -1 if unbalanced.
 */
function matchBraces(text: string, start: number): number {
  let depth = 0;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }
  return -1;
}
