import JSON5 from 'json5';

export interface TextPosition {
  line: number;
  column: number;
}

/** 1-based line and column of a character offset. */
export function positionAt(text: string, offset: number): TextPosition {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === '\n') {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

/**
 * Locate the syntax error that `JSON.parse` raised for `text`. V8 reports a
 * character offset for most errors; where it does not, json5's parser (a
 * superset of JSON) is asked for the line and column instead.
 */
export function locateSyntaxError(text: string, err: unknown): TextPosition {
  const message = err instanceof Error ? err.message : String(err);
  const match = /position (\d+)/.exec(message);
  if (match) {
    return positionAt(text, parseInt(match[1], 10));
  }

  try {
    JSON5.parse(text);
  } catch (json5Err) {
    if (
      typeof json5Err === 'object' &&
      json5Err !== null &&
      'lineNumber' in json5Err &&
      'columnNumber' in json5Err &&
      typeof json5Err.lineNumber === 'number' &&
      typeof json5Err.columnNumber === 'number'
    ) {
      return { line: json5Err.lineNumber, column: json5Err.columnNumber };
    }
  }

  return positionAt(text, text.length);
}

/**
 * Best-effort position of the value a JSON pointer names: each segment is
 * looked up as an object key after the previous one. Stops at the deepest
 * segment found.
 */
export function locatePointer(text: string, pointer: string): TextPosition {
  const segments = pointer
    .split('/')
    .slice(1)
    .map((s) => s.replace(/~1/g, '/').replace(/~0/g, '~'));

  let offset = 0;
  for (const segment of segments) {
    const key = JSON.stringify(segment);
    const keyPattern = new RegExp(`${escapeRegExp(key)}\\s*:`, 'g');
    keyPattern.lastIndex = offset;
    const match = keyPattern.exec(text);
    if (!match) break;
    offset = match.index;
  }

  return positionAt(text, offset);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
