const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INDEX_PATTERN = /^-?\d+$/;

const quoteKey = (key: string): string => `["${key.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"]`;

function normalizePlainSegment(segment: string): string {
  const cleaned = segment.trim();
  if (!cleaned) return '';
  if (IDENTIFIER_PATTERN.test(cleaned)) return `.${cleaned}`;
  return quoteKey(cleaned);
}

function normalizeBracketSegment(segment: string): string {
  if (!segment.startsWith('[') || !segment.endsWith(']')) {
    return normalizePlainSegment(segment);
  }

  const inner = segment.slice(1, -1).trim();
  if (!inner) return segment;
  if (inner === '*') return '[*]';

  const quote = inner[0];
  if ((quote === '"' || quote === "'") && inner.length > 1 && inner.endsWith(quote)) {
    const key = inner.slice(1, -1).replace(/\\(['"])/g, '$1');
    return quoteKey(key);
  }

  if (INDEX_PATTERN.test(inner)) return `[${inner}]`;

  return quoteKey(inner);
}

/**
 * Compiles a user field reference into a ClickHouse JSON path.
 *
 * `metadata.user.id` → `$.metadata.user.id`, `items[0].name` → `$.items[0].name`,
 * `tags["user-id"]` → `$.tags["user-id"]`. Input already starting with `$` is
 * returned as is.
 */
export function buildJsonPath(field: string): string {
  const trimmed = field.trim();
  if (trimmed.startsWith('$')) return trimmed;

  const segments: string[] = [];
  let buffer = '';
  let inBracket = false;
  let quoteChar: string | null = null;

  const flushPlain = () => {
    const segment = buffer.trim();
    if (segment) segments.push(segment);
    buffer = '';
  };

  const flushBracket = () => {
    if (buffer) segments.push(buffer);
    buffer = '';
  };

  for (let index = 0; index < trimmed.length; index++) {
    const char = trimmed[index];

    if (!inBracket) {
      if (char === '.') {
        flushPlain();
      } else if (char === '[') {
        flushPlain();
        inBracket = true;
        buffer = '[';
        quoteChar = null;
      } else {
        buffer += char;
      }
      continue;
    }

    buffer += char;

    if (char === '"' || char === "'") {
      const previous = index > 0 ? trimmed[index - 1] : '';
      if (quoteChar === char && previous !== '\\') {
        quoteChar = null;
      } else if (!quoteChar) {
        quoteChar = char;
      }
    } else if (char === ']' && !quoteChar) {
      flushBracket();
      inBracket = false;
    }
  }

  if (buffer) {
    if (inBracket) {
      segments.push(buffer);
    } else {
      flushPlain();
    }
  }

  let path = '$';
  for (const segment of segments) {
    if (!segment) continue;
    path += segment.startsWith('[') ? normalizeBracketSegment(segment) : normalizePlainSegment(segment);
  }
  return path;
}

/** `JSON_VALUE(raw, '<path>')`, with single quotes in the path doubled. */
export function buildJsonAccessor(field: string): string {
  return `JSON_VALUE(raw, '${buildJsonPath(field).replace(/'/g, "''")}')`;
}
