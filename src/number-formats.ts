export type FormatClass = 'general' | 'date' | 'time' | 'datetime' | 'duration' | 'numeric' | 'text';

/** Ids from 164 up are reserved for formats defined in the workbook itself. */
export const FIRST_CUSTOM_FORMAT_ID = 164;

const BUILTIN_CLASSES: ReadonlyMap<number, FormatClass> = new Map<number, FormatClass>([
  [0, 'general'],
  ...[1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 37, 38, 39, 40, 41, 42, 43, 44, 48].map(
    (id): [number, FormatClass] => [id, 'numeric'],
  ),
  ...[14, 15, 16, 17, 27, 28, 29, 30, 31, 34, 35, 36, 50, 51, 52, 53, 54, 57, 58].map(
    (id): [number, FormatClass] => [id, 'date'],
  ),
  ...[18, 19, 20, 21, 32, 33, 45, 47, 55, 56].map((id): [number, FormatClass] => [id, 'time']),
  [22, 'datetime'],
  [46, 'duration'],
  [49, 'text'],
]);

/**
 * Classification of a built-in format id, `undefined` for ids in the
 * custom range. Unassigned ids below the custom range are general.
 */
export function classifyBuiltinFormat(id: number): FormatClass | undefined {
  if (!Number.isInteger(id) || id < 0 || id >= FIRST_CUSTOM_FORMAT_ID) return undefined;
  return BUILTIN_CLASSES.get(id) ?? 'general';
}

const ELAPSED = /^\[(h+|m+|s+)\]$/i;

/** Classifies a format code such as `yyyy-mm-dd`, `[h]:mm` or `#,##0.00`. */
export function classifyFormatCode(code: string): FormatClass {
  const section = firstSection(code);
  const trimmed = section.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'general') return 'general';

  let hasDate = false;
  let hasTime = false;
  let hasElapsed = false;
  let hasText = false;
  // month/minute disambiguation needs the previous and next date-time token
  const tokens: string[] = [];

  for (let i = 0; i < section.length; i++) {
    const ch = section[i];
    if (ch === '"') {
      const end = section.indexOf('"', i + 1);
      i = end === -1 ? section.length : end;
      continue;
    }
    if (ch === '\\' || ch === '_' || ch === '*') {
      i++;
      continue;
    }
    if (ch === '[') {
      const end = section.indexOf(']', i + 1);
      const bracket = section.slice(i, end === -1 ? section.length : end + 1);
      if (ELAPSED.test(bracket)) {
        hasElapsed = true;
        tokens.push(bracket[1].toLowerCase());
      }
      i = end === -1 ? section.length : end;
      continue;
    }
    if (ch === '@') {
      hasText = true;
      continue;
    }
    const lower = ch.toLowerCase();
    if (section.slice(i, i + 7).toLowerCase() === 'general') {
      i += 6;
      continue;
    }
    if (lower === 'a' && /^a(m\/pm|\/p)/i.test(section.slice(i))) {
      hasTime = true;
      i += section.slice(i, i + 5).toLowerCase() === 'am/pm' ? 4 : 2;
      continue;
    }
    if (lower === 'e' && /^e[+-]/i.test(section.slice(i, i + 2))) {
      // scientific notation
      i++;
      continue;
    }
    if (lower === 'y' || lower === 'd' || lower === 'e') {
      hasDate = true;
      tokens.push(lower);
      continue;
    }
    if ((lower === 'b' || lower === 'g') && section[i + 1]?.toLowerCase() === lower) {
      // era and Buddhist-year tokens come in runs: gg, ggg, bb, bbbb
      hasDate = true;
      tokens.push('y');
      while (section[i + 1]?.toLowerCase() === lower) i++;
      continue;
    }
    if (lower === 'h' || lower === 's') {
      hasTime = true;
      tokens.push(lower);
      continue;
    }
    if (lower === 'm') {
      tokens.push('m');
    }
  }

  // Resolve each run of "m" as minutes (next to h/s) or months
  let previous = '';
  for (let t = 0; t < tokens.length; t++) {
    if (tokens[t] !== 'm') {
      previous = tokens[t];
      continue;
    }
    let next = '';
    for (let u = t + 1; u < tokens.length; u++) {
      if (tokens[u] !== 'm') {
        next = tokens[u];
        break;
      }
    }
    if (previous === 'h' || next === 's') hasTime = true;
    else hasDate = true;
  }

  if (hasElapsed) return 'duration';
  if (hasDate && hasTime) return 'datetime';
  if (hasDate) return 'date';
  if (hasTime) return 'time';
  if (hasText) return 'text';
  return 'numeric';
}

function firstSection(code: string): string {
  let inQuote = false;
  for (let i = 0; i < code.length; i++) {
    const ch = code[i];
    if (ch === '"') inQuote = !inQuote;
    else if (ch === '\\' && !inQuote) i++;
    else if (ch === ';' && !inQuote) return code.slice(0, i);
  }
  return code;
}

export function isTemporal(kind: FormatClass): kind is 'date' | 'time' | 'datetime' {
  return kind === 'date' || kind === 'time' || kind === 'datetime';
}
