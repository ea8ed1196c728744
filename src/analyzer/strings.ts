/**
 * Python string literal helpers: decoding, repr-style quoting and docstring cleanup
 */

export interface StringLiteral {
  /** Lower-cased prefix letters in canonical order, e.g. "", "b", "rb" */
  prefix: string;
  value: string;
  isBytes: boolean;
  isRaw: boolean;
  isFormatted: boolean;
}

const LITERAL_PATTERN = /^([A-Za-z]*)('''|"""|'|")([\s\S]*)\2$/;

const MAX_CODE_POINT = 0x10ffff;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

/**
 * Decode a single Python string literal from its source text.
 * Returns null when the text is not a string literal, or when it escapes a
 * code point beyond U+10FFFF.
 */
export function decodeStringLiteral(source: string): StringLiteral | null {
  const match = LITERAL_PATTERN.exec(source);
  if (!match) return null;

  const rawPrefix = (match[1] ?? '').toLowerCase();
  if (/[^rbuf]/.test(rawPrefix)) return null;

  const body = match[3] ?? '';
  const isRaw = rawPrefix.includes('r');
  const isBytes = rawPrefix.includes('b');
  const isFormatted = rawPrefix.includes('f');
  const prefix = ['r', 'b', 'f'].filter(letter => rawPrefix.includes(letter)).join('');

  const value = isRaw ? body : decodeEscapes(body, isBytes);
  if (value === null) return null;

  return {
    prefix,
    value,
    isBytes,
    isRaw,
    isFormatted,
  };
}

function decodeEscapes(body: string, isBytes: boolean): string | null {
  let result = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i] ?? '';
    if (ch !== '\\' || i + 1 >= body.length) {
      result += ch;
      i++;
      continue;
    }

    const next = body[i + 1] ?? '';

    // Backslash-newline is a line continuation inside the literal
    if (next === '\n') {
      i += 2;
      continue;
    }

    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      result += simple;
      i += 2;
      continue;
    }

    if (/[0-7]/.test(next)) {
      const octal = /^[0-7]{1,3}/.exec(body.slice(i + 1))?.[0] ?? next;
      result += String.fromCodePoint(parseInt(octal, 8));
      i += 1 + octal.length;
      continue;
    }

    const hexLength = next === 'x' ? 2 : !isBytes && next === 'u' ? 4 : !isBytes && next === 'U' ? 8 : 0;
    if (hexLength > 0) {
      const digits = body.slice(i + 2, i + 2 + hexLength);
      if (digits.length === hexLength && /^[0-9a-fA-F]+$/.test(digits)) {
        const codePoint = parseInt(digits, 16);
        if (codePoint > MAX_CODE_POINT) return null;
        result += String.fromCodePoint(codePoint);
        i += 2 + hexLength;
        continue;
      }
    }

    // Unknown escapes (and \N{...}) stay as written
    result += ch + next;
    i += 2;
  }

  return result;
}

/**
 * Quote a decoded literal the way Python's repr() does
 */
export function reprLiteral(value: string, isBytes = false): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = '';

  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === '\\') out += '\\\\';
    else if (ch === quote) out += `\\${quote}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (code < 0x20 || code === 0x7f || (isBytes && code > 0x7f)) {
      out += `\\x${code.toString(16).padStart(2, '0')}`;
    } else out += ch;
  }

  return `${isBytes ? 'b' : ''}${quote}${out}${quote}`;
}

/**
 * Clean up docstring indentation the way inspect.cleandoc does
 */
export function cleanDocstring(doc: string): string {
  const lines = doc.replace(/\t/g, '        ').split('\n');

  let margin = Infinity;
  for (const line of lines.slice(1)) {
    const content = line.trimStart();
    if (content.length > 0) {
      margin = Math.min(margin, line.length - content.length);
    }
  }

  const cleaned = lines.map((line, index) => {
    if (index === 0) return line.trimStart();
    return margin === Infinity ? line : line.slice(margin);
  });

  while (cleaned.length > 0 && (cleaned[0] ?? '').trim() === '') cleaned.shift();
  while (cleaned.length > 0 && (cleaned[cleaned.length - 1] ?? '').trim() === '') cleaned.pop();

  return cleaned.map(line => line.trimEnd()).join('\n');
}
