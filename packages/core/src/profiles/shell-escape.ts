/**
 * Shell word quoting for the key=value configuration file.
 *
 * Output matches the shell's `printf %q` so the file can be sourced by shell
 * scripts. Safe words are written as-is and other characters are
 * backslash-escaped; values with control characters use `$'...'`.
 */

const UNSAFE_CHAR = /[^A-Za-z0-9_@%+=:,./-]/gu;
const CONTROL_CHAR = /[\x00-\x1f\x7f]/;

const ANSI_C_ESCAPES: Record<string, string> = {
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
  '\\': '\\\\',
  "'": "\\'",
};

const ANSI_C_DECODES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  a: '\x07',
  b: '\b',
  e: '\x1b',
  f: '\f',
  v: '\v',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '?': '?',
};

export function quoteShellValue(value: string): string {
  if (value === '') {
    return "''";
  }

  if (CONTROL_CHAR.test(value)) {
    const body = value.replace(/[\\'\x00-\x1f\x7f]/g, (ch) => {
      const known = ANSI_C_ESCAPES[ch];
      return known ?? `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
    });
    return `$'${body}'`;
  }

  return value.replace(UNSAFE_CHAR, (ch) => `\\${ch}`);
}

/**
 * Decode one shell word as written after `KEY=`.
 *
 * Handles bare text, backslash escapes, '...', "..." and $'...'. Reading
 * stops at the first unquoted whitespace, so trailing `# comments` are
 * dropped. Returns null for an unterminated quote.
 */
export function parseShellWord(raw: string): string | null {
  let out = '';
  let i = 0;

  while (i < raw.length) {
    const ch = raw[i];

    if (ch === ' ' || ch === '\t') {
      break;
    }

    if (ch === '\\') {
      if (i + 1 < raw.length) {
        out += raw[i + 1];
      }
      i += 2;
      continue;
    }

    if (ch === "'") {
      const end = raw.indexOf("'", i + 1);
      if (end === -1) {
        return null;
      }
      out += raw.slice(i + 1, end);
      i = end + 1;
      continue;
    }

    if (ch === '$' && raw[i + 1] === "'") {
      const decoded = readAnsiC(raw, i + 2);
      if (!decoded) {
        return null;
      }
      out += decoded.value;
      i = decoded.next;
      continue;
    }

    if (ch === '"') {
      const decoded = readDoubleQuoted(raw, i + 1);
      if (!decoded) {
        return null;
      }
      out += decoded.value;
      i = decoded.next;
      continue;
    }

    out += ch;
    i++;
  }

  return out;
}

function readAnsiC(raw: string, start: number): { value: string; next: number } | null {
  let value = '';
  let i = start;

  while (i < raw.length) {
    const ch = raw[i];
    if (ch === "'") {
      return { value, next: i + 1 };
    }
    if (ch !== '\\') {
      value += ch;
      i++;
      continue;
    }

    if (i + 1 >= raw.length) {
      return null;
    }
    const escape = raw[i + 1];
    if (escape === 'x') {
      const hex = /^[0-9a-fA-F]{1,2}/.exec(raw.slice(i + 2));
      if (hex) {
        value += String.fromCharCode(parseInt(hex[0], 16));
        i += 2 + hex[0].length;
        continue;
      }
    }
    value += ANSI_C_DECODES[escape] ?? `\\${escape}`;
    i += 2;
  }

  return null;
}

function readDoubleQuoted(raw: string, start: number): { value: string; next: number } | null {
  let value = '';
  let i = start;

  while (i < raw.length) {
    const ch = raw[i];
    if (ch === '"') {
      return { value, next: i + 1 };
    }
    // Inside double quotes a backslash only escapes $ ` " and \
    if (ch === '\\' && i + 1 < raw.length && '$`"\\'.includes(raw[i + 1])) {
      value += raw[i + 1];
      i += 2;
      continue;
    }
    value += ch;
    i++;
  }

  return null;
}
