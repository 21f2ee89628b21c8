// api/_lib/utils/regexSafety.ts
// Static checks and rewrites against runaway backtracking

interface Quantifier {
  unbounded: boolean;
  length: number;
}

function readQuantifier(source: string, at: number): Quantifier | null {
  const c = source[at];
  let q: Quantifier | null = null;

  if (c === '*' || c === '+') {
    q = { unbounded: true, length: 1 };
  } else if (c === '?') {
    q = { unbounded: false, length: 1 };
  } else if (c === '{') {
    const m = /^\{(\d+)(,(\d*))?\}/.exec(source.slice(at));
    if (m) q = { unbounded: m[2] !== undefined && m[3] === '', length: m[0].length };
  }

  // lazy / possessive-looking suffix
  if (q && source[at + q.length] === '?') q.length += 1;
  return q;
}

function groupPrefixLength(source: string, open: number): number {
  if (source[open + 1] !== '?') return 1;
  if (source[open + 2] === '<' && source[open + 3] !== '=' && source[open + 3] !== '!') {
    const close = source.indexOf('>', open + 3);
    return close === -1 ? 1 : close - open + 1;
  }
  return source[open + 2] === '<' ? 4 : 3;
}

function skipCharClass(source: string, open: number): number {
  let i = open + 1;
  if (source[i] === '^') i++;
  if (source[i] === ']') i++;
  while (i < source.length && source[i] !== ']') {
    i += source[i] === '\\' ? 2 : 1;
  }
  return i + 1;
}

/**
 * Returns the index of the first quantifier applied to a group that already
 * contains an unbounded quantifier, or null when there is none.
 */
export function findNestedQuantifier(source: string): number | null {
  // One frame per open group; tracks whether it holds an unbounded quantifier
  const stack: boolean[] = [false];
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (c === '\\') {
      i += 2;
      continue;
    }
    if (c === '[') {
      i = skipCharClass(source, i);
      continue;
    }
    if (c === '(') {
      stack.push(false);
      i += groupPrefixLength(source, i);
      continue;
    }
    if (c === ')') {
      const inner = stack.length > 1 ? stack.pop() === true : false;
      const q = readQuantifier(source, i + 1);
      if (q?.unbounded && inner) return i + 1;
      const top = stack.length - 1;
      stack[top] = stack[top] || inner || q?.unbounded === true;
      i += 1 + (q?.length ?? 0);
      continue;
    }

    const q = readQuantifier(source, i);
    if (q) {
      if (q.unbounded) stack[stack.length - 1] = true;
      i += q.length;
      continue;
    }
    i++;
  }

  return null;
}

/**
 * Rewrites every unbounded quantifier (`*`, `+`, `{n,}`) into a bounded one
 * capped at `max` repetitions, keeping a lazy `?` suffix. Gapped patterns such
 * as `a.*b.*c` then backtrack over at most `max` characters per gap.
 */
export function boundQuantifiers(source: string, max: number): string {
  let out = '';
  let i = 0;

  while (i < source.length) {
    const c = source[i];

    if (c === '\\') {
      out += source.slice(i, i + 2);
      i += 2;
      continue;
    }
    if (c === '[') {
      const end = skipCharClass(source, i);
      out += source.slice(i, end);
      i = end;
      continue;
    }
    if (c === '(') {
      const len = groupPrefixLength(source, i);
      out += source.slice(i, i + len);
      i += len;
      continue;
    }

    const q = readQuantifier(source, i);
    if (!q) {
      out += c;
      i++;
      continue;
    }

    const text = source.slice(i, i + q.length);
    const lazy = text.length > 1 && text.endsWith('?') ? '?' : '';
    if (c === '*') {
      out += `{0,${max}}${lazy}`;
    } else if (c === '+') {
      out += `{1,${max}}${lazy}`;
    } else if (q.unbounded) {
      const min = Number(/^\{(\d+)/.exec(text)?.[1] ?? 0);
      out += `{${min},${Math.max(min, max)}}${lazy}`;
    } else {
      out += text;
    }
    i += q.length;
  }

  return out;
}
