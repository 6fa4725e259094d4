const FENCED_BLOCK_PATTERN = /```(?:json|JSON)?[ \t]*\r?\n?([\s\S]*?)```/g;

const CLOSERS: Readonly<Record<string, string>> = { '{': '}', '[': ']' };

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Index just past the value opened at `start`, or -1 when it never closes. */
function findBalancedEnd(text: string, start: number): number {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch in CLOSERS) {
      stack.push(CLOSERS[ch]);
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) {
        return -1;
      }
      if (stack.length === 0) {
        return i + 1;
      }
    }
  }

  return -1;
}

/**
 * Extracts a JSON value from model output: the whole text, then each fenced
 * code block, then the first balanced object or array that parses.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  for (const match of trimmed.matchAll(FENCED_BLOCK_PATTERN)) {
    const fenced = tryParse(match[1].trim());
    if (fenced.ok) {
      return fenced.value;
    }
  }

  for (let i = 0; i < trimmed.length; i++) {
    if (!(trimmed[i] in CLOSERS)) {
      continue;
    }
    const end = findBalancedEnd(trimmed, i);
    if (end === -1) {
      continue;
    }
    const balanced = tryParse(trimmed.slice(i, end));
    if (balanced.ok) {
      return balanced.value;
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}
