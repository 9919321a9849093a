/**
 * Input line tokenizer
 *
 * Splits the text before the cursor on unquoted whitespace. Quotes group
 * characters and are dropped from token values; an unmatched quote runs to
 * the end of the input.
 */

export interface Token {
  /** Token text with quotes removed */
  value: string;
  /** Offset of the token's first character (including an opening quote) */
  start: number;
  /** Offset just past the token's last character */
  end: number;
  /** Whether the token ends inside an unterminated quote */
  open: boolean;
}

export interface CompletionContext {
  /** Tokens fully typed before the cursor */
  completed: Token[];
  /** Text of the token ending at the cursor ('' after whitespace) */
  partial: string;
  /** Offset where the partial token starts */
  partialStart: number;
  /** Clamped cursor offset */
  cursor: number;
  /** Quote character that opens the partial token, if it starts with one */
  quote?: string;
}

const QUOTES = new Set(['"', "'"]);

function isWhitespace(char: string): boolean {
  return char === ' ' || char === '\t' || char === '\n' || char === '\r';
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let current: Token | null = null;
  let quote: string | null = null;

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);

    if (quote !== null) {
      if (char === quote) {
        quote = null;
      } else if (current) {
        current.value += char;
      }
      continue;
    }

    if (isWhitespace(char)) {
      if (current) {
        current.end = i;
        tokens.push(current);
        current = null;
      }
      continue;
    }

    if (!current) {
      current = { value: '', start: i, end: i, open: false };
    }
    if (QUOTES.has(char)) {
      quote = char;
    } else {
      current.value += char;
    }
  }

  if (current) {
    current.end = input.length;
    current.open = quote !== null;
    tokens.push(current);
  }

  return tokens;
}

/**
 * Work out which tokens are complete and which one is being typed.
 */
export function resolveContext(line: string, cursor: number = line.length): CompletionContext {
  const position = Math.max(0, Math.min(Number.isFinite(cursor) ? Math.floor(cursor) : line.length, line.length));
  const tokens = tokenize(line.slice(0, position));
  const last = tokens[tokens.length - 1];

  // The last token is still being typed unless whitespace follows it
  if (last && last.end === position) {
    const opening = line.charAt(last.start);
    return {
      completed: tokens.slice(0, -1),
      partial: last.value,
      partialStart: last.start,
      cursor: position,
      quote: QUOTES.has(opening) ? opening : undefined,
    };
  }

  return { completed: tokens, partial: '', partialStart: position, cursor: position };
}
