/**
 * Directive lines (.image, .video, ...) → elements
 */

import { StructuralParseError } from './errors';
import type { DirectiveLine, DirectiveName } from './LineClassifier';
import type { DeckElement, MediaSize } from './model';

// Placeholder for an optional numeric argument that is left out
const ABSENT = '_';

interface ScannedToken {
  value: string;
  end: number;
}

function skipSpace(args: string, pos: number): number {
  while (pos < args.length && /\s/.test(args.charAt(pos))) pos++;
  return pos;
}

// A quote groups words only where it opens a token
function scanToken(args: string, start: number): ScannedToken | null {
  let pos = start;
  let value = '';
  const quote = args.charAt(pos);
  if (quote === '"' || quote === "'") {
    const close = args.indexOf(quote, pos + 1);
    if (close === -1) {
      return null;
    }
    value = args.slice(pos + 1, close);
    pos = close + 1;
  }
  while (pos < args.length && !/\s/.test(args.charAt(pos))) {
    value += args.charAt(pos++);
  }
  return { value, end: pos };
}

/**
 * Split directive arguments on whitespace. A token that opens with a double
 * or single quote runs to the matching quote. Returns null when that quote
 * is left open.
 */
export function tokenizeArguments(args: string): string[] | null {
  const tokens: string[] = [];
  let pos = skipSpace(args, 0);

  while (pos < args.length) {
    const token = scanToken(args, pos);
    if (!token) {
      return null;
    }
    tokens.push(token.value);
    pos = skipSpace(args, token.end);
  }

  return tokens;
}

/**
 * How a directive reads its arguments: all tokens, one leading token with
 * the remainder kept verbatim, or the whole text verbatim.
 */
type ArgumentShape = 'tokens' | 'leading' | 'verbatim';

const ARGUMENT_SHAPES: Record<DirectiveName, ArgumentShape> = {
  image: 'tokens',
  video: 'tokens',
  background: 'tokens',
  iframe: 'tokens',
  link: 'leading',
  html: 'verbatim',
  caption: 'verbatim',
};

interface SplitArguments {
  tokens: string[];
  rest: string;
}

function splitArguments(args: string, shape: ArgumentShape): SplitArguments | null {
  switch (shape) {
    case 'verbatim':
      return { tokens: [], rest: args.trim() };
    case 'leading': {
      const start = skipSpace(args, 0);
      if (start >= args.length) {
        return { tokens: [], rest: '' };
      }
      const token = scanToken(args, start);
      return token ? { tokens: [token.value], rest: args.slice(token.end).trim() } : null;
    }
    case 'tokens': {
      const tokens = tokenizeArguments(args);
      return tokens ? { tokens, rest: '' } : null;
    }
  }
}

class DirectiveReader {
  constructor(
    private readonly directive: DirectiveLine,
    private readonly tokens: string[],
    private readonly remainder: string,
  ) {}

  fail(reason: string): StructuralParseError {
    return new StructuralParseError(
      this.directive.line,
      reason,
      this.directive.name,
    );
  }

  required(index: number, what: string): string {
    const token = this.tokens[index];
    if (token === undefined || token === '') {
      throw this.fail(`missing required ${what}`);
    }
    return token;
  }

  size(index: number, what: string): number | undefined {
    const token = this.tokens[index];
    if (token === undefined || token === ABSENT) {
      return undefined;
    }
    const value = /^\d+$/.test(token) ? Number(token) : Number.NaN;
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw this.fail(`${what} must be a positive integer, got "${token}"`);
    }
    return value;
  }

  mediaSize(from: number): MediaSize {
    const height = this.size(from, 'height');
    const width = this.size(from + 1, 'width');
    return {
      ...(height !== undefined ? { height } : {}),
      ...(width !== undefined ? { width } : {}),
    };
  }

  atMost(count: number): void {
    if (this.tokens.length > count) {
      throw this.fail(
        `unexpected argument "${this.tokens[count]}" (takes at most ${count})`,
      );
    }
  }

  rest(): string {
    return this.remainder;
  }
}

type DirectiveBuilder = (reader: DirectiveReader, line: number) => DeckElement;

const builders: Record<DirectiveName, DirectiveBuilder> = {
  image: (reader, line) => {
    reader.atMost(3);
    return {
      kind: 'image',
      line,
      url: reader.required(0, 'URL'),
      ...reader.mediaSize(1),
    };
  },

  video: (reader, line) => {
    reader.atMost(4);
    return {
      kind: 'video',
      line,
      url: reader.required(0, 'URL'),
      sourceType: reader.required(1, 'MIME type'),
      ...reader.mediaSize(2),
    };
  },

  background: (reader, line) => {
    reader.atMost(1);
    return { kind: 'background', line, url: reader.required(0, 'URL') };
  },

  iframe: (reader, line) => {
    reader.atMost(3);
    return {
      kind: 'iframe',
      line,
      url: reader.required(0, 'URL'),
      ...reader.mediaSize(1),
    };
  },

  link: (reader, line) => {
    const url = reader.required(0, 'URL');
    return { kind: 'link', line, url, label: reader.rest() };
  },

  html: (reader, line) => {
    const html = reader.rest();
    if (!html) {
      throw reader.fail('missing HTML payload');
    }
    return { kind: 'html', line, html };
  },

  caption: (reader, line) => {
    const text = reader.rest();
    if (!text) {
      throw reader.fail('missing caption text');
    }
    return { kind: 'caption', line, text };
  },
};

/**
 * Build the element a directive line describes
 */
export function buildDirective(directive: DirectiveLine): DeckElement {
  const split = splitArguments(directive.args, ARGUMENT_SHAPES[directive.name]);
  if (split === null) {
    throw new StructuralParseError(
      directive.line,
      'unterminated quote in arguments',
      directive.name,
    );
  }
  return builders[directive.name](
    new DirectiveReader(directive, split.tokens, split.rest),
    directive.line,
  );
}
