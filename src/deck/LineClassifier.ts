/**
 * Line classifier - tags each input line with its grammatical role
 */

import { indentWidth } from '../utils';

export const DIRECTIVE_NAMES = [
  'image',
  'video',
  'background',
  'iframe',
  'link',
  'html',
  'caption',
] as const;

export type DirectiveName = (typeof DIRECTIVE_NAMES)[number];

export type LineKind =
  | 'blank'
  | 'comment'
  | 'header'
  | 'bullet'
  | 'directive'
  | 'fenceOpen'
  | 'fenceBody'
  | 'fenceClose'
  | 'pre'
  | 'prose';

interface LineBase {
  line: number;
  raw: string;
}

export type BlankLine = LineBase & { kind: 'blank' };
export type CommentLine = LineBase & { kind: 'comment' };
export type HeaderLine = LineBase & {
  kind: 'header';
  depth: number;
  title: string;
};
export type BulletLine = LineBase & {
  kind: 'bullet';
  indent: number;
  text: string;
};
export type DirectiveLine = LineBase & {
  kind: 'directive';
  name: DirectiveName;
  args: string;
};
export type FenceOpenLine = LineBase & {
  kind: 'fenceOpen';
  fence: string;
  info: string;
};
export type FenceBodyLine = LineBase & { kind: 'fenceBody' };
export type FenceCloseLine = LineBase & { kind: 'fenceClose' };
export type PreLine = LineBase & { kind: 'pre'; indent: number };
export type ProseLine = LineBase & { kind: 'prose'; text: string };

export type ClassifiedLine =
  | BlankLine
  | CommentLine
  | HeaderLine
  | BulletLine
  | DirectiveLine
  | FenceOpenLine
  | FenceBodyLine
  | FenceCloseLine
  | PreLine
  | ProseLine;

export interface ClassifyContext {
  tabWidth: number;
  // Marker of the fence currently open, if any
  openFence?: string | null;
}

const HEADER_PATTERN = /^(\*+|#+)[ \t]+(\S.*?)\s*$/;
const BULLET_PATTERN = /^([ \t]*)-[ \t]+(.*?)\s*$/;
const DIRECTIVE_PATTERN = /^\.([a-z]+)(?:[ \t]+(.*))?$/;
const FENCE_OPEN_PATTERN = /^(`{3,}|~{3,})(.*)$/;
const LEADING_WHITESPACE = /^[ \t]+/;

const DIRECTIVE_NAME_SET: ReadonlySet<string> = new Set<string>(DIRECTIVE_NAMES);

function isDirectiveName(name: string): name is DirectiveName {
  return DIRECTIVE_NAME_SET.has(name);
}

/**
 * Whether a line closes the fence opened with `fence`: the same character,
 * at least as many of it, and nothing else.
 */
export function isFenceClose(raw: string, fence: string): boolean {
  const trimmed = raw.trimEnd();
  if (trimmed.length < fence.length) return false;
  for (const char of trimmed) {
    if (char !== fence[0]) return false;
  }
  return true;
}

/**
 * Indented and not a bullet: a line of preformatted text
 */
export function isPreShaped(raw: string): boolean {
  return (
    raw.trim() !== '' &&
    LEADING_WHITESPACE.test(raw) &&
    !BULLET_PATTERN.test(raw)
  );
}

/**
 * Classify a single line.
 * Inside an open fence only the close marker is recognized.
 */
export function classifyLine(
  raw: string,
  line: number,
  context: ClassifyContext,
): ClassifiedLine {
  if (context.openFence) {
    return isFenceClose(raw, context.openFence)
      ? { kind: 'fenceClose', line, raw }
      : { kind: 'fenceBody', line, raw };
  }

  if (raw.trim() === '') {
    return { kind: 'blank', line, raw };
  }

  if (raw.startsWith('//')) {
    return { kind: 'comment', line, raw };
  }

  const fence = FENCE_OPEN_PATTERN.exec(raw);
  if (fence) {
    const marker = fence[1] ?? '';
    const info = (fence[2] ?? '').trim();
    // A backtick fence cannot carry backticks in its info string
    if (!(marker.startsWith('`') && info.includes('`'))) {
      return { kind: 'fenceOpen', line, raw, fence: marker, info };
    }
  }

  const header = HEADER_PATTERN.exec(raw);
  if (header) {
    return {
      kind: 'header',
      line,
      raw,
      depth: (header[1] ?? '').length,
      title: header[2] ?? '',
    };
  }

  const directive = DIRECTIVE_PATTERN.exec(raw);
  if (directive) {
    const name = directive[1] ?? '';
    if (isDirectiveName(name)) {
      return { kind: 'directive', line, raw, name, args: directive[2] ?? '' };
    }
  }

  const bullet = BULLET_PATTERN.exec(raw);
  if (bullet) {
    return {
      kind: 'bullet',
      line,
      raw,
      indent: indentWidth(bullet[1] ?? '', context.tabWidth),
      text: bullet[2] ?? '',
    };
  }

  const leading = LEADING_WHITESPACE.exec(raw);
  if (leading) {
    return {
      kind: 'pre',
      line,
      raw,
      indent: indentWidth(leading[0], context.tabWidth),
    };
  }

  return { kind: 'prose', line, raw, text: raw.trimEnd() };
}

export interface LineLexerOptions {
  tabWidth: number;
  // Number given to the first line of `source`
  firstLine?: number;
}

/**
 * Walks a document line by line with one line of lookahead.
 *
 * Tracks fence state itself, and classifies a blank line that sits between
 * two preformatted lines as an empty preformatted line.
 */
export class LineLexer implements Iterable<ClassifiedLine> {
  private readonly lines: string[];
  private readonly firstLine: number;
  private readonly tabWidth: number;
  private index = 0;
  private openFence: string | null = null;
  private previous: ClassifiedLine | null = null;
  private buffered: ClassifiedLine | null = null;

  constructor(source: string, options: LineLexerOptions) {
    this.lines = source.split(/\r?\n/);
    // A trailing newline does not start another line
    if (this.lines.length > 1 && this.lines[this.lines.length - 1] === '') {
      this.lines.pop();
    }
    this.firstLine = options.firstLine ?? 1;
    this.tabWidth = options.tabWidth;
  }

  /**
   * Look at the next line without consuming it
   */
  peek(): ClassifiedLine | undefined {
    if (!this.buffered) {
      this.buffered = this.advance() ?? null;
    }
    return this.buffered ?? undefined;
  }

  /**
   * Consume the next line
   */
  next(): ClassifiedLine | undefined {
    const line = this.peek();
    this.buffered = null;
    return line;
  }

  *[Symbol.iterator](): Iterator<ClassifiedLine> {
    let line = this.next();
    while (line) {
      yield line;
      line = this.next();
    }
  }

  private advance(): ClassifiedLine | undefined {
    if (this.index >= this.lines.length) {
      return undefined;
    }

    const raw = this.lines[this.index] ?? '';
    const lineNumber = this.firstLine + this.index;
    const following = this.lines[this.index + 1];
    this.index++;

    let classified = classifyLine(raw, lineNumber, {
      tabWidth: this.tabWidth,
      openFence: this.openFence,
    });

    if (
      classified.kind === 'blank' &&
      this.previous?.kind === 'pre' &&
      following !== undefined &&
      isPreShaped(following)
    ) {
      classified = { kind: 'pre', line: lineNumber, raw, indent: 0 };
    }

    if (classified.kind === 'fenceOpen') {
      this.openFence = classified.fence;
    } else if (classified.kind === 'fenceClose') {
      this.openFence = null;
    }

    this.previous = classified;
    return classified;
  }
}
