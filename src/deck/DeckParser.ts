/**
 * Deck Parser - classified lines → document tree
 */

import { getFullConfig } from '../config/ConfigManager';
import { type DeckMetadata, type SlideDeckConfig, SkipLevelPolicy } from '../types';
import { dedentLines } from '../utils';
import { DeckStateMachine, isAccepting, type Transition } from './DeckStateMachine';
import { buildDirective } from './directives';
import { StructuralParseError } from './errors';
import { extractFrontMatter } from './frontMatter';
import { parseInfoString } from './infoString';
import {
  type ClassifiedLine,
  type FenceOpenLine,
  type HeaderLine,
  LineLexer,
} from './LineClassifier';
import {
  type DeckDocument,
  type DeckElement,
  type ListElement,
  type Section,
  type TextElement,
  isSection,
} from './model';

export interface ParseResult {
  document: DeckDocument;
  metadata: DeckMetadata | null;
}

interface OpenSection {
  section: Section;
  // Marker depth as written; may exceed the section's depth after a forgiven skip
  markerDepth: number;
}

interface OpenFence {
  start: FenceOpenLine;
  lines: string[];
}

/**
 * Applies the effects of each state transition to the tree under construction
 */
class DocumentBuilder {
  readonly document: DeckDocument = { sections: [] };
  private readonly open: OpenSection[] = [];
  private block: ListElement | TextElement | null = null;
  private fence: OpenFence | null = null;

  constructor(private readonly skipLevelPolicy: SkipLevelPolicy) {}

  apply(transition: Transition, line: ClassifiedLine): void {
    switch (line.kind) {
      case 'blank':
        this.closeBlock();
        break;
      case 'comment':
        break;
      case 'header':
        this.closeBlock();
        this.openSection(line);
        break;
      case 'bullet': {
        if (
          transition.from === 'InList' &&
          this.block?.kind === 'list' &&
          this.block.indent === line.indent
        ) {
          this.block.items.push(line.text);
        } else {
          this.closeBlock();
          this.block = this.append({
            kind: 'list',
            line: line.line,
            items: [line.text],
            indent: line.indent,
          });
        }
        break;
      }
      case 'directive':
        this.closeBlock();
        this.append(buildDirective(line));
        break;
      case 'fenceOpen':
        this.closeBlock();
        this.fence = { start: line, lines: [] };
        break;
      case 'fenceBody':
        this.fence?.lines.push(line.raw);
        break;
      case 'fenceClose':
        this.closeFence();
        break;
      case 'prose':
      case 'pre': {
        const pre = line.kind === 'pre';
        const text = line.kind === 'prose' ? line.text : line.raw;
        if (
          transition.from === 'InText' &&
          this.block?.kind === 'text' &&
          this.block.pre === pre
        ) {
          this.block.lines.push(text);
        } else {
          this.closeBlock();
          this.block = this.append({
            kind: 'text',
            line: line.line,
            pre,
            lines: [text],
          });
        }
        break;
      }
      default: {
        const unreachable: never = line;
        throw new Error(`Unhandled line: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  get openFenceStart(): FenceOpenLine | null {
    return this.fence?.start ?? null;
  }

  finish(): DeckDocument {
    this.closeBlock();
    this.open.length = 0;
    return this.document;
  }

  private openSection(header: HeaderLine): void {
    while (
      this.open.length > 0 &&
      this.open[this.open.length - 1].markerDepth >= header.depth
    ) {
      this.open.pop();
    }

    const parent = this.open.length > 0 ? this.open[this.open.length - 1] : null;
    const openDepth = parent ? parent.section.number.length : 0;

    if (
      header.depth > openDepth + 1 &&
      this.skipLevelPolicy === SkipLevelPolicy.Strict
    ) {
      throw new StructuralParseError(
        header.line,
        `header of depth ${header.depth} skips a level (deepest open section has depth ${openDepth})`,
      );
    }

    const siblings = parent ? parent.section.elements : this.document.sections;
    const rank = siblings.filter(isSection).length + 1;
    const section: Section = {
      kind: 'section',
      number: parent ? [...parent.section.number, rank] : [rank],
      title: header.title,
      elements: [],
      line: header.line,
    };

    siblings.push(section);
    this.open.push({ section, markerDepth: header.depth });
  }

  private append<E extends DeckElement>(element: E): E {
    const current = this.open[this.open.length - 1];
    if (!current) {
      throw new StructuralParseError(
        element.line,
        'content before the first section header',
      );
    }
    current.section.elements.push(element);
    return element;
  }

  private closeBlock(): void {
    if (this.block?.kind === 'text' && this.block.pre) {
      this.block.lines = dedentLines(this.block.lines);
    }
    this.block = null;
  }

  private closeFence(): void {
    if (!this.fence) return;
    const { start, lines } = this.fence;
    const { language, attrs } = parseInfoString(start.info);
    this.append({
      kind: 'code',
      line: start.line,
      text: lines.join('\n'),
      language,
      edit: attrs.edit === 'true',
      numbers: attrs.numbers === 'true',
      attrs,
    });
    this.fence = null;
  }
}

export class DeckParser {
  private config: SlideDeckConfig;

  constructor(configOverrides?: Partial<SlideDeckConfig>) {
    this.config = { ...getFullConfig(), ...configOverrides };
  }

  /**
   * Parse a whole deck. Throws StructuralParseError on the first structural
   * problem; nothing partial is returned.
   */
  parse(source: string): ParseResult {
    const { metadata, body, lineOffset } = extractFrontMatter(source);
    const lexer = new LineLexer(body, {
      tabWidth: this.config.parser.tabWidth,
      firstLine: lineOffset + 1,
    });
    const machine = new DeckStateMachine();
    const builder = new DocumentBuilder(this.config.parser.skipLevelHeaders);

    for (const line of lexer) {
      const state = machine.state;
      const transition = machine.feed(line.kind);
      if (!transition) {
        throw new StructuralParseError(
          line.line,
          state === 'TopLevel'
            ? 'content before the first section header'
            : `unexpected ${line.kind} line`,
        );
      }
      builder.apply(transition, line);
    }

    if (!isAccepting(machine.state)) {
      const start = builder.openFenceStart;
      throw new StructuralParseError(
        start?.line ?? lineOffset + 1,
        'code fence is never closed',
      );
    }

    return { document: builder.finish(), metadata };
  }

  /**
   * Update configuration
   */
  updateConfig(configOverrides: Partial<SlideDeckConfig>): void {
    this.config = { ...this.config, ...configOverrides };
  }
}

/**
 * Parse deck text into its document tree with the current configuration
 */
export function parseDeck(
  source: string,
  configOverrides?: Partial<SlideDeckConfig>,
): DeckDocument {
  return new DeckParser(configOverrides).parse(source).document;
}
