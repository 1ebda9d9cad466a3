/**
 * Render rules: one pure function per node kind
 */

import { ConfigurationError } from '../deck/errors';
import type { DeckMetadata } from '../types';
import {
  type BackgroundElement,
  type CaptionElement,
  type CodeElement,
  type HtmlElement,
  type IframeElement,
  type ImageElement,
  type LinkElement,
  type ListElement,
  RULE_KINDS,
  type RuleKind,
  type Section,
  type TextElement,
  type VideoElement,
} from '../deck/model';

export interface SectionRuleContext {
  node: Section;
  // Display form of the number, e.g. "2.1"
  formattedNumber: string;
  // Length of the number; use it as the heading level
  depth: number;
  // Styled title
  title: string;
  // Rendered children, in document order
  body: string;
}

export interface TitleSlideRuleContext {
  metadata: DeckMetadata;
  // Styled title and subtitle
  title: string;
  subtitle?: string;
}

export interface ElementRuleContext<E> {
  node: E;
  // Section the element belongs to
  section: Section;
}

export interface ListRuleContext extends ElementRuleContext<ListElement> {
  // Styled bullets
  items: string[];
}

export interface TextRuleContext extends ElementRuleContext<TextElement> {
  // Verbatim for preformatted text, styled otherwise
  lines: string[];
  // Lines joined with "\n" (preformatted) or the line-break marker (prose)
  content: string;
}

export interface CodeRuleContext extends ElementRuleContext<CodeElement> {
  playable: boolean;
  edit: boolean;
}

export interface LinkRuleContext extends ElementRuleContext<LinkElement> {
  // Styled label, or the escaped URL when the label is empty
  label: string;
  labelIsUrl: boolean;
}

export interface CaptionRuleContext extends ElementRuleContext<CaptionElement> {
  // Styled caption
  text: string;
}

export interface RuleContextMap {
  titleSlide: TitleSlideRuleContext;
  section: SectionRuleContext;
  list: ListRuleContext;
  text: TextRuleContext;
  code: CodeRuleContext;
  image: ElementRuleContext<ImageElement>;
  video: ElementRuleContext<VideoElement>;
  background: ElementRuleContext<BackgroundElement>;
  iframe: ElementRuleContext<IframeElement>;
  link: LinkRuleContext;
  html: ElementRuleContext<HtmlElement>;
  caption: CaptionRuleContext;
}

export type RenderRule<K extends RuleKind> = (
  context: RuleContextMap[K],
) => string;

export type RenderRules = { [K in RuleKind]: RenderRule<K> };

type RuleTable = { [K in RuleKind]?: RenderRule<K> };

export class RenderRuleRegistry {
  private rules: RuleTable;

  constructor(initial: Partial<RenderRules> = {}) {
    this.rules = { ...initial };
  }

  /**
   * Register (or replace) the rule for one kind
   */
  register<K extends RuleKind>(kind: K, rule: RenderRule<K>): this {
    const rules: { [P in K]?: RenderRule<P> } = this.rules;
    rules[kind] = rule;
    return this;
  }

  get<K extends RuleKind>(kind: K): RenderRule<K> | undefined {
    return this.rules[kind];
  }

  has(kind: RuleKind): boolean {
    return this.rules[kind] !== undefined;
  }

  /**
   * Kinds among `kinds` that have no rule, in canonical order
   */
  missing(kinds: Iterable<RuleKind> = RULE_KINDS): RuleKind[] {
    const wanted = new Set(kinds);
    return RULE_KINDS.filter((kind) => wanted.has(kind) && !this.has(kind));
  }

  /**
   * Throw a ConfigurationError naming every kind in `kinds` without a rule
   */
  assertCovers(kinds: Iterable<RuleKind> = RULE_KINDS): void {
    const missing = this.missing(kinds);
    if (missing.length > 0) {
      throw new ConfigurationError(missing);
    }
  }
}
