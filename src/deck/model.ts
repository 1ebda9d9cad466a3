/**
 * Document tree produced by the deck parser
 */

export type ElementKind =
  | 'list'
  | 'text'
  | 'code'
  | 'image'
  | 'video'
  | 'background'
  | 'iframe'
  | 'link'
  | 'html'
  | 'caption';

// Every kind a renderer needs a rule for; titleSlide renders front matter
export type RuleKind = ElementKind | 'section' | 'titleSlide';

export const ELEMENT_KINDS: readonly ElementKind[] = [
  'list',
  'text',
  'code',
  'image',
  'video',
  'background',
  'iframe',
  'link',
  'html',
  'caption',
];

export const RULE_KINDS: readonly RuleKind[] = [
  'titleSlide',
  'section',
  ...ELEMENT_KINDS,
];

interface ElementBase {
  // 1-based source line the element starts on
  line: number;
}

// Optional media dimensions; an absent value means the attribute is omitted
export interface MediaSize {
  height?: number;
  width?: number;
}

export interface ListElement extends ElementBase {
  kind: 'list';
  items: string[];
  indent: number;
}

export interface TextElement extends ElementBase {
  kind: 'text';
  pre: boolean;
  lines: string[];
}

export interface CodeElement extends ElementBase {
  kind: 'code';
  text: string;
  language: string;
  edit: boolean;
  numbers: boolean;
  attrs: Record<string, string>;
}

export interface ImageElement extends ElementBase, MediaSize {
  kind: 'image';
  url: string;
}

export interface VideoElement extends ElementBase, MediaSize {
  kind: 'video';
  url: string;
  sourceType: string;
}

export interface BackgroundElement extends ElementBase {
  kind: 'background';
  url: string;
}

export interface IframeElement extends ElementBase, MediaSize {
  kind: 'iframe';
  url: string;
}

export interface LinkElement extends ElementBase {
  kind: 'link';
  url: string;
  label: string;
}

/**
 * Raw markup copied into the output as is. This is the one node whose content
 * is never escaped: callers that do not trust the deck must sanitize it first.
 */
export interface HtmlElement extends ElementBase {
  kind: 'html';
  html: string;
}

export interface CaptionElement extends ElementBase {
  kind: 'caption';
  text: string;
}

export type DeckElement =
  | ListElement
  | TextElement
  | CodeElement
  | ImageElement
  | VideoElement
  | BackgroundElement
  | IframeElement
  | LinkElement
  | HtmlElement
  | CaptionElement;

export interface Section {
  kind: 'section';
  // Hierarchical position, e.g. [2, 1] for the first subsection of the second section
  number: number[];
  // Raw title; styled once, at render time
  title: string;
  elements: SectionItem[];
  line: number;
}

export type SectionItem = DeckElement | Section;

export interface DeckDocument {
  sections: Section[];
}

export function isSection(item: SectionItem): item is Section {
  return item.kind === 'section';
}

/**
 * Display form of a section number: [2, 1] → "2.1"
 */
export function formatSectionNumber(number: readonly number[]): string {
  return number.join('.');
}

/**
 * Visit every section and element in document order
 */
export function walkSections(
  sections: readonly Section[],
  visit: (item: SectionItem, parent: Section | null) => void,
  parent: Section | null = null,
): void {
  for (const section of sections) {
    visit(section, parent);
    for (const item of section.elements) {
      if (isSection(item)) {
        walkSections([item], visit, section);
      } else {
        visit(item, section);
      }
    }
  }
}

/**
 * Kinds of node present under the given sections
 */
export function collectRuleKinds(sections: readonly Section[]): Set<RuleKind> {
  const kinds = new Set<RuleKind>();
  walkSections(sections, (item) => kinds.add(item.kind));
  return kinds;
}
