/**
 * Deck Renderer - walks the document tree and dispatches every node to its rule
 */

import { getFullConfig } from '../config/ConfigManager';
import { ConfigurationError } from '../deck/errors';
import {
  collectRuleKinds,
  type DeckDocument,
  type DeckElement,
  formatSectionNumber,
  isSection,
  type Section,
} from '../deck/model';
import { InlineStyler, type StyleWarningHandler } from '../markdown/InlineStyler';
import type { DeckMetadata, SlideDeckConfig } from '../types';
import { escapeHtml } from '../utils';
import { createPlayableQuery, hasEditFlag, type PlayableQuery } from './capabilities';
import {
  type RenderRules,
  RenderRuleRegistry,
  type RuleContextMap,
} from './RenderRuleRegistry';

export interface DeckRendererOptions {
  // Answers "may this code block be executed?"; defaults to the codeChunk settings
  isPlayable?: PlayableQuery;
  // Shared style engine; one is created from the configuration otherwise
  styler?: InlineStyler;
  onStyleWarning?: StyleWarningHandler;
}

export class DeckRenderer {
  private readonly registry: RenderRuleRegistry;
  private readonly styler: InlineStyler;
  private readonly isPlayable: PlayableQuery;
  private config: SlideDeckConfig;

  constructor(
    rules: RenderRuleRegistry | Partial<RenderRules>,
    options: DeckRendererOptions = {},
    configOverrides?: Partial<SlideDeckConfig>,
  ) {
    this.config = { ...getFullConfig(), ...configOverrides };
    this.registry =
      rules instanceof RenderRuleRegistry ? rules : new RenderRuleRegistry(rules);
    this.styler =
      options.styler ??
      new InlineStyler(this.config, { onWarning: options.onStyleWarning });
    this.isPlayable =
      options.isPlayable ?? createPlayableQuery(this.config.codeChunk);
  }

  /**
   * Render a whole document, preceded by a title slide when the metadata
   * has a title and `render.titleSlide` is on. Every kind needed is checked
   * for a rule before anything is rendered.
   */
  render(document: DeckDocument, metadata: DeckMetadata | null = null): string {
    const kinds = collectRuleKinds(document.sections);
    const title = this.config.render.titleSlide ? metadata?.title : undefined;
    if (title !== undefined) {
      kinds.add('titleSlide');
    }
    this.registry.assertCovers(kinds);

    const head =
      metadata && title !== undefined ? this.renderTitleSlide(metadata, title) : '';
    return head + this.joinSections(document.sections);
  }

  /**
   * Render sibling sections independently and join them by index
   */
  renderSections(sections: readonly Section[]): string {
    this.registry.assertCovers(collectRuleKinds(sections));
    return this.joinSections(sections);
  }

  private joinSections(sections: readonly Section[]): string {
    return sections.map((section) => this.renderSection(section)).join('');
  }

  private renderTitleSlide(metadata: DeckMetadata, title: string): string {
    return this.invoke('titleSlide', {
      metadata,
      title: this.styler.style(title),
      ...(metadata.subtitle !== undefined
        ? { subtitle: this.styler.style(metadata.subtitle) }
        : {}),
    });
  }

  private renderSection(section: Section): string {
    const body = section.elements
      .map((item) =>
        isSection(item)
          ? this.renderSection(item)
          : this.renderElement(item, section),
      )
      .join('');

    return this.invoke('section', {
      node: section,
      formattedNumber: formatSectionNumber(section.number),
      depth: section.number.length,
      title: this.styler.style(section.title),
      body,
    });
  }

  private renderElement(element: DeckElement, section: Section): string {
    switch (element.kind) {
      case 'list':
        return this.invoke('list', {
          node: element,
          section,
          items: element.items.map((item) => this.styler.style(item)),
        });
      case 'text': {
        if (element.pre) {
          return this.invoke('text', {
            node: element,
            section,
            lines: [...element.lines],
            content: element.lines.join('\n'),
          });
        }
        const lines = element.lines.map((line) => this.styler.style(line));
        return this.invoke('text', {
          node: element,
          section,
          lines,
          content: lines.join(this.config.render.lineBreak),
        });
      }
      case 'code':
        return this.invoke('code', {
          node: element,
          section,
          playable: this.isPlayable(element),
          edit: hasEditFlag(element),
        });
      case 'link': {
        const labelIsUrl = element.label.trim() === '';
        return this.invoke('link', {
          node: element,
          section,
          label: labelIsUrl
            ? escapeHtml(element.url)
            : this.styler.style(element.label),
          labelIsUrl,
        });
      }
      case 'caption':
        return this.invoke('caption', {
          node: element,
          section,
          text: this.styler.style(element.text),
        });
      case 'image':
        return this.invoke('image', { node: element, section });
      case 'video':
        return this.invoke('video', { node: element, section });
      case 'background':
        return this.invoke('background', { node: element, section });
      case 'iframe':
        return this.invoke('iframe', { node: element, section });
      case 'html':
        return this.invoke('html', { node: element, section });
      default: {
        const unreachable: never = element;
        throw new Error(`Unhandled element: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private invoke<K extends keyof RuleContextMap>(
    kind: K,
    context: RuleContextMap[K],
  ): string {
    const rule = this.registry.get(kind);
    if (!rule) {
      throw new ConfigurationError([kind]);
    }
    return rule(context);
  }
}
