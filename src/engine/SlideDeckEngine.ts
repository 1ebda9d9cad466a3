/**
 * Slide Deck Engine - parser, style engine and renderer behind one call
 */

import { getFullConfig } from '../config/ConfigManager';
import { DeckParser, type ParseResult } from '../deck/DeckParser';
import type { DeckDocument } from '../deck/model';
import { InlineStyler, type StyleWarningHandler } from '../markdown/InlineStyler';
import type { PlayableQuery } from '../render/capabilities';
import { DeckRenderer } from '../render/DeckRenderer';
import type { RenderRuleRegistry, RenderRules } from '../render/RenderRuleRegistry';
import { createHtmlRenderRules } from '../render/renderers/HtmlRenderRules';
import type { DeckMetadata, SlideDeckConfig } from '../types';

export interface SlideDeckEngineOptions {
  // Rule set to render with; the HTML rules otherwise
  rules?: RenderRuleRegistry | Partial<RenderRules>;
  isPlayable?: PlayableQuery;
  onStyleWarning?: StyleWarningHandler;
}

export interface RenderResult {
  html: string;
  metadata: DeckMetadata | null;
  document: DeckDocument;
}

export class SlideDeckEngine {
  private parser: DeckParser;
  private styler: InlineStyler;
  private renderer: DeckRenderer;
  private config: SlideDeckConfig;

  constructor(
    configOverrides?: Partial<SlideDeckConfig>,
    private readonly options: SlideDeckEngineOptions = {},
  ) {
    this.config = { ...getFullConfig(), ...configOverrides };
    this.parser = new DeckParser(this.config);
    this.styler = new InlineStyler(this.config, {
      onWarning: options.onStyleWarning,
    });
    this.renderer = this.createRenderer();
  }

  /**
   * Parse deck text into its tree and front matter metadata
   */
  parse(text: string): ParseResult {
    return this.parser.parse(text);
  }

  /**
   * Parse and render deck text, with a title slide from the front matter
   */
  render(text: string): RenderResult {
    const { document, metadata } = this.parse(text);
    const html = this.renderer.render(document, metadata);
    return { html, metadata, document };
  }

  /**
   * Render an already parsed tree
   */
  renderDocument(document: DeckDocument): string {
    return this.renderer.render(document);
  }

  /**
   * Update configuration
   */
  updateConfig(configOverrides: Partial<SlideDeckConfig>): void {
    this.config = { ...this.config, ...configOverrides };
    this.parser = new DeckParser(this.config);
    this.styler = new InlineStyler(this.config, {
      onWarning: this.options.onStyleWarning,
    });
    this.renderer = this.createRenderer();
  }

  private createRenderer(): DeckRenderer {
    return new DeckRenderer(
      this.options.rules ?? createHtmlRenderRules(this.config),
      { styler: this.styler, isPlayable: this.options.isPlayable },
      this.config,
    );
  }
}

/**
 * Render deck text to HTML with the current configuration
 */
export function renderDeck(
  text: string,
  configOverrides?: Partial<SlideDeckConfig>,
): string {
  return new SlideDeckEngine(configOverrides).render(text).html;
}
