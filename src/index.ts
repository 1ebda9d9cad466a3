/**
 * talkdeck - plain-text slide decks to HTML
 */

export {
  applySettings,
  getConfig,
  getFullConfig,
  loadSettingsFile,
  resetConfig,
  updateConfig,
} from './config/ConfigManager';
export type { DeckSettingKey, DeckSettings } from './config/ConfigManager';
export { defaultConfig } from './config/defaults';
export { DeckParser, parseDeck } from './deck/DeckParser';
export type { ParseResult } from './deck/DeckParser';
export { DeckStateMachine, traceStates } from './deck/DeckStateMachine';
export type { ParserState, Transition } from './deck/DeckStateMachine';
export {
  ConfigurationError,
  StructuralParseError,
  StyleEngineWarning,
} from './deck/errors';
export { classifyLine, LineLexer } from './deck/LineClassifier';
export type { ClassifiedLine, LineKind } from './deck/LineClassifier';
export {
  collectRuleKinds,
  ELEMENT_KINDS,
  formatSectionNumber,
  isSection,
  RULE_KINDS,
  walkSections,
} from './deck/model';
export type {
  BackgroundElement,
  CaptionElement,
  CodeElement,
  DeckDocument,
  DeckElement,
  ElementKind,
  HtmlElement,
  IframeElement,
  ImageElement,
  LinkElement,
  ListElement,
  MediaSize,
  RuleKind,
  Section,
  SectionItem,
  TextElement,
  VideoElement,
} from './deck/model';
export { renderDeck, SlideDeckEngine } from './engine/SlideDeckEngine';
export type { RenderResult, SlideDeckEngineOptions } from './engine/SlideDeckEngine';
export { InlineStyler } from './markdown/InlineStyler';
export type { StyleWarningHandler } from './markdown/InlineStyler';
export {
  createPlayableQuery,
  hasEditFlag,
  neverPlayable,
} from './render/capabilities';
export type { PlayableQuery } from './render/capabilities';
export { DeckRenderer } from './render/DeckRenderer';
export type { DeckRendererOptions } from './render/DeckRenderer';
export { RenderRuleRegistry } from './render/RenderRuleRegistry';
export type {
  CaptionRuleContext,
  CodeRuleContext,
  ElementRuleContext,
  LinkRuleContext,
  ListRuleContext,
  RenderRule,
  RenderRules,
  RuleContextMap,
  SectionRuleContext,
  TextRuleContext,
  TitleSlideRuleContext,
} from './render/RenderRuleRegistry';
export { createHtmlRenderRules } from './render/renderers/HtmlRenderRules';
export { SkipLevelPolicy } from './types';
export type {
  CodeFenceInfo,
  DeckAuthor,
  DeckMetadata,
  SlideDeckConfig,
} from './types';
