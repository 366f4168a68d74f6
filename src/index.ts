import './highlight/languages/register-all';
import { logger } from './services/logger';

logger.configureFromEnv();

export type {
  DisplayLinks,
  Grammar,
  GrammarRule,
  KeywordMatcher,
  LexicalKind,
  Matcher,
  PaletteCategory,
  PatternMatcher,
  RegionMatcher,
  Token,
} from './highlight/types';
export { LEXICAL_KINDS, PALETTE_CATEGORIES } from './highlight/types';
export type { HtmlOptions } from './highlight/tokenizer';
export { escapeHtml, paletteClass, paletteOf, tokenize, tokensToHtml } from './highlight/tokenizer';
export type { SyntaxBuffer } from './highlight/languages/index';
export {
  GrammarDefinitionError,
  assertGrammar,
  getGrammar,
  languageFromExtension,
  languageFromPath,
  loadSyntax,
  registerGrammar,
  registeredLanguages,
} from './highlight/languages/index';
export { PEST_PREDEFINED } from './highlight/languages/pest';
export type { HighlightTheme, PaletteStyle, ThemeOverrides } from './highlight/theme';
export { defaultTheme, isHexColor, resolveTheme, themeStylesheet } from './highlight/theme';
export type { MarkdownRenderOptions } from './services/markdown-renderer';
export {
  clearMarkdownRenderCache,
  getMarkdownRenderCacheStats,
  renderMarkdown,
  renderMarkdownCached,
  tokensToHast,
} from './services/markdown-renderer';
export type { LogCategory, LogEntry, LogLevel } from './services/logger';
export { Logger, logger } from './services/logger';
