export type LexicalKind =
  | 'wrapperBrace' | 'range' | 'operator' | 'ruleName' | 'repeatCount'
  | 'escape' | 'quotedPattern' | 'predefinedKeyword' | 'comment';

export const LEXICAL_KINDS: readonly LexicalKind[] = [
  'wrapperBrace', 'range', 'operator', 'ruleName', 'repeatCount',
  'escape', 'quotedPattern', 'predefinedKeyword', 'comment',
];

export type PaletteCategory =
  | 'String' | 'Operator' | 'Comment' | 'Type' | 'Statement' | 'Todo' | 'Special';

export const PALETTE_CATEGORIES: readonly PaletteCategory[] = [
  'String', 'Operator', 'Comment', 'Type', 'Statement', 'Todo', 'Special',
];

export interface Token {
  kind: LexicalKind | null;
  value: string;
  offset: number;
}

export interface KeywordMatcher {
  type: 'keywords';
  words: readonly string[];
}

export interface PatternMatcher {
  type: 'match';
  pattern: RegExp; // Must include the sticky (y) flag; may combine with i or m
}

export interface RegionMatcher {
  type: 'region';
  start: RegExp; // sticky
  end: RegExp; // sticky
  /** Spans that are stepped over without ending the region. */
  skip?: RegExp; // sticky
  /** Kinds of contained rules that may match inside the region. */
  contains?: readonly LexicalKind[];
}

export type Matcher = KeywordMatcher | PatternMatcher | RegionMatcher;

export interface GrammarRule {
  kind: LexicalKind;
  matcher: Matcher;
  /** Contained rules only match inside a region that lists their kind. */
  contained?: boolean;
}

export type DisplayLinks = Readonly<Record<LexicalKind, PaletteCategory>>;

export interface Grammar {
  name: string;
  rules: readonly GrammarRule[];
  links: DisplayLinks;
}
