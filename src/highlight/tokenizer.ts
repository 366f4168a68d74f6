import type {
  Grammar,
  GrammarRule,
  KeywordMatcher,
  PaletteCategory,
  RegionMatcher,
  Token,
} from './types';

const WORD_CHAR_RE = /[A-Za-z0-9_]/;

interface RuleMatch {
  rule: GrammarRule;
  tokens: Token[];
  length: number;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && WORD_CHAR_RE.test(ch);
}

// Width of the code point at `pos`, so surrogate pairs are never split.
function charWidth(source: string, pos: number): number {
  const code = source.codePointAt(pos);
  return code !== undefined && code > 0xffff ? 2 : 1;
}

function execAt(pattern: RegExp, source: string, pos: number): string | null {
  pattern.lastIndex = pos;
  const m = pattern.exec(source);
  if (!m || m.index !== pos || m[0].length === 0) return null;
  return m[0];
}

function matchKeyword(matcher: KeywordMatcher, source: string, pos: number): string | null {
  if (isWordChar(source[pos - 1])) return null;
  let end = pos;
  while (end < source.length && isWordChar(source[end])) end++;
  const word = source.slice(pos, end);
  return word && matcher.words.includes(word) ? word : null;
}

function scanRegion(
  rule: GrammarRule,
  matcher: RegionMatcher,
  grammar: Grammar,
  source: string,
  pos: number,
): Token[] | null {
  const open = execAt(matcher.start, source, pos);
  if (open == null) return null;

  const contains = matcher.contains ?? [];
  const inner = grammar.rules.filter((r) => r.contained && contains.includes(r.kind));
  const tokens: Token[] = [];
  let runStart = pos;
  let cur = pos + open.length;

  const flushRun = (end: number) => {
    if (end > runStart) {
      tokens.push({ kind: rule.kind, value: source.slice(runStart, end), offset: runStart });
    }
  };

  while (cur < source.length) {
    const nested = inner.length > 0 ? longestMatch(inner, grammar, source, cur) : null;
    if (nested) {
      flushRun(cur);
      tokens.push(...nested.tokens);
      cur += nested.length;
      runStart = cur;
      continue;
    }
    const skipped = matcher.skip ? execAt(matcher.skip, source, cur) : null;
    if (skipped != null) {
      cur += skipped.length;
      continue;
    }
    const close = execAt(matcher.end, source, cur);
    if (close != null) {
      cur += close.length;
      flushRun(cur);
      return tokens;
    }
    cur += charWidth(source, cur);
  }

  // Unterminated regions run to the end of the source
  flushRun(source.length);
  return tokens;
}

function matchRule(rule: GrammarRule, grammar: Grammar, source: string, pos: number): Token[] | null {
  const { matcher } = rule;
  switch (matcher.type) {
    case 'region':
      return scanRegion(rule, matcher, grammar, source, pos);
    case 'keywords': {
      const word = matchKeyword(matcher, source, pos);
      return word == null ? null : [{ kind: rule.kind, value: word, offset: pos }];
    }
    case 'match': {
      const text = execAt(matcher.pattern, source, pos);
      return text == null ? null : [{ kind: rule.kind, value: text, offset: pos }];
    }
  }
}

/**
 * Picks the rule to apply at `pos`: the longest match wins, a keyword beats any
 * other rule of the same length, and otherwise the rule declared last wins.
 */
function longestMatch(
  rules: readonly GrammarRule[],
  grammar: Grammar,
  source: string,
  pos: number,
): RuleMatch | null {
  let best: RuleMatch | null = null;
  for (const rule of rules) {
    const tokens = matchRule(rule, grammar, source, pos);
    if (!tokens) continue;
    const length = tokens.reduce((sum, t) => sum + t.value.length, 0);
    if (length === 0) continue;
    if (
      !best ||
      length > best.length ||
      (length === best.length &&
        (rule.matcher.type === 'keywords' || best.rule.matcher.type !== 'keywords'))
    ) {
      best = { rule, tokens, length };
    }
  }
  return best;
}

export function tokenize(source: string, grammar: Grammar): Token[] {
  const tokens: Token[] = [];
  const rules = grammar.rules.filter((r) => !r.contained);
  let pos = 0;
  let plainStart = -1;

  while (pos < source.length) {
    const match = longestMatch(rules, grammar, source, pos);
    if (match) {
      // Flush accumulated plain text
      if (plainStart !== -1) {
        tokens.push({ kind: null, value: source.slice(plainStart, pos), offset: plainStart });
        plainStart = -1;
      }
      tokens.push(...match.tokens);
      pos += match.length;
    } else {
      if (plainStart === -1) plainStart = pos;
      pos += charWidth(source, pos);
    }
  }

  // Flush remaining plain text
  if (plainStart !== -1) {
    tokens.push({ kind: null, value: source.slice(plainStart, pos), offset: plainStart });
  }

  return tokens;
}

export function paletteOf(token: Token, grammar: Grammar): PaletteCategory | null {
  return token.kind ? grammar.links[token.kind] : null;
}

export interface HtmlOptions {
  /** Prefix of the span class; the palette category is appended lower-cased. */
  classPrefix?: string;
}

export function paletteClass(category: PaletteCategory, classPrefix = 'tok-'): string {
  return `${classPrefix}${category.toLowerCase()}`;
}

export function tokensToHtml(tokens: Token[], grammar: Grammar, options: HtmlOptions = {}): string {
  let html = '';
  for (const token of tokens) {
    const escaped = escapeHtml(token.value);
    const category = paletteOf(token, grammar);
    if (category) {
      const className = escapeHtml(paletteClass(category, options.classPrefix));
      html += `<span class="${className}">${escaped}</span>`;
    } else {
      html += escaped;
    }
  }
  return html;
}
