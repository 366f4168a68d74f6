import { logger } from '../../services/logger';
import { LEXICAL_KINDS } from '../types';
import type { Grammar, LexicalKind } from '../types';

type GrammarFactory = () => Grammar;

export class GrammarDefinitionError extends Error {
  constructor(
    readonly grammar: string,
    message: string,
  ) {
    super(`${grammar}: ${message}`);
    this.name = 'GrammarDefinitionError';
  }
}

/** Per-buffer highlighting state; `currentSyntax` guards against loading twice. */
export interface SyntaxBuffer {
  currentSyntax?: string;
  grammar?: Grammar;
}

const factories = new Map<string, GrammarFactory>();
const cache = new Map<string, Grammar>();

function assertSticky(grammar: Grammar, kind: LexicalKind, pattern: RegExp): void {
  if (!pattern.sticky) {
    throw new GrammarDefinitionError(grammar.name, `pattern for '${kind}' must use the sticky (y) flag`);
  }
}

export function assertGrammar(grammar: Grammar): void {
  const seen = new Set<LexicalKind>();
  for (const rule of grammar.rules) {
    if (seen.has(rule.kind)) {
      throw new GrammarDefinitionError(grammar.name, `duplicate rule for '${rule.kind}'`);
    }
    seen.add(rule.kind);

    const { matcher } = rule;
    if (matcher.type === 'match') {
      assertSticky(grammar, rule.kind, matcher.pattern);
    } else if (matcher.type === 'region') {
      assertSticky(grammar, rule.kind, matcher.start);
      assertSticky(grammar, rule.kind, matcher.end);
      if (matcher.skip) assertSticky(grammar, rule.kind, matcher.skip);
    } else if (matcher.words.length === 0) {
      throw new GrammarDefinitionError(grammar.name, `keyword set for '${rule.kind}' is empty`);
    }
  }

  for (const kind of LEXICAL_KINDS) {
    if (seen.has(kind) && !grammar.links[kind]) {
      throw new GrammarDefinitionError(grammar.name, `no display link for '${kind}'`);
    }
  }
}

export function registerGrammar(id: string, factory: GrammarFactory): void {
  if (cache.has(id)) {
    logger.debug('registry', `Grammar '${id}' already built; registration ignored`);
    return;
  }
  factories.set(id, factory);
  logger.debug('registry', `Registered grammar '${id}'`);
}

export function getGrammar(languageId: string): Grammar | null {
  const cached = cache.get(languageId);
  if (cached) return cached;
  const factory = factories.get(languageId);
  if (!factory) return null;
  const grammar = factory();
  assertGrammar(grammar);
  cache.set(languageId, grammar);
  logger.info('registry', `Built grammar '${languageId}'`, { rules: grammar.rules.length });
  return grammar;
}

export function registeredLanguages(): string[] {
  return [...factories.keys()].sort();
}

/**
 * Attaches the grammar for `languageId` to `buffer` unless the buffer already
 * has a syntax loaded. Returns true when the grammar was attached.
 */
export function loadSyntax(buffer: SyntaxBuffer, languageId: string): boolean {
  if (buffer.currentSyntax) return false;
  const grammar = getGrammar(languageId);
  if (!grammar) {
    logger.debug('registry', `No grammar for '${languageId}'`);
    return false;
  }
  buffer.grammar = grammar;
  buffer.currentSyntax = grammar.name;
  return true;
}

const extensionMap: Record<string, string> = {
  pest: 'pest',
};

export function languageFromExtension(ext: string): string {
  return extensionMap[ext.replace(/^\./, '').toLowerCase()] ?? 'text';
}

export function languageFromPath(path: string): string {
  const name = path.split(/[/\\]/).filter(Boolean).pop() ?? '';
  const dot = name.lastIndexOf('.');
  return dot > 0 ? languageFromExtension(name.slice(dot + 1)) : 'text';
}
