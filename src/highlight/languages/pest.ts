import { registerGrammar } from './index';
import type { DisplayLinks, Grammar, GrammarRule } from '../types';

export const PEST_PREDEFINED = Object.freeze(['ANY', 'COMMENT', 'WHITESPACE', 'SOI', 'EOI'] as const);

function create(): Grammar {
  const rules: GrammarRule[] = [
    // Silent, atomic and compound-atomic rule bodies: _{ @{ ${
    { kind: 'wrapperBrace', matcher: { type: 'match', pattern: /[_$@]?[{}]/yu } },
    // Character ranges: 'a'..'z'
    { kind: 'range', matcher: { type: 'match', pattern: /'.'\.\.'.'/yu } },
    { kind: 'operator', matcher: { type: 'match', pattern: /[()+*?!|~]/yu } },
    { kind: 'ruleName', matcher: { type: 'match', pattern: /[a-zA-Z_]+/yu } },
    // Bounded repetition: {2}, {2,}, {,4}, {2,4}
    { kind: 'repeatCount', matcher: { type: 'match', pattern: /\{[0-9,]+\}/yu } },
    { kind: 'escape', matcher: { type: 'match', pattern: /\\./yu }, contained: true },
    {
      kind: 'quotedPattern',
      matcher: { type: 'region', start: /"/yu, end: /"/yu, skip: /\\\\|\\"/yu, contains: ['escape'] },
    },
    { kind: 'predefinedKeyword', matcher: { type: 'keywords', words: Object.freeze([...PEST_PREDEFINED]) } },
    { kind: 'comment', matcher: { type: 'match', pattern: /\/\/.*/yu } },
  ];

  const links: DisplayLinks = {
    escape: 'Special',
    quotedPattern: 'String',
    range: 'String',
    operator: 'Type',
    ruleName: 'Operator',
    wrapperBrace: 'Statement',
    predefinedKeyword: 'Todo',
    repeatCount: 'Type',
    comment: 'Comment',
  };

  return Object.freeze({
    name: 'pest',
    rules: Object.freeze(rules.map((rule) => Object.freeze(rule))),
    links: Object.freeze(links),
  });
}

registerGrammar('pest', create);
