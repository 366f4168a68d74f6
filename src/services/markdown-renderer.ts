import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import remarkRehype from 'remark-rehype';
import rehypeSanitize, { defaultSchema } from 'rehype-sanitize';
import type { Options as SanitizeSchema } from 'rehype-sanitize';
import rehypeStringify from 'rehype-stringify';
import { visit } from 'unist-util-visit';
import type { Element, ElementContent, Root as HastRoot } from 'hast';
import { getGrammar } from '../highlight/languages/index';
import { escapeHtml, paletteClass, paletteOf, tokenize } from '../highlight/tokenizer';
import type { Grammar, Token } from '../highlight/types';
import { logger } from './logger';

const MARKDOWN_CACHE_MAX_ENTRIES = 128;
const LANGUAGE_CLASS_PREFIX = 'language-';

export interface MarkdownRenderOptions {
  /** Class prefix of highlight spans; must match the theme's `classPrefix`. */
  classPrefix?: string;
}

const renderCache = new Map<string, string>();
let cacheHits = 0;
let cacheMisses = 0;

function normalizeLineEndings(source: string): string {
  return source.replace(/\r\n?/g, '\n');
}

function hashSource(source: string): string {
  // FNV-1a 32-bit hash for deterministic cache keys.
  let hash = 0x811c9dc5;
  for (let i = 0; i < source.length; i++) {
    hash ^= source.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16);
}

function makeCacheKey(path: string, source: string, classPrefix: string, mtime?: number): string {
  const stamp = mtime !== undefined && Number.isFinite(mtime) ? String(mtime) : 'no-mtime';
  return `${path}::${stamp}::${classPrefix}::${hashSource(source)}`;
}

function getCachedRender(key: string): string | null {
  const value = renderCache.get(key);
  if (value == null) return null;
  renderCache.delete(key);
  renderCache.set(key, value);
  cacheHits++;
  return value;
}

function setCachedRender(key: string, html: string): void {
  if (renderCache.has(key)) {
    renderCache.delete(key);
  }
  renderCache.set(key, html);

  if (renderCache.size <= MARKDOWN_CACHE_MAX_ENTRIES) return;

  const oldestKey = renderCache.keys().next().value;
  if (oldestKey) {
    renderCache.delete(oldestKey);
  }
}

function extractText(node: Element): string {
  let text = '';
  for (const child of node.children) {
    if (child.type === 'text') {
      text += child.value;
    } else if (child.type === 'element') {
      text += extractText(child);
    }
  }
  return text;
}

function fenceLanguage(node: Element): string | null {
  const className = node.properties?.className;
  if (!Array.isArray(className)) return null;
  for (const name of className) {
    if (typeof name === 'string' && name.startsWith(LANGUAGE_CLASS_PREFIX)) {
      return name.slice(LANGUAGE_CLASS_PREFIX.length);
    }
  }
  return null;
}

export function tokensToHast(tokens: Token[], grammar: Grammar, classPrefix = 'tok-'): ElementContent[] {
  return tokens.map((token): ElementContent => {
    const category = paletteOf(token, grammar);
    if (!category) return { type: 'text', value: token.value };
    return {
      type: 'element',
      tagName: 'span',
      properties: { className: [paletteClass(category, classPrefix)] },
      children: [{ type: 'text', value: token.value }],
    };
  });
}

function rehypeHighlightFences(classPrefix: string) {
  return () => (tree: HastRoot) => {
    visit(tree, 'element', (node: Element) => {
      if (node.tagName !== 'code') return;
      const language = fenceLanguage(node);
      if (!language) return;
      const grammar = getGrammar(language);
      if (!grammar) return;

      const tokens = tokenize(extractText(node), grammar);
      node.children = tokensToHast(tokens, grammar, classPrefix);
      logger.debug('render', `Highlighted ${language} fence`, { tokens: tokens.length });
    });
  };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sanitizeSchema(classPrefix: string): SanitizeSchema {
  return {
    ...defaultSchema,
    attributes: {
      ...defaultSchema.attributes,
      span: [
        ...(defaultSchema.attributes?.span ?? []),
        ['className', new RegExp(`^${escapeRegExp(classPrefix)}[a-z]+$`)],
      ],
    },
    protocols: {
      ...defaultSchema.protocols,
      href: ['http', 'https', 'mailto'],
    },
  };
}

function renderFallback(normalizedSource: string): string {
  return `<pre>${escapeHtml(normalizedSource)}</pre>`;
}

function renderMarkdownInternal(normalizedSource: string, classPrefix: string): string {
  const processor = unified()
    .use(remarkParse)
    .use(remarkGfm)
    .use(remarkRehype)
    .use(rehypeHighlightFences(classPrefix))
    .use(rehypeSanitize, sanitizeSchema(classPrefix))
    .use(rehypeStringify);

  try {
    return String(processor.processSync(normalizedSource));
  } catch (err) {
    logger.error('render', 'Markdown rendering failed; using plain fallback', String(err));
    return renderFallback(normalizedSource);
  }
}

export function renderMarkdown(source: string, options: MarkdownRenderOptions = {}): string {
  return renderMarkdownInternal(normalizeLineEndings(source), options.classPrefix ?? 'tok-');
}

export function clearMarkdownRenderCache(): void {
  renderCache.clear();
  cacheHits = 0;
  cacheMisses = 0;
}

export function getMarkdownRenderCacheStats(): { entries: number; hits: number; misses: number } {
  return { entries: renderCache.size, hits: cacheHits, misses: cacheMisses };
}

export function renderMarkdownCached(
  path: string,
  source: string,
  mtime?: number,
  options: MarkdownRenderOptions = {},
): string {
  const classPrefix = options.classPrefix ?? 'tok-';
  const normalized = normalizeLineEndings(source);
  const key = makeCacheKey(path, normalized, classPrefix, mtime);
  const cached = getCachedRender(key);
  if (cached != null) return cached;

  cacheMisses++;
  const rendered = renderMarkdownInternal(normalized, classPrefix);
  setCachedRender(key, rendered);
  return rendered;
}
