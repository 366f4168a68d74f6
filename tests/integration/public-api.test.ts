import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  LEXICAL_KINDS,
  getGrammar,
  loadSyntax,
  languageFromPath,
  renderMarkdown,
  themeStylesheet,
  resolveTheme,
  tokenize,
  tokensToHtml,
} from '../../src/index';
import type { SyntaxBuffer } from '../../src/index';

describe('package entry point', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('registers the pest grammar on import', () => {
    expect(getGrammar('pest')?.name).toBe('pest');
  });

  it('highlights a file opened by path', () => {
    const buffer: SyntaxBuffer = {};
    expect(loadSyntax(buffer, languageFromPath('grammars/ledger.pest'))).toBe(true);
    if (!buffer.grammar) throw new Error('grammar was not attached');

    const html = tokensToHtml(tokenize('eoi = { EOI }', buffer.grammar), buffer.grammar);
    expect(html).toBe(
      '<span class="tok-operator">eoi</span> = <span class="tok-statement">{</span> ' +
        '<span class="tok-todo">EOI</span> <span class="tok-statement">}</span>',
    );
  });

  it('enables logging from PEST_HIGHLIGHT_LOG on import', async () => {
    vi.stubEnv('PEST_HIGHLIGHT_LOG', 'warn');
    vi.resetModules();
    const fresh = await import('../../src/index');

    expect(fresh.logger.level).toBe('WARN');
    expect(fresh.logger.getEntries({ category: 'app' }).map((e) => e.message)).toEqual([
      'Logging enabled at WARN',
    ]);
  });

  it('exposes every lexical kind', () => {
    expect(LEXICAL_KINDS).toHaveLength(9);
  });

  it('pairs rendered markdown with a matching stylesheet', () => {
    const theme = resolveTheme({ classPrefix: 'pg-' });
    const html = renderMarkdown('```pest\n"x"\n```', { classPrefix: theme.classPrefix });

    expect(html).toContain('<span class="pg-string">');
    expect(themeStylesheet(theme).split('\n')).toContain('.pest-highlight .pg-string { color: #4ade80; }');
  });
});
