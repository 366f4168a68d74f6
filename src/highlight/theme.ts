import { logger } from '../services/logger';
import { paletteClass } from './tokenizer';
import { PALETTE_CATEGORIES } from './types';
import type { PaletteCategory } from './types';

export interface PaletteStyle {
  color: string;
  italic?: boolean;
  bold?: boolean;
}

export interface HighlightTheme {
  classPrefix: string;
  foreground: string;
  background: string;
  palette: Record<PaletteCategory, PaletteStyle>;
}

export type ThemeOverrides = Partial<Omit<HighlightTheme, 'palette'>> & {
  palette?: Partial<Record<PaletteCategory, Partial<PaletteStyle>>>;
};

const HEX_COLOR_RE = /^#(?:[0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const CLASS_PREFIX_RE = /^[a-z][\w-]*$/i;

export function defaultTheme(): HighlightTheme {
  return {
    classPrefix: 'tok-',
    foreground: '#e8e8f0',
    background: '#0a0a0e',
    palette: {
      String: { color: '#4ade80' },
      Operator: { color: '#d4e157' },
      Comment: { color: '#555568', italic: true },
      Type: { color: '#818cf8' },
      Statement: { color: '#22d3ee' },
      Todo: { color: '#a78bfa', bold: true },
      Special: { color: '#60a5fa' },
    },
  };
}

export function isHexColor(value: string): boolean {
  return HEX_COLOR_RE.test(value);
}

/** Keep `fallback` when `value` is missing or not a hex colour. */
function pickColor(field: string, value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback;
  if (isHexColor(value)) return value;
  logger.warn('theme', `Ignoring invalid colour for ${field}`, value);
  return fallback;
}

export function resolveTheme(overrides: ThemeOverrides = {}): HighlightTheme {
  const defaults = defaultTheme();

  let classPrefix = defaults.classPrefix;
  if (overrides.classPrefix !== undefined) {
    if (CLASS_PREFIX_RE.test(overrides.classPrefix)) {
      classPrefix = overrides.classPrefix;
    } else {
      logger.warn('theme', 'Ignoring invalid class prefix', overrides.classPrefix);
    }
  }

  const palette = { ...defaults.palette };
  for (const category of PALETTE_CATEGORIES) {
    const override = overrides.palette?.[category];
    if (!override) continue;
    const base = defaults.palette[category];
    palette[category] = {
      ...base,
      ...override,
      color: pickColor(category, override.color, base.color),
    };
  }

  return {
    classPrefix,
    foreground: pickColor('foreground', overrides.foreground, defaults.foreground),
    background: pickColor('background', overrides.background, defaults.background),
    palette,
  };
}

function declarations(style: PaletteStyle): string {
  const parts = [`color: ${style.color};`];
  if (style.italic) parts.push('font-style: italic;');
  if (style.bold) parts.push('font-weight: bold;');
  return parts.join(' ');
}

export function themeStylesheet(theme: HighlightTheme, scope = '.pest-highlight'): string {
  const lines = [`${scope} { color: ${theme.foreground}; background: ${theme.background}; }`];
  for (const category of PALETTE_CATEGORIES) {
    lines.push(`${scope} .${paletteClass(category, theme.classPrefix)} { ${declarations(theme.palette[category])} }`);
  }
  return lines.join('\n');
}
