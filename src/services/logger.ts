export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogCategory = 'app' | 'registry' | 'render' | 'theme';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  category: LogCategory;
  message: string;
  data?: string;
}

type LogListener = (entry: LogEntry) => void;

const LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
const MAX_ENTRIES = 1000;
const MAX_DATA_LENGTH = 200;

const SENSITIVE_PATTERNS = [
  /password/i,
  /token/i,
  /secret/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function redact(str: string): string {
  if (!SENSITIVE_PATTERNS.some((p) => p.test(str))) return str;
  return str.replace(
    /("[^"]*(?:password|token|secret|api[_-]?key|authorization|credential)[^"]*"\s*:\s*)"[^"]*"/gi,
    '$1"[REDACTED]"',
  );
}

// Grammar sources can be large; keep only the head of any logged payload.
function formatData(value: unknown): string | undefined {
  if (value == null) return undefined;
  const str = redact(typeof value === 'string' ? value : JSON.stringify(value));
  if (str.length <= MAX_DATA_LENGTH) return str;
  return `${str.slice(0, MAX_DATA_LENGTH)}… (${str.length} chars)`;
}

export class Logger {
  private entries: LogEntry[] = [];
  private listeners: LogListener[] = [];
  private threshold: LogLevel | null = null;

  get enabled(): boolean {
    return this.threshold !== null;
  }

  get level(): LogLevel | null {
    return this.threshold;
  }

  enable(level: LogLevel = 'DEBUG'): void {
    this.threshold = level;
    this.log('INFO', 'app', `Logging enabled at ${level}`);
  }

  disable(): void {
    this.log('INFO', 'app', 'Logging disabled');
    this.threshold = null;
  }

  /** Enables logging when `PEST_HIGHLIGHT_LOG` names a level. */
  configureFromEnv(env: Record<string, string | undefined> = process.env): void {
    const raw = env.PEST_HIGHLIGHT_LOG?.trim().toUpperCase();
    if (raw && isLogLevel(raw)) this.enable(raw);
  }

  log(level: LogLevel, category: LogCategory, message: string, data?: unknown): void {
    if (this.threshold === null) return;
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.threshold)) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      category,
      message,
      data: formatData(data),
    };

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }

    for (const listener of this.listeners) {
      listener(entry);
    }
  }

  debug(category: LogCategory, message: string, data?: unknown): void {
    this.log('DEBUG', category, message, data);
  }

  info(category: LogCategory, message: string, data?: unknown): void {
    this.log('INFO', category, message, data);
  }

  warn(category: LogCategory, message: string, data?: unknown): void {
    this.log('WARN', category, message, data);
  }

  error(category: LogCategory, message: string, data?: unknown): void {
    this.log('ERROR', category, message, data);
  }

  getEntries(filter?: { level?: LogLevel; category?: LogCategory }): LogEntry[] {
    let result = this.entries;
    if (filter?.level) {
      const minIdx = LEVELS.indexOf(filter.level);
      result = result.filter((e) => LEVELS.indexOf(e.level) >= minIdx);
    }
    if (filter?.category) {
      result = result.filter((e) => e.category === filter.category);
    }
    return result;
  }

  clear(): void {
    this.entries = [];
  }

  onLog(listener: LogListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  exportAsText(entries?: LogEntry[]): string {
    const list = entries ?? this.entries;
    return list
      .map((e) => {
        const ts = new Date(e.timestamp).toISOString();
        const data = e.data ? ` | ${e.data}` : '';
        return `[${ts}] [${e.level}] [${e.category}] ${e.message}${data}`;
      })
      .join('\n');
  }
}

export const logger = new Logger();
