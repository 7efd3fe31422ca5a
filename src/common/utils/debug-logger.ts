/**
 * Flow logger for the bot pipeline.
 *
 * One line per step, tagged and colored, with an optional correlation id so
 * a single update can be followed from webhook to reply.
 *
 *   📥 RECV    - Incoming update
 *   📤 SEND    - Outgoing reply
 *   🗂️  STORE   - Message log append/query
 *   🪟 WINDOW  - Window selection
 *   🔗 LINK    - External service call
 *   ⚡ PERF    - Timing
 *   ✅ OK / ❌ ERR / ⚠️  WARN
 */

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface DebugConfig {
  enabled: boolean;
  minLevel: LogLevel;
  showTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.keys(LOG_LEVELS).includes(value);
}

const config: DebugConfig = {
  enabled: process.env.DEBUG_LOGS !== '0',
  minLevel: isLogLevel(process.env.DEBUG_LEVEL)
    ? process.env.DEBUG_LEVEL
    : 'debug',
  showTimestamp: process.env.DEBUG_TIMESTAMP !== '0',
};

const TAG_COLORS: Record<string, string> = {
  RECV: colors.cyan,
  SEND: colors.green,
  STORE: colors.blue,
  WINDOW: colors.magenta,
  LINK: colors.cyan,
  PERF: colors.bright,
  OK: colors.green,
  ERR: colors.red,
  WARN: colors.yellow,
};

/**
 * Format a value for display (truncate if too long)
 */
function formatValue(value: unknown, maxLen = 80): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'string') {
    const clean = value.replace(/\n/g, '↵').trim();
    return clean.length > maxLen ? clean.substring(0, maxLen) + '…' : clean;
  }
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > maxLen ? str.substring(0, maxLen) + '…' : str;
  }
  return String(value);
}

function formatMs(ms: number): string {
  if (ms < 1) return '<1ms';
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function timestamp(): string {
  if (!config.showTimestamp) return '';
  const now = new Date();
  const time = now.toTimeString().split(' ')[0];
  const ms = now.getMilliseconds().toString().padStart(3, '0');
  return `${colors.dim}${time}.${ms}${colors.reset} `;
}

function formatCid(cid?: string): string {
  if (!cid) return '';
  return `${colors.dim}[${cid}]${colors.reset} `;
}

class DebugLogger {
  constructor(private readonly context: string) {}

  private shouldLog(level: LogLevel): boolean {
    if (!config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[config.minLevel];
  }

  private log(
    level: LogLevel,
    emoji: string,
    tag: string,
    message: string,
    data?: Record<string, unknown>,
    cid?: string,
  ) {
    if (!this.shouldLog(level)) return;

    const tagColor = TAG_COLORS[tag] ?? colors.white;
    let line = `${timestamp()}${formatCid(cid)}${emoji} ${tagColor}${tag.padEnd(7)}${colors.reset} ${colors.dim}${this.context}${colors.reset} ${message}`;

    if (data && Object.keys(data).length > 0) {
      const dataStr = Object.entries(data)
        .map(([k, v]) => `${colors.dim}${k}=${colors.reset}${formatValue(v)}`)
        .join(' ');
      line += ` ${dataStr}`;
    }

    if (level === 'error') console.error(line);
    else console.log(line);
  }

  recv(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📥', 'RECV', message, data, cid);
  }

  send(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '📤', 'SEND', message, data, cid);
  }

  store(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('debug', '🗂️ ', 'STORE', message, data, cid);
  }

  window(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '🪟', 'WINDOW', message, data, cid);
  }

  link(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '🔗', 'LINK', message, data, cid);
  }

  perf(message: string, ms: number, cid?: string) {
    const formatted = formatMs(ms);
    const color = ms < 100 ? colors.green : ms < 500 ? colors.yellow : colors.red;
    this.log('info', '⚡', 'PERF', message, { time: `${color}${formatted}${colors.reset}` }, cid);
  }

  ok(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('info', '✅', 'OK', message, data, cid);
  }

  err(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('error', '❌', 'ERR', message, data, cid);
  }

  warn(message: string, data?: Record<string, unknown>, cid?: string) {
    this.log('warn', '⚠️ ', 'WARN', message, data, cid);
  }

  /** Log a separator line for visual grouping */
  separator(cid?: string) {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${timestamp()}${formatCid(cid)}${colors.dim}${'─'.repeat(60)}${colors.reset}`,
    );
  }

  /** Start a timer and return a function that logs the elapsed time */
  timer(label: string, cid?: string): () => void {
    const start = Date.now();
    return () => {
      this.perf(label, Date.now() - start, cid);
    };
  }
}

export function createDebugLogger(context: string): DebugLogger {
  return new DebugLogger(context);
}

export const debugLog = {
  bot: createDebugLogger('bot'),
  summary: createDebugLogger('summary'),
};

export { DebugLogger };
