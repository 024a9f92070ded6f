import { getEnv } from '../config/env';
import type { Credentials } from '../engine/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Context a daylog record may carry beside its own data. */
export type LogContext = {
  /** Binds every line of one batch run. */
  runId?: string;
  component?: string;
  /** ISO date of the day being filed. */
  date?: string;
  /** What an element lookup was for, e.g. "date field". */
  role?: string;
};

type Bindings = LogContext & Record<string, unknown>;

export interface LogEntry extends LogContext {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  [key: string]: unknown;
}

/** Receives each formatted line. The default writes to the console method of the level. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: Bindings;
  /** Literal values masked wherever they appear, message included. */
  secrets?: readonly string[];
  sink?: LogSink;
}

const MASK = '[REDACTED]';

// Values under these keys are masked whole; the run's own secret is masked by value.
const SECRET_KEY = /secret|passw|pwd|cookie|token/i;

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function defaultLevel(): LogLevel {
  const env = getEnv();
  return env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: Bindings;
  private readonly secrets: readonly string[];
  private readonly sink: LogSink;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? defaultLevel();
    this.context = { ...opts.context };
    this.secrets = opts.secrets ?? [];
    this.sink = opts.sink ?? consoleSink;
  }

  child(bindings: Bindings): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...bindings },
      secrets: this.secrets,
      sink: this.sink,
    });
  }

  /** Same logger, additionally masking the run's secret in every line. */
  withCredentials(credentials: Pick<Credentials, 'secret'>): Logger {
    const secrets = credentials.secret ? [...this.secrets, credentials.secret] : this.secrets;
    return new Logger({ level: this.level, context: this.context, secrets, sink: this.sink });
  }

  forDay(date: string): Logger {
    return this.child({ date });
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) return;

    const entry: LogEntry = {
      level,
      msg: this.maskSecrets(msg),
      timestamp: new Date().toISOString(),
      service: 'daylog',
      ...this.context,
    };
    for (const [key, value] of Object.entries(data ?? {})) {
      entry[key] = this.scrub(key, value);
    }

    this.sink(level, JSON.stringify(entry));
  }

  private scrub(key: string, value: unknown): unknown {
    if (typeof value === 'string') {
      return SECRET_KEY.test(key) ? MASK : this.maskSecrets(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.scrub(key, item));
    }
    if (isRecord(value)) {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) out[k] = this.scrub(k, v);
      return out;
    }
    return value;
  }

  private maskSecrets(text: string): string {
    return this.secrets.reduce((acc, secret) => acc.split(secret).join(MASK), text);
  }
}

let _root: Logger | null = null;

export function getLogger(): Logger {
  if (!_root) {
    _root = new Logger();
  }
  return _root;
}
