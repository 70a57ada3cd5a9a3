/**
 * Structured logging: one line per entry, JSON or text, tagged with run ID and component.
 */

const LEVELS: Record<string, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: string;
  level?: string;
  output?: WritableOutput;
  runId?: string | null;
  component?: string | null;
}

export class ContextLogger {
  private _name: string;
  private _format: string;
  private _level: string;
  private _levelValue: number;
  private _output: WritableOutput;
  private _runId: string | null;
  private _component: string | null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'seqrecon';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level] ?? 20;
    this._output = options?.output ?? { write: (s: string) => console.error(s.replace(/\n$/, '')) };
    this._runId = options?.runId ?? null;
    this._component = options?.component ?? null;
  }

  get level(): string {
    return this._level;
  }

  get runId(): string | null {
    return this._runId;
  }

  get component(): string | null {
    return this._component;
  }

  /**
   * Derive a logger sharing this one's sink and settings, bound to another component.
   */
  child(component: string, runId?: string | null): ContextLogger {
    return new ContextLogger({
      name: this._name,
      format: this._format,
      level: this._level,
      output: this._output,
      runId: runId !== undefined ? runId : this._runId,
      component,
    });
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    const levelValue = LEVELS[levelName] ?? 20;
    if (levelValue < this._levelValue) return;

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        run_id: this._runId,
        component: this._component,
        logger: this._name,
        extra: extra ?? null,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const lvl = levelName.toUpperCase();
    const run = this._runId ?? 'none';
    const comp = this._component ?? this._name;
    let extrasStr = '';
    if (extra) {
      extrasStr = ' ' + Object.entries(extra).map(([k, v]) => `${k}=${formatExtra(v)}`).join(' ');
    }
    this._output.write(`${ts} [${lvl}] [run=${run}] [${comp}] ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

function formatExtra(value: unknown): string {
  if (Array.isArray(value)) return value.map(String).join(',');
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * A logger that drops everything. Used when a component is built without a context.
 */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ level: 'fatal', output: { write: () => undefined } });
}
