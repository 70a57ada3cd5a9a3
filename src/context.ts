import { v4 as uuidv4 } from 'uuid';
import { Config } from './config.js';
import { ContextLogger } from './observability/context-logger.js';

/**
 * Per-run context passed explicitly to every component: run ID, configuration, logging.
 */
export class RunContext {
  readonly runId: string;
  readonly config: Config;
  readonly startedAt: string;
  private readonly _logger: ContextLogger;

  constructor(runId: string, config: Config, logger: ContextLogger) {
    this.runId = runId;
    this.config = config;
    this.startedAt = new Date().toISOString();
    this._logger = logger;
  }

  /**
   * Create a top-level context with a generated UUID v4 run ID.
   *
   * Without an explicit logger, one is built from the `logging.level` and
   * `logging.format` config keys.
   */
  static create(options?: { config?: Config; logger?: ContextLogger; runId?: string }): RunContext {
    const config = options?.config ?? Config.withDefaults();
    const runId = options?.runId ?? uuidv4();
    const logger = options?.logger ?? new ContextLogger({
      level: config.getString('logging.level', 'info'),
      format: config.getString('logging.format', 'json'),
    });
    return new RunContext(runId, config, logger.child('run', runId));
  }

  logger(component: string): ContextLogger {
    return this._logger.child(component, this.runId);
  }
}
