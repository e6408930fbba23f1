/**
 * Session-scoped log.
 *
 * One instance per research session, passed explicitly to every stage that
 * logs. Each call prints a tagged console line and keeps a structured entry
 * that is archived with the session.
 */

export type LogLevel = "info" | "warn" | "error";

export interface SessionLogEntry {
  at: string;
  level: LogLevel;
  stage: string;
  message: string;
  data?: unknown;
}

export class SessionLog {
  readonly sessionId: string;
  readonly ticker: string;
  readonly startedAt: Date;
  private readonly entries: SessionLogEntry[] = [];
  private readonly now: () => Date;
  private readonly quiet: boolean;

  constructor(
    ticker: string,
    options: { sessionId?: string; now?: () => Date; quiet?: boolean } = {}
  ) {
    this.ticker = ticker;
    this.sessionId = options.sessionId ?? crypto.randomUUID();
    this.now = options.now ?? (() => new Date());
    this.quiet = options.quiet ?? false;
    this.startedAt = this.now();
  }

  info(stage: string, message: string, data?: unknown): void {
    this.write("info", stage, message, data);
  }

  warn(stage: string, message: string, data?: unknown): void {
    this.write("warn", stage, message, data);
  }

  error(stage: string, message: string, data?: unknown): void {
    this.write("error", stage, message, data);
  }

  /** Snapshot of the entries written so far. */
  getEntries(): SessionLogEntry[] {
    return [...this.entries];
  }

  private write(
    level: LogLevel,
    stage: string,
    message: string,
    data?: unknown
  ): void {
    const entry: SessionLogEntry = {
      at: this.now().toISOString(),
      level,
      stage,
      message,
      ...(data !== undefined ? { data } : {}),
    };
    this.entries.push(entry);

    if (this.quiet) return;
    const line = `[consensus:${this.ticker}] ${stage}: ${message}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.info(line);
  }
}
