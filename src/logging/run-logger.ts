import type { PipelineRunLogRow, RunLogLevel } from "../types.js";

export interface RunLoggerStats {
  event_count: number;
  warn_count: number;
  error_count: number;
  flush_error_count: number;
}

export interface RunLoggerOptions {
  runId: string;
  flushBatchSize?: number;
  /** Optional durable sink; rows are buffered and handed over in batches. */
  writeBatch?: (rows: PipelineRunLogRow[]) => Promise<void>;
  consoleWrite?: (line: string) => void;
  now?: () => Date;
}

const MAX_PAYLOAD_BYTES = 16_000;
const MAX_ARRAY_ITEMS = 20;
const MAX_STRING_CHARS = 500;

function shrink(value: unknown, depth: number): unknown {
  if (depth >= 4) {
    return "[truncated_depth_limit]";
  }
  if (typeof value === "string") {
    return value.length <= MAX_STRING_CHARS ? value : `${value.slice(0, MAX_STRING_CHARS)}…`;
  }
  if (Array.isArray(value)) {
    const items = value.slice(0, MAX_ARRAY_ITEMS).map((entry) => shrink(entry, depth + 1));
    if (value.length > MAX_ARRAY_ITEMS) {
      items.push(`[truncated_items:${value.length - MAX_ARRAY_ITEMS}]`);
    }
    return items;
  }
  if (typeof value === "object" && value !== null) {
    const output: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      output[key] = shrink(entry, depth + 1);
    }
    return output;
  }
  return value;
}

function safePayload(payload: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!payload) {
    return {};
  }

  let serialized: string;
  try {
    serialized = JSON.stringify(payload);
  } catch {
    return { payload_serialization_error: true };
  }

  const sizeBytes = Buffer.byteLength(serialized, "utf8");
  const plain: Record<string, unknown> = JSON.parse(serialized);
  if (sizeBytes <= MAX_PAYLOAD_BYTES) {
    return plain;
  }

  const output: Record<string, unknown> = {
    __payload_truncated: true,
    __original_size_bytes: sizeBytes,
  };
  for (const [key, entry] of Object.entries(plain)) {
    output[key] = shrink(entry, 1);
  }
  return output;
}

export class RunLogger {
  readonly runId: string;
  private readonly flushBatchSize: number;
  private readonly writeBatch?: (rows: PipelineRunLogRow[]) => Promise<void>;
  private readonly consoleWrite: (line: string) => void;
  private readonly now: () => Date;

  private readonly buffer: PipelineRunLogRow[] = [];
  private nextSeq = 1;
  private flushChain: Promise<void> = Promise.resolve();

  private readonly stats: RunLoggerStats = {
    event_count: 0,
    warn_count: 0,
    error_count: 0,
    flush_error_count: 0,
  };

  constructor(options: RunLoggerOptions) {
    this.runId = options.runId;
    this.flushBatchSize = options.flushBatchSize ?? 25;
    this.writeBatch = options.writeBatch;
    this.consoleWrite = options.consoleWrite ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  getStats(): RunLoggerStats {
    return { ...this.stats };
  }

  log(
    level: RunLogLevel,
    stage: string,
    event: string,
    message: string,
    payload?: Record<string, unknown>,
  ): void {
    const row: PipelineRunLogRow = {
      runId: this.runId,
      seq: this.nextSeq++,
      level,
      stage,
      event,
      message,
      payload: safePayload(payload),
      timestamp: this.now().toISOString(),
    };

    this.stats.event_count += 1;
    if (level === "warn") {
      this.stats.warn_count += 1;
    } else if (level === "error") {
      this.stats.error_count += 1;
    }

    this.consoleWrite(
      JSON.stringify({
        timestamp: row.timestamp,
        run_id: row.runId,
        seq: row.seq,
        level: row.level,
        stage: row.stage,
        event: row.event,
        message: row.message,
        payload: row.payload,
      }),
    );

    if (!this.writeBatch) {
      return;
    }
    this.buffer.push(row);
    if (this.buffer.length >= this.flushBatchSize) {
      this.scheduleFlush();
    }
  }

  debug(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("debug", stage, event, message, payload);
  }

  info(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("info", stage, event, message, payload);
  }

  warn(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("warn", stage, event, message, payload);
  }

  error(stage: string, event: string, message: string, payload?: Record<string, unknown>): void {
    this.log("error", stage, event, message, payload);
  }

  async flush(): Promise<void> {
    while (this.buffer.length > 0) {
      this.scheduleFlush();
      await this.flushChain;
    }
    await this.flushChain;
  }

  private scheduleFlush(): void {
    this.flushChain = this.flushChain.then(() => this.flushInternal());
  }

  private async flushInternal(): Promise<void> {
    if (!this.writeBatch || this.buffer.length === 0) {
      return;
    }

    const rows = this.buffer.splice(0, this.buffer.length);
    try {
      await this.writeBatch(rows);
    } catch (error) {
      // Log persistence is best effort; the console line was already written.
      this.stats.flush_error_count += 1;
      this.consoleWrite(
        JSON.stringify({
          timestamp: this.now().toISOString(),
          run_id: this.runId,
          level: "error",
          stage: "logging",
          event: "log.flush.failed",
          message: "Failed to persist buffered log rows; continuing.",
          payload: {
            row_count: rows.length,
            error_message: error instanceof Error ? error.message : "unknown_error",
          },
        }),
      );
    }
  }
}

/** Logger for library callers that did not provide one. */
export function createSilentLogger(runId = "silent"): RunLogger {
  return new RunLogger({
    runId,
    consoleWrite: () => {
      // discard
    },
  });
}
