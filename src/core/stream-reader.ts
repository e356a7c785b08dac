import type { Readable } from "node:stream";
import { setTimeout as sleep } from "node:timers/promises";
import { InvalidStateError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

export const DEFAULT_READER_POLL_MS = 120;

export interface StreamReaderOptions {
  /** Sleep between read cycles. */
  pollMs?: number;
  /** Label used in log entries ("stdout", "stderr"). */
  name?: string;
  logger?: Logger;
}

/**
 * Background reader for one pipe of a child process.
 *
 * A worker loop on the event loop pulls whatever the pipe has buffered, stages it,
 * sleeps for `pollMs`, and repeats until `stop()` is observed. The consumer side
 * (`hasData`/`read`) never waits on the pipe.
 *
 * Staging holds exactly one chunk. Chunks arriving while the slot is occupied go to an
 * ordered overflow list, which is joined ahead of the next chunk once the slot frees up,
 * so nothing is dropped and order within the pipe is kept.
 */
export class StreamReader {
  private staged: string | null = null;
  private overflow: string[] = [];
  private stopRequested = false;
  private started = false;
  private closed = false;
  private decoderFlushed = false;
  private loop: Promise<void> | null = null;
  private readonly decoder = new TextDecoder();
  private readonly pollMs: number;
  private readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly source: Readable,
    options: StreamReaderOptions = {},
  ) {
    const pollMs = options.pollMs ?? DEFAULT_READER_POLL_MS;
    if (!Number.isInteger(pollMs) || pollMs < 1) {
      throw new RangeError("StreamReader pollMs must be a positive integer");
    }
    this.pollMs = pollMs;
    this.name = options.name ?? "pipe";
    this.logger = options.logger ?? noopLogger;
    // Pipe errors surface after the consumer stopped caring; keep them out of the host.
    this.source.on("error", (err) => {
      this.logger.debug?.("Pipe error", { stream: this.name, error: err });
    });
  }

  /** Begin the read loop. Returns immediately. */
  start(): void {
    if (this.started) {
      throw new InvalidStateError(`${this.name} reader already started`);
    }
    if (this.stopRequested) {
      throw new InvalidStateError(`${this.name} reader was stopped before it started`);
    }
    this.started = true;
    this.loop = this.run();
  }

  /** Ask the loop to exit after its current cycle. The loop closes the pipe itself. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    if (!this.started) this.close();
  }

  /** Settles once the loop has exited and the pipe is closed (at once if it never ran). */
  get stopped(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  get isStopRequested(): boolean {
    return this.stopRequested;
  }

  hasData(): boolean {
    return this.staged !== null;
  }

  /** Take the staged chunk. Returns "" when nothing new has arrived. */
  read(): string {
    const text = this.staged ?? "";
    this.staged = null;
    return text;
  }

  /**
   * Pull everything the source has buffered right now into staging.
   * The loop calls this once per cycle.
   */
  pump(): void {
    if (!this.closed && !this.source.destroyed) {
      let chunk: unknown = this.source.read();
      while (chunk !== null) {
        this.stage(this.decode(chunk));
        chunk = this.source.read();
      }
      if (this.source.readableEnded && !this.decoderFlushed) {
        this.decoderFlushed = true;
        this.stage(this.decoder.decode());
      }
    }
    // Backlog left behind by a read() with no new chunk to carry it.
    if (this.staged === null && this.overflow.length > 0) {
      this.staged = this.overflow.join("");
      this.overflow = [];
    }
  }

  /** Pump once more, then take staged text and the whole overflow backlog. */
  flush(): string {
    this.pump();
    const text = (this.staged ?? "") + this.overflow.join("");
    this.staged = null;
    this.overflow = [];
    return text;
  }

  private stage(chunk: string): void {
    if (chunk === "") return;
    if (this.staged !== null) {
      this.overflow.push(chunk);
    } else if (this.overflow.length > 0) {
      this.staged = this.overflow.join("") + chunk;
      this.overflow = [];
    } else {
      this.staged = chunk;
    }
  }

  private decode(chunk: unknown): string {
    if (typeof chunk === "string") return chunk;
    if (chunk instanceof Uint8Array) return this.decoder.decode(chunk, { stream: true });
    return String(chunk);
  }

  private async run(): Promise<void> {
    this.logger.debug?.("Reader started", { stream: this.name, pollMs: this.pollMs });
    try {
      while (true) {
        this.pump();
        // Unref'd so an idle reader never keeps the host process alive on its own.
        await sleep(this.pollMs, undefined, { ref: false });
        if (this.stopRequested) break;
      }
    } catch (err) {
      this.logger.debug?.("Reader loop failed", { stream: this.name, error: err });
    } finally {
      this.close();
      this.logger.debug?.("Reader stopped", { stream: this.name });
    }
  }

  private close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.source.destroy();
    } catch (err) {
      this.logger.debug?.("Error closing pipe", { stream: this.name, error: err });
    }
  }
}
