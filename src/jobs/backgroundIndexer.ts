// src/jobs/backgroundIndexer.ts
// Periodically indexes files that appeared in the documents directory.
//
// One run at a time: a tick that fires while the previous run is still
// going is skipped, not queued.

import { nanoid } from "nanoid";
import { createLogger } from "../observability/logger";
import { errorMessage } from "../knowledge/errors";
import type { BatchIndexResult } from "../knowledge/types";

const log = createLogger("jobs/backgroundIndexer");

export interface AutoIndexTarget {
  autoIndexNewFiles(): Promise<BatchIndexResult>;
}

export type TickOutcome =
  | { ran: true; result: BatchIndexResult }
  | { ran: true; error: string }
  | { ran: false };

export class BackgroundIndexer {
  private readonly workerId = `indexer-${nanoid(8)}`;
  private timer: ReturnType<typeof setInterval> | null = null;
  private active: Promise<TickOutcome> | null = null;

  constructor(
    private readonly target: AutoIndexTarget,
    private readonly intervalMs: number
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  /** Resolves when the run ends; never rejects. */
  async tick(): Promise<TickOutcome> {
    if (this.active) {
      log.debug({ workerId: this.workerId }, "Previous auto-index run still active; skipping tick");
      return { ran: false };
    }

    const run = (async (): Promise<TickOutcome> => {
      try {
        const result = await this.target.autoIndexNewFiles();
        if (result.results.length > 0) {
          log.info(
            { workerId: this.workerId, succeeded: result.succeeded, failed: result.failed },
            "Auto-indexed new files"
          );
        }
        return { ran: true, result };
      } catch (err) {
        log.error({ workerId: this.workerId, err: errorMessage(err) }, "Auto-index run failed");
        return { ran: true, error: errorMessage(err) };
      }
    })();

    this.active = run;
    try {
      return await run;
    } finally {
      this.active = null;
    }
  }

  /** Start ticking; the first run starts immediately. */
  start(): void {
    if (this.timer) return;
    if (this.intervalMs <= 0) {
      log.info("Auto-indexing disabled");
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref();
    log.info({ workerId: this.workerId, intervalMs: this.intervalMs }, "Background indexer started");
    void this.tick();
  }

  /** Stop ticking and wait for an in-flight run to finish. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info({ workerId: this.workerId }, "Background indexer stopped");
    }
    if (this.active) await this.active;
  }
}
