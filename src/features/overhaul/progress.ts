/**
 * Guildforge — src/features/overhaul/progress.ts
 * WHAT: Live status message for an overhaul run.
 * FLOWS:
 *  - begin(state) → sink.create
 *  - update(state, revision) → sink.edit, unless a newer revision already landed
 *  - finish(state) → sink.edit with the terminal rendering
 * DOCS:
 *  - Message.edit: https://discord.js.org/#/docs/discord.js/main/class/Message?scrollTo=edit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Message } from "discord.js";
import { logger } from "../../lib/logger.js";
import { apiLimiter, type RequestLimiter } from "../../lib/rateLimiter.js";
import { formatElapsed } from "../../lib/timefmt.js";
import type { ProgressState } from "./types.js";

export interface ProgressSink {
  create(content: string): Promise<void>;
  edit(content: string): Promise<void>;
}

/** Anything discord.js can send to: a text-based channel or a User (DM). */
export interface ProgressTarget {
  send(content: string): Promise<Message>;
}

/**
 * Posts one message and edits it in place. If create never succeeded, edit
 * falls back to sending a fresh message.
 */
export class MessageProgressSink implements ProgressSink {
  private message: Message | null = null;

  constructor(
    private readonly target: ProgressTarget,
    private readonly limiter: RequestLimiter = apiLimiter
  ) {}

  async create(content: string): Promise<void> {
    this.message = await this.limiter.schedule(() => this.target.send(content));
  }

  async edit(content: string): Promise<void> {
    const message = this.message;
    if (!message) {
      await this.create(content);
      return;
    }
    this.message = await this.limiter.schedule(() => message.edit(content));
  }
}

export const BAR_SEGMENTS = 20;

export function percentage(state: Pick<ProgressState, "currentStepIndex" | "totalSteps">): number {
  if (state.totalSteps <= 0) return 100;
  return Math.floor((100 * state.currentStepIndex) / state.totalSteps);
}

export function progressBar(pct: number): string {
  const filled = Math.round((Math.min(100, Math.max(0, pct)) / 100) * BAR_SEGMENTS);
  return "█".repeat(filled) + "░".repeat(BAR_SEGMENTS - filled);
}

/**
 * EXAMPLES (10 steps, 3 done, 65s in):
 *  running   → "Step 4/10: Creating categories and channels", "Elapsed: 1m 05s"
 *  failed    → "Failed at step 4 of 10: ...", "Error: Missing Permissions"
 *  cancelled → "Cancelled at step 3 of 10"
 */
export function renderProgress(state: ProgressState, now: number, title = "Server overhaul"): string {
  const elapsed = `Elapsed: ${formatElapsed(now - state.startedAt)}`;
  const pct = percentage(state);
  const header = `**${title}**`;

  switch (state.status) {
    case "completed":
      return [header, `${progressBar(100)} 100%`, `Completed: ${state.totalSteps}/${state.totalSteps} steps`, elapsed].join(
        "\n"
      );
    case "failed":
      return [
        header,
        `${progressBar(pct)} ${pct}%`,
        `Failed at step ${state.currentStepIndex + 1} of ${state.totalSteps}: ${state.stepLabel}`,
        `Error: ${state.lastError ?? "unknown error"}`,
        elapsed,
      ].join("\n");
    case "cancelled":
      return [
        header,
        `${progressBar(pct)} ${pct}%`,
        `Cancelled at step ${state.currentStepIndex} of ${state.totalSteps}`,
        elapsed,
      ].join("\n");
    case "running": {
      const step = Math.min(state.currentStepIndex + 1, state.totalSteps);
      return [header, `${progressBar(pct)} ${pct}%`, `Step ${step}/${state.totalSteps}: ${state.stepLabel}`, elapsed].join(
        "\n"
      );
    }
  }
}

export interface ProgressReporterOptions {
  title?: string;
  now?: () => number;
}

/**
 * Serialises writes to the sink. Update revisions only move forward: a write
 * whose revision is not above the last committed one is dropped. begin and
 * finish always write. Sink failures are logged and swallowed so the run
 * never depends on the status message.
 */
export class ProgressReporter {
  private chain: Promise<void> = Promise.resolve();
  private committedRevision = -1;
  private readonly title: string | undefined;
  private readonly now: () => number;

  constructor(
    private readonly sink: ProgressSink,
    options: ProgressReporterOptions = {}
  ) {
    this.title = options.title;
    this.now = options.now ?? Date.now;
  }

  begin(state: ProgressState): Promise<void> {
    return this.enqueue("create", state, 0, true);
  }

  update(state: ProgressState, revision: number): Promise<void> {
    return this.enqueue("edit", state, revision, false);
  }

  finish(state: ProgressState): Promise<void> {
    return this.enqueue("edit", state, Number.MAX_SAFE_INTEGER, true);
  }

  /** Last revision that reached the sink */
  get revision(): number {
    return this.committedRevision;
  }

  private enqueue(op: "create" | "edit", state: ProgressState, revision: number, always: boolean): Promise<void> {
    const snapshot = { ...state };
    this.chain = this.chain.then(async () => {
      if (!always && revision <= this.committedRevision) {
        logger.debug({ evt: "progress_stale_dropped", revision, committed: this.committedRevision }, "Stale progress update");
        return;
      }
      const content = renderProgress(snapshot, this.now(), this.title);
      try {
        await (op === "create" ? this.sink.create(content) : this.sink.edit(content));
        this.committedRevision = Math.max(this.committedRevision, revision);
      } catch (err) {
        logger.warn({ evt: "progress_sink_failed", op, revision, err }, "[overhaul] Progress message write failed");
      }
    });
    return this.chain;
  }
}
