/**
 * Guildforge — src/features/overhaul/index.ts
 * WHAT: Entry point for overhaul runs: confirmation, per-guild lock, backup, execution.
 * FLOWS:
 *  - requestConfirmation(guildId, config) → one-time token bound to guild + config fingerprint
 *  - start({ guildId, config, confirmationToken, sink }) → validate → lock → resolve client → consume token
 *      → plan → snapshot (backupRequired) → execute on a later tick → release lock
 *  - repair(guildId, config, opts) → validate → lock → plan → execute(repair) → release lock
 * DOCS:
 *  - AbortController: https://nodejs.org/api/globals.html#class-abortcontroller
 *  - ULID: https://github.com/ulid/spec
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ulid } from "ulid";
import { env } from "../../lib/env.js";
import { logger } from "../../lib/logger.js";
import { KeyedLock } from "../../lib/keyedLock.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import { ConfirmationError, RunInProgressError } from "../../lib/errors.js";
import type { GuildClientResolver, RemoteGuildClient } from "../../remote/types.js";
import type { LevelEngine } from "../leveling/levelEngine.js";
import type { ReactionPanelManager } from "../reactionRoles/manager.js";
import {
  configFingerprint,
  declaredRoles,
  requireValidConfiguration,
  type OverhaulConfig,
  type ValidationChecks,
} from "./configuration.js";
import { execute } from "./executor.js";
import type { OverhaulServices } from "./handlers.js";
import { plan } from "./planner.js";
import { ProgressReporter, type ProgressSink } from "./progress.js";
import type { OverhaulStateStore } from "./stateStore.js";
import type { KnownState, RunResult, Step } from "./types.js";

export interface OverhaulServiceOptions {
  resolveClient: GuildClientResolver;
  levels: LevelEngine;
  panels: ReactionPanelManager;
  stateStore: OverhaulStateStore;
  retry?: RetryOptions;
  confirmationTtlMs?: number;
  now?: () => number;
  invalidateCaches?: (guildId: string) => void;
  lock?: KeyedLock;
}

export interface StartRequest {
  guildId: string;
  config: unknown;
  confirmationToken: string | undefined;
  sink?: ProgressSink;
}

export interface OverhaulRun {
  runId: string;
  steps: Step[];
  /** Resolves when the run ends; never rejects */
  done: Promise<RunResult>;
  /** Stops the run before its next step */
  cancel(): void;
}

export interface RepairOptions {
  /** Ids to match first; defaults to what previous runs persisted */
  knownState?: KnownState;
  sink?: ProgressSink;
  signal?: AbortSignal;
}

interface PendingConfirmation {
  guildId: string;
  fingerprint: string;
  expiresAt: number;
}

export class OverhaulService {
  private readonly lock: KeyedLock;
  private readonly confirmations = new Map<string, PendingConfirmation>();
  private readonly now: () => number;
  private readonly ttlMs: number;

  constructor(private readonly options: OverhaulServiceOptions) {
    this.lock = options.lock ?? new KeyedLock();
    this.now = options.now ?? Date.now;
    this.ttlMs = options.confirmationTtlMs ?? env.CONFIRMATION_TTL_MS;
  }

  /** Validates first so a bad config never gets a token. */
  requestConfirmation(guildId: string, config: unknown): { token: string; expiresAt: number } {
    const valid = requireValidConfiguration(config, this.checks());
    this.pruneConfirmations();
    const token = ulid(this.now());
    const expiresAt = this.now() + this.ttlMs;
    this.confirmations.set(token, { guildId, fingerprint: configFingerprint(valid), expiresAt });
    logger.info({ evt: "overhaul_confirmation_issued", guildId, expiresAt }, "Overhaul confirmation requested");
    return { token, expiresAt };
  }

  /** Limits the runtime imposes on a config beyond its own shape */
  private checks(): ValidationChecks {
    return { panelPageSize: this.options.panels.panelPageSize };
  }

  isRunning(guildId: string): boolean {
    return this.lock.isHeld(guildId);
  }

  async start(request: StartRequest): Promise<OverhaulRun> {
    const { guildId } = request;
    const config = requireValidConfiguration(request.config, this.checks());

    const release = this.lock.tryAcquire(guildId);
    if (!release) throw new RunInProgressError(guildId);

    // Everything that can throw before the run is scheduled must release the lock
    let steps: Step[];
    let client: RemoteGuildClient;
    let progress: ProgressReporter | undefined;
    try {
      client = this.options.resolveClient(guildId);
      this.consumeConfirmation(request.confirmationToken, guildId, config);
      steps = plan(config, this.checks());
      this.prepare(guildId, config);
      if (config.safety.backupRequired) await this.snapshot(guildId, client);
      progress = request.sink ? new ProgressReporter(request.sink, { now: this.now }) : undefined;
    } catch (err) {
      release();
      throw err;
    }

    const runId = ulid(this.now());
    const controller = new AbortController();

    logger.info({ evt: "overhaul_started", guildId, runId, steps: steps.length }, "Overhaul scheduled");

    const done = (async (): Promise<RunResult> => {
      // Let the caller receive its handle before the first remote call
      await new Promise<void>((resolve) => setImmediate(resolve));
      try {
        return await execute(steps, {
          client,
          guildId,
          services: this.services(),
          progress,
          signal: controller.signal,
          knownState: this.options.stateStore.load(guildId),
          retry: this.options.retry,
          now: this.now,
        });
      } finally {
        release();
      }
    })();

    return { runId, steps, done, cancel: () => controller.abort() };
  }

  /**
   * Idempotent forward repair. Waits for the run; a second repair against an
   * unchanged guild makes no mutating calls.
   */
  async repair(guildId: string, config: unknown, options: RepairOptions = {}): Promise<RunResult> {
    const valid = requireValidConfiguration(config, this.checks());
    const release = this.lock.tryAcquire(guildId);
    if (!release) throw new RunInProgressError(guildId);

    try {
      const steps = plan(valid, this.checks());
      this.prepare(guildId, valid);
      return await execute(steps, {
        client: this.options.resolveClient(guildId),
        guildId,
        services: this.services(),
        progress: options.sink ? new ProgressReporter(options.sink, { now: this.now }) : undefined,
        signal: options.signal,
        knownState: options.knownState ?? this.options.stateStore.load(guildId),
        repair: true,
        retry: this.options.retry,
        now: this.now,
      });
    } finally {
      release();
    }
  }

  private services(): OverhaulServices {
    return {
      levels: this.options.levels,
      panels: this.options.panels,
      stateStore: this.options.stateStore,
      invalidateCaches: this.options.invalidateCaches,
    };
  }

  /** Template-protected roles must never become self-assignable. */
  private prepare(guildId: string, config: OverhaulConfig): void {
    this.options.panels.protectRoleNames(
      guildId,
      declaredRoles(config)
        .filter((r) => r.protected)
        .map((r) => r.name)
    );
  }

  private consumeConfirmation(token: string | undefined, guildId: string, config: OverhaulConfig): void {
    const pending = token ? this.confirmations.get(token) : undefined;
    if (!token || !pending) throw new ConfirmationError("missing");
    if (pending.expiresAt <= this.now()) {
      this.confirmations.delete(token);
      throw new ConfirmationError("expired");
    }
    if (pending.guildId !== guildId || pending.fingerprint !== configFingerprint(config)) {
      throw new ConfirmationError("mismatch");
    }
    this.confirmations.delete(token);
  }

  private pruneConfirmations(): void {
    const now = this.now();
    for (const [token, pending] of this.confirmations) {
      if (pending.expiresAt <= now) this.confirmations.delete(token);
    }
  }

  private async snapshot(guildId: string, client: RemoteGuildClient): Promise<void> {
    const retry = this.options.retry ?? {};
    const roles = await withRetry(() => client.listRoles(), { ...retry, label: "listRoles" });
    const channels = await withRetry(() => client.listChannels(), { ...retry, label: "listChannels" });
    const id = this.options.stateStore.saveSnapshot(guildId, { roles, channels });
    logger.info(
      { evt: "overhaul_snapshot_saved", guildId, snapshotId: id, roles: roles.length, channels: channels.length },
      "Pre-overhaul snapshot saved"
    );
  }
}

export { plan } from "./planner.js";
export { execute } from "./executor.js";
