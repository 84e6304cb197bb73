/**
 * Guildforge — src/features/overhaul/executor.ts
 * WHAT: Runs a planned step list against one guild, strictly in order.
 * FLOWS:
 *  - for each step: abort check → progress update → handler → persist ids
 *  - first failure: step Failed, the rest Skipped, run status "failed"
 *  - abort between steps: the rest Skipped, run status "cancelled"
 *
 * execute() never rejects; every outcome is a RunResult.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../../lib/logger.js";
import { captureException } from "../../lib/sentry.js";
import { classifyRemoteError, errorContext, userFriendlyMessage } from "../../lib/errors.js";
import { withRetry, type RetryOptions } from "../../lib/retry.js";
import type { RemoteGuildClient } from "../../remote/types.js";
import { runStep, type OverhaulServices, type StepContext } from "./handlers.js";
import type { ProgressReporter } from "./progress.js";
import {
  emptyKnownState,
  type FailedStep,
  type KnownState,
  type ProgressState,
  type RunResult,
  type Step,
} from "./types.js";

export interface ExecuteOptions {
  client: RemoteGuildClient;
  services: OverhaulServices;
  /** Defaults to client.guildId */
  guildId?: string;
  progress?: ProgressReporter;
  signal?: AbortSignal;
  /** Seed ids, e.g. from a previous run; copied, never mutated */
  knownState?: KnownState;
  repair?: boolean;
  retry?: RetryOptions;
  now?: () => number;
}

function cloneKnownState(state: KnownState): KnownState {
  return {
    roles: { ...state.roles },
    categories: { ...state.categories },
    channels: { ...state.channels },
    messages: { ...state.messages },
  };
}

export async function execute(steps: Step[], options: ExecuteOptions): Promise<RunResult> {
  const now = options.now ?? Date.now;
  const guildId = options.guildId ?? options.client.guildId;
  const knownState = cloneKnownState(options.knownState ?? emptyKnownState());
  const totalSteps = steps.length;
  const retry = options.retry ?? {};

  const ctx: StepContext = {
    client: options.client,
    guildId,
    knownState,
    repair: options.repair ?? false,
    services: options.services,
    drift: [],
    call: (label, fn) => withRetry(fn, { ...retry, label }),
  };

  const progress: ProgressState = {
    status: "running",
    currentStepIndex: 0,
    totalSteps,
    stepLabel: steps[0]?.label ?? "",
    startedAt: now(),
    lastError: null,
    cancelled: false,
  };
  let revision = 0;
  await options.progress?.begin(progress);

  logger.info(
    { evt: "overhaul_run_start", guildId, totalSteps, repair: ctx.repair },
    `[overhaul] Running ${totalSteps} steps${ctx.repair ? " (repair)" : ""}`
  );

  let completedSteps = 0;
  let failedStep: FailedStep | undefined;
  let statusError: string | null = null;
  let cancelled = false;

  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];

    if (options.signal?.aborted) {
      cancelled = true;
      markSkipped(steps, i);
      break;
    }

    step.status = "running";
    progress.currentStepIndex = completedSteps;
    progress.stepLabel = step.label;
    await options.progress?.update(progress, ++revision);

    try {
      await runStep(step, ctx);
    } catch (err) {
      const classified = classifyRemoteError(err, step.id);
      step.status = "failed";
      step.error = classified.message;
      failedStep = { id: step.id, kind: step.kind, index: i + 1, error: classified.message };
      statusError = userFriendlyMessage(classified);
      markSkipped(steps, i + 1);
      logger.error(
        { evt: "overhaul_step_failed", guildId, stepId: step.id, step: i + 1, totalSteps, ...errorContext(classified) },
        `[overhaul] Step ${i + 1}/${totalSteps} failed: ${classified.message}`
      );
      captureException(classified, { guildId, stepId: step.id });
      break;
    }

    step.status = "succeeded";
    completedSteps++;
    persist(options.services, guildId, knownState);
    logger.debug({ evt: "overhaul_step_done", guildId, stepId: step.id, step: i + 1, totalSteps }, step.label);
  }

  const status: RunResult["status"] = failedStep ? "failed" : cancelled ? "cancelled" : "completed";
  progress.status = status;
  progress.currentStepIndex = completedSteps;
  progress.lastError = statusError;
  progress.cancelled = cancelled;
  await options.progress?.finish(progress);

  logger.info(
    { evt: "overhaul_run_end", guildId, status, completedSteps, totalSteps, drift: ctx.drift.length },
    `[overhaul] Run ${status} (${completedSteps}/${totalSteps})`
  );

  return {
    status,
    completedSteps,
    totalSteps,
    failedStep,
    cancelled,
    knownState,
    steps,
    drift: ctx.drift,
  };
}

function markSkipped(steps: Step[], from: number): void {
  for (let j = from; j < steps.length; j++) steps[j].status = "skipped";
}

function persist(services: OverhaulServices, guildId: string, knownState: KnownState): void {
  if (!services.stateStore) return;
  try {
    services.stateStore.recordAll(guildId, knownState);
  } catch (err) {
    // The run continues; a later repair rediscovers ids by name.
    logger.warn({ evt: "overhaul_state_persist_failed", guildId, err }, "[overhaul] Could not persist known state");
  }
}
