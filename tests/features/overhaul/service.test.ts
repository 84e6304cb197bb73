/**
 * Guildforge -- tests/features/overhaul/service.test.ts
 * WHAT: Confirmation tokens, the per-guild lock, backups and repair through OverhaulService.
 * WHY: A destructive run must only start with a fresh token for the exact
 *      guild and config, and never twice at once.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { OverhaulService } from "../../../src/features/overhaul/index.js";
import type { ProgressSink } from "../../../src/features/overhaul/progress.js";
import { ReactionPanelManager } from "../../../src/features/reactionRoles/manager.js";
import { ConfirmationError, RunInProgressError, ValidationError } from "../../../src/lib/errors.js";
import { communityConfig, createHarness, minimalConfig, type Harness } from "../../utils/overhaulHarness.js";

describe("OverhaulService", () => {
  let h: Harness;
  let clock: number;
  let service: OverhaulService;

  beforeEach(() => {
    h = createHarness();
    clock = 10_000;
    service = new OverhaulService({
      resolveClient: () => h.client,
      levels: h.levels,
      panels: h.panels,
      stateStore: h.stateStore,
      retry: h.retry,
      confirmationTtlMs: 60_000,
      now: () => clock,
    });
  });

  afterEach(() => {
    h.cleanup();
  });

  function startConfirmed(config = communityConfig(), sink?: ProgressSink) {
    const { token } = service.requestConfirmation("guild-1", config);
    return service.start({ guildId: "guild-1", config, confirmationToken: token, sink });
  }

  // ===== Confirmation =====

  describe("confirmation", () => {
    it("issues a token that expires after the TTL", () => {
      const { token, expiresAt } = service.requestConfirmation("guild-1", communityConfig());
      expect(token).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
      expect(expiresAt).toBe(70_000);
    });

    it("refuses a token for an invalid config", () => {
      const input = minimalConfig();
      input.features = ["leveling"];
      expect(() => service.requestConfirmation("guild-1", input)).toThrow(ValidationError);
    });

    it("checks the panel against the page size the panel manager uses", async () => {
      const panels = new ReactionPanelManager({
        entries: h.entryStore,
        panels: h.panelStore,
        resolveClient: () => h.client,
        retry: h.retry,
        pageSize: 5,
      });
      const narrow = new OverhaulService({
        resolveClient: () => h.client,
        levels: h.levels,
        panels,
        stateStore: h.stateStore,
        retry: h.retry,
        now: () => clock,
      });
      const input = minimalConfig();
      const names = ["A1", "A2", "A3", "A4", "A5", "A6", "B1", "B2", "B3", "B4", "B5", "B6"];
      input.roleTemplates = names.map((name) => ({ name }));
      input.categoryTemplates = [{ name: "Lobby", channels: [{ name: "roles" }] }];
      input.features = ["reactionRoles"];
      input.reactionRoles = {
        channelName: "roles",
        entries: [...names, "C1"].map((roleName) => ({
          roleName,
          groupKey: roleName.slice(0, 1).toLowerCase(),
        })),
      };
      input.roleTemplates.push({ name: "C1" });

      expect(panels.panelPageSize).toBe(5);
      expect(service.requestConfirmation("guild-1", input).token).toHaveLength(26);
      expect(() => narrow.requestConfirmation("guild-1", input)).toThrow(ValidationError);
      await expect(narrow.repair("guild-1", input)).rejects.toMatchObject({
        issues: [{ path: "reactionRoles.entries", message: "Panel needs 5 select menus; at most 4 fit" }],
      });
      expect(h.client.calls).toEqual([]);
    });

    it("rejects a start without a token and releases the lock", async () => {
      await expect(
        service.start({ guildId: "guild-1", config: communityConfig(), confirmationToken: undefined })
      ).rejects.toMatchObject({ reason: "missing" });
      expect(service.isRunning("guild-1")).toBe(false);
      expect(h.client.calls).toEqual([]);
    });

    it("rejects an expired token", async () => {
      const { token } = service.requestConfirmation("guild-1", communityConfig());
      clock += 60_000;

      await expect(
        service.start({ guildId: "guild-1", config: communityConfig(), confirmationToken: token })
      ).rejects.toMatchObject({ reason: "expired" });
    });

    it("rejects a token issued for another config without consuming it", async () => {
      const config = communityConfig();
      const { token } = service.requestConfirmation("guild-1", config);
      const other = { ...communityConfig(), identity: { name: "Other Guild" } };

      await expect(service.start({ guildId: "guild-1", config: other, confirmationToken: token })).rejects.toBeInstanceOf(
        ConfirmationError
      );
      await expect(
        service.start({ guildId: "guild-2", config, confirmationToken: token })
      ).rejects.toMatchObject({ reason: "mismatch" });

      const run = await service.start({ guildId: "guild-1", config, confirmationToken: token });
      expect((await run.done).status).toBe("completed");
    });

    it("accepts each token once", async () => {
      const config = communityConfig();
      const { token } = service.requestConfirmation("guild-1", config);

      const run = await service.start({ guildId: "guild-1", config, confirmationToken: token });
      await run.done;

      await expect(
        service.start({ guildId: "guild-1", config, confirmationToken: token })
      ).rejects.toMatchObject({ reason: "missing" });
    });
  });

  // ===== Running =====

  describe("start", () => {
    it("returns the planned steps and completes in the background", async () => {
      const run = await startConfirmed();

      expect(run.steps).toHaveLength(7);
      expect(service.isRunning("guild-1")).toBe(true);

      const result = await run.done;
      expect(result.status).toBe("completed");
      expect(result.completedSteps).toBe(7);
      expect(service.isRunning("guild-1")).toBe(false);
    });

    it("refuses a second run for the same guild while one is active", async () => {
      const run = await startConfirmed();

      await expect(startConfirmed()).rejects.toBeInstanceOf(RunInProgressError);
      await expect(
        service.start({ guildId: "guild-1", config: communityConfig(), confirmationToken: undefined })
      ).rejects.toBeInstanceOf(RunInProgressError);

      await run.done;
    });

    it("releases the guild and keeps the token when the client cannot be resolved", async () => {
      let resolves = 0;
      const flaky = new OverhaulService({
        resolveClient: () => {
          resolves += 1;
          if (resolves === 1) throw new Error("Guild guild-1 is not in the client cache");
          return h.client;
        },
        levels: h.levels,
        panels: h.panels,
        stateStore: h.stateStore,
        retry: h.retry,
        confirmationTtlMs: 60_000,
        now: () => clock,
      });
      const config = communityConfig();
      const { token } = flaky.requestConfirmation("guild-1", config);

      await expect(flaky.start({ guildId: "guild-1", config, confirmationToken: token })).rejects.toThrow(
        "Guild guild-1 is not in the client cache"
      );
      expect(flaky.isRunning("guild-1")).toBe(false);

      const run = await flaky.start({ guildId: "guild-1", config, confirmationToken: token });
      expect((await run.done).status).toBe("completed");
      expect((await flaky.repair("guild-1", config)).status).toBe("completed");
    });

    it("cancels before the first remote call", async () => {
      const run = await startConfirmed();
      run.cancel();

      const result = await run.done;
      expect(result.status).toBe("cancelled");
      expect(result.completedSteps).toBe(0);
      expect(h.client.calls).toEqual([]);
      expect(service.isRunning("guild-1")).toBe(false);
    });

    it("snapshots the guild before touching it when a backup is required", async () => {
      h.client.addRole({ name: "Legacy" });
      h.client.addChannel({ name: "old-chat" });
      const config = communityConfig();
      config.safety = { backupRequired: true };

      const run = await startConfirmed(config);
      await run.done;

      const snapshot = h.stateStore.latestSnapshot("guild-1");
      expect(snapshot?.roles.map((r) => r.name)).toEqual(["@everyone", "Legacy"]);
      expect(snapshot?.channels.map((c) => c.name)).toEqual(["old-chat"]);
      expect(h.client.calls.slice(0, 3).map((c) => c.op)).toEqual(["listRoles", "listChannels", "updateGuildSettings"]);
    });

    it("takes no snapshot by default", async () => {
      const run = await startConfirmed();
      await run.done;
      expect(h.stateStore.latestSnapshot("guild-1")).toBeNull();
    });

    it("reports progress to the sink", async () => {
      const writes: string[] = [];
      const sink: ProgressSink = {
        create: async (content) => {
          writes.push(content);
        },
        edit: async (content) => {
          writes.push(content);
        },
      };

      const run = await startConfirmed(communityConfig(), sink);
      await run.done;

      expect(writes[writes.length - 1].split("\n")[2]).toBe("Completed: 7/7 steps");
    });
  });

  // ===== Repair =====

  describe("repair", () => {
    it("needs no token and is a no-op after a completed run", async () => {
      const run = await startConfirmed();
      await run.done;
      const before = h.client.mutations.length;

      const result = await service.repair("guild-1", communityConfig());

      expect(result.status).toBe("completed");
      expect(h.client.mutations).toHaveLength(before);
    });

    it("refuses while a run holds the guild", async () => {
      const run = await startConfirmed();
      await expect(service.repair("guild-1", communityConfig())).rejects.toBeInstanceOf(RunInProgressError);
      await run.done;
    });

    it("validates before taking the lock", async () => {
      const input = minimalConfig();
      input.features = ["welcome"];
      await expect(service.repair("guild-1", input)).rejects.toBeInstanceOf(ValidationError);
      expect(service.isRunning("guild-1")).toBe(false);
    });
  });
});
