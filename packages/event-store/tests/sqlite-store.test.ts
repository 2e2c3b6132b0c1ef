/**
 * SQLite-specific behaviour of SqliteEventStore.
 *
 * Verifies:
 * - Events and archives survive closing and reopening the database file
 * - Stored archive corruption is detected on read
 * - Lock contention is retried through the StorageHandle
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { StorageHandle, openDatabase } from "@stockpile/storage";
import { SqliteEventStore } from "../src/sqlite-store.js";
import { applyLedgerSchema } from "../src/schema.js";

const rope = { category: "Misc", itemName: "Rope" };

describe("SqliteEventStore on disk", () => {
  let testDir: string;
  let filePath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "stockpile-events-"));
    filePath = join(testDir, "ledger.db");
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("keeps events across handles", async () => {
    const writer = new StorageHandle({ filePath, initialize: applyLedgerSchema });
    const first = new SqliteEventStore(writer);
    const event = await first.appendContribution({
      guildId: "guild-1",
      actorId: "user-1",
      ...rope,
      quantity: 4,
      occurredAt: "2025-01-01T00:00:00Z",
    });
    await writer.close();

    const reader = new StorageHandle({ filePath, initialize: applyLedgerSchema });
    const second = new SqliteEventStore(reader);
    expect(await second.listContributions("guild-1", rope)).toEqual([event]);

    const next = await second.appendContribution({
      guildId: "guild-1",
      actorId: "user-1",
      ...rope,
      quantity: 1,
    });
    expect(next.id).toBe(2);
    await reader.close();
  });

  it("detects an archive whose stored body was altered", async () => {
    const handle = new StorageHandle({ filePath, initialize: applyLedgerSchema });
    const store = new SqliteEventStore(handle);
    await store.appendContribution({
      guildId: "guild-1",
      actorId: "user-1",
      ...rope,
      quantity: 4,
    });
    const archive = await store.archiveGuild({
      guildId: "guild-1",
      archiveName: "Season 1",
      description: "End of season",
      createdBy: "admin-1",
    });

    await handle.run(
      "UPDATE ledger_archives SET archived_data = replace(archived_data, '\"quantity\":4', '\"quantity\":40') WHERE id = ?",
      [archive.id],
    );

    await expect(store.getArchive(archive.id)).rejects.toMatchObject({
      code: "ARCHIVE_CORRUPT",
    });
    await handle.close();
  });
});

describe("SqliteEventStore retries", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "stockpile-retry-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it("waits out a writer holding the lock, then appends", async () => {
    const filePath = join(testDir, "ledger.db");
    const blocker = openDatabase(filePath, { timeoutMs: 0 });
    const delays: number[] = [];

    const handle = new StorageHandle({
      filePath,
      busyTimeoutMs: 0,
      initialize: applyLedgerSchema,
      sleep: async (ms) => {
        delays.push(ms);
        if (blocker.inTransaction) {
          blocker.exec("COMMIT");
        }
      },
    });
    const store = new SqliteEventStore(handle);
    await handle.acquire();

    blocker.exec("BEGIN IMMEDIATE");

    const event = await store.appendContribution({
      guildId: "guild-1",
      actorId: "user-1",
      ...rope,
      quantity: 2,
    });

    expect(event.id).toBe(1);
    expect(delays).toEqual([100]);
    expect(handle.connectionCount).toBe(2);
    expect(await store.listContributions("guild-1", rope)).toEqual([event]);

    await handle.close();
    blocker.close();
  });
});
