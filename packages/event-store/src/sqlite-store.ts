/**
 * @stockpile/event-store: SQLite EventStore implementation.
 *
 * All statements run through a StorageHandle, so every operation inherits
 * its reconnect and backoff behaviour. Multi-statement operations use
 * handle.transaction() (BEGIN IMMEDIATE): the write lock is taken before
 * the first read, so a read-plan-write cycle cannot interleave with
 * another writer.
 *
 * Timestamps are stored as canonical ISO 8601 text; ORDER BY on the text
 * column is chronological.
 */

import type { Connection, StorageHandle } from "@stockpile/storage";
import type {
  ContributionEvent,
  ItemKey,
  LedgerEvent,
  LedgerEventKind,
  QuantityChangeEvent,
} from "@stockpile/types";
import { buildArchiveSnapshot, computeArchiveHash, parseArchiveSnapshot } from "./archive.js";
import type {
  AppendContributionInput,
  AppendQuantityChangeInput,
  ArchiveInput,
  ArchiveSummary,
  BulkRemovalResult,
  ContributionRewriter,
  EventRef,
  EventStore,
  EventStoreOptions,
  FailedRemoval,
  LedgerArchive,
  QueryOptions,
  RewriteResult,
} from "./types.js";
import {
  applyRewrite,
  checkRemovalEntry,
  missingEntry,
  normalizeArchiveInput,
  normalizeContribution,
  normalizeItemKey,
  normalizeQuantityChange,
  normalizeQuery,
  requireIdentifier,
  stampAfter,
  summarizeRemovals,
  validateRewrite,
} from "./validation.js";
import type { NewContribution, NewQuantityChange } from "./validation.js";

// =============================================================================
// Row shapes
// =============================================================================

interface ContributionRow {
  readonly id: number;
  readonly guild_id: string;
  readonly actor_id: string;
  readonly category: string;
  readonly item_name: string;
  readonly quantity: number;
  readonly created_at: string;
}

interface QuantityChangeRow {
  readonly id: number;
  readonly guild_id: string;
  readonly item_name: string;
  readonly category: string;
  readonly old_quantity: number;
  readonly new_quantity: number;
  readonly reason: string;
  readonly notes: string | null;
  readonly changed_at: string;
  readonly changed_by_id: string;
}

/** One row of the merged contributions + quantity_changes read */
interface EventRow {
  readonly kind: string;
  readonly id: number;
  readonly guild_id: string;
  readonly category: string;
  readonly item_name: string;
  readonly actor_id: string;
  readonly quantity: number | null;
  readonly old_quantity: number | null;
  readonly new_quantity: number | null;
  readonly reason: string | null;
  readonly notes: string | null;
  readonly occurred_at: string;
}

interface ArchiveRow {
  readonly id: number;
  readonly guild_id: string;
  readonly archive_name: string;
  readonly description: string;
  readonly notes: string | null;
  readonly archived_data: string;
  readonly data_hash: string;
  readonly total_contributions: number;
  readonly total_quantity_changes: number;
  readonly created_at: string;
  readonly created_by_id: string;
}

const CONTRIBUTION_COLUMNS =
  "id, guild_id, actor_id, category, item_name, quantity, created_at";

const QUANTITY_CHANGE_COLUMNS =
  "id, guild_id, item_name, category, old_quantity, new_quantity, reason, notes, changed_at, changed_by_id";

const ARCHIVE_SUMMARY_COLUMNS =
  "id, guild_id, archive_name, description, notes, data_hash, total_contributions, total_quantity_changes, created_at, created_by_id";

// =============================================================================
// Row mapping
// =============================================================================

function toContribution(row: ContributionRow): ContributionEvent {
  return {
    kind: "contribution",
    id: row.id,
    guildId: row.guild_id,
    actorId: row.actor_id,
    category: row.category,
    itemName: row.item_name,
    quantity: row.quantity,
    occurredAt: row.created_at,
  };
}

function toQuantityChange(row: QuantityChangeRow): QuantityChangeEvent {
  return {
    kind: "quantity_change",
    id: row.id,
    guildId: row.guild_id,
    itemName: row.item_name,
    category: row.category,
    oldQuantity: row.old_quantity,
    newQuantity: row.new_quantity,
    reason: row.reason,
    notes: row.notes,
    actorId: row.changed_by_id,
    occurredAt: row.changed_at,
  };
}

function toEvent(row: EventRow): LedgerEvent {
  if (row.kind === "contribution" && row.quantity !== null) {
    return toContribution({ ...row, quantity: row.quantity, created_at: row.occurred_at });
  }
  if (
    row.kind === "quantity_change" &&
    row.old_quantity !== null &&
    row.new_quantity !== null &&
    row.reason !== null
  ) {
    return toQuantityChange({
      ...row,
      old_quantity: row.old_quantity,
      new_quantity: row.new_quantity,
      reason: row.reason,
      changed_at: row.occurred_at,
      changed_by_id: row.actor_id,
    });
  }
  throw new Error(`Malformed ledger row: ${row.kind} ${row.id}`);
}

function toArchiveSummary(row: Omit<ArchiveRow, "archived_data">): ArchiveSummary {
  return {
    id: row.id,
    guildId: row.guild_id,
    archiveName: row.archive_name,
    description: row.description,
    notes: row.notes,
    createdAt: row.created_at,
    createdBy: row.created_by_id,
    dataHash: row.data_hash,
    totalContributions: row.total_contributions,
    totalQuantityChanges: row.total_quantity_changes,
  };
}

// =============================================================================
// Statements
// =============================================================================

function nextEventId(db: Connection, kind: LedgerEventKind): number {
  const info = db.prepare("INSERT INTO ledger_sequence (kind) VALUES (?)").run(kind);
  return Number(info.lastInsertRowid);
}

function insertContribution(db: Connection, record: NewContribution): ContributionEvent {
  const id = nextEventId(db, "contribution");
  db.prepare(
    `INSERT INTO contributions (${CONTRIBUTION_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    record.guildId,
    record.actorId,
    record.category,
    record.itemName,
    record.quantity,
    record.occurredAt,
  );
  return { ...record, id };
}

function insertQuantityChange(db: Connection, record: NewQuantityChange): QuantityChangeEvent {
  const id = nextEventId(db, "quantity_change");
  db.prepare(
    `INSERT INTO quantity_changes (${QUANTITY_CHANGE_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    id,
    record.guildId,
    record.itemName,
    record.category,
    record.oldQuantity,
    record.newQuantity,
    record.reason,
    record.notes,
    record.occurredAt,
    record.actorId,
  );
  return { ...record, id };
}

function selectContributions(db: Connection, guildId: string, key: ItemKey): ContributionEvent[] {
  return db
    .prepare<unknown[], ContributionRow>(
      `SELECT ${CONTRIBUTION_COLUMNS} FROM contributions
       WHERE guild_id = ? AND category = ? AND item_name = ?
       ORDER BY created_at ASC, id ASC`,
    )
    .all(guildId, key.category, key.itemName)
    .map(toContribution);
}

function selectLatestOccurredAt(db: Connection, guildId: string, key: ItemKey): string | undefined {
  const row = db
    .prepare<unknown[], { latest: string | null }>(
      `SELECT MAX(occurred_at) AS latest FROM (
         SELECT MAX(created_at) AS occurred_at FROM contributions
         WHERE guild_id = ? AND category = ? AND item_name = ?
         UNION ALL
         SELECT MAX(changed_at) AS occurred_at FROM quantity_changes
         WHERE guild_id = ? AND category = ? AND item_name = ?
       )`,
    )
    .get(guildId, key.category, key.itemName, guildId, key.category, key.itemName);
  return row?.latest ?? undefined;
}

// =============================================================================
// Store
// =============================================================================

/**
 * SQLite-backed event store.
 *
 * The schema must exist: construct the StorageHandle with
 * `initialize: applyLedgerSchema`.
 */
export class SqliteEventStore implements EventStore {
  private readonly _handle: StorageHandle;
  private readonly _now: () => Date;

  constructor(handle: StorageHandle, options: EventStoreOptions = {}) {
    this._handle = handle;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  async appendContribution(input: AppendContributionInput): Promise<ContributionEvent> {
    const record = normalizeContribution(input, this._now);
    return this._handle.transaction((db) => insertContribution(db, record));
  }

  async appendQuantityChange(input: AppendQuantityChangeInput): Promise<QuantityChangeEvent> {
    const record = normalizeQuantityChange(input, this._now);
    return this._handle.transaction((db) => insertQuantityChange(db, record));
  }

  // ─── Read ───────────────────────────────────────────────────────────

  async queryEvents(guildId: string, options?: QueryOptions): Promise<readonly LedgerEvent[]> {
    requireIdentifier(guildId, "guildId");
    const query = normalizeQuery(options);

    const filters: string[] = ["guild_id = ?"];
    const filterParams: unknown[] = [guildId];
    if (query.category !== undefined) {
      filters.push("category = ?");
      filterParams.push(query.category);
    }
    if (query.itemName !== undefined) {
      filters.push("item_name = ?");
      filterParams.push(query.itemName);
    }
    const where = filters.join(" AND ");

    const branches: string[] = [];
    const params: unknown[] = [];
    if (query.kind === undefined || query.kind === "contribution") {
      branches.push(
        `SELECT 'contribution' AS kind, id, guild_id, category, item_name, actor_id,
                quantity, NULL AS old_quantity, NULL AS new_quantity,
                NULL AS reason, NULL AS notes, created_at AS occurred_at
         FROM contributions WHERE ${where}`,
      );
      params.push(...filterParams);
    }
    if (query.kind === undefined || query.kind === "quantity_change") {
      branches.push(
        `SELECT 'quantity_change' AS kind, id, guild_id, category, item_name,
                changed_by_id AS actor_id, NULL AS quantity, old_quantity, new_quantity,
                reason, notes, changed_at AS occurred_at
         FROM quantity_changes WHERE ${where}`,
      );
      params.push(...filterParams);
    }

    const backward = query.direction === "backward";
    let sql = `SELECT * FROM (${branches.join(" UNION ALL ")})`;

    if (query.after !== undefined) {
      const op = backward ? "<" : ">";
      sql += ` WHERE (occurred_at ${op} ? OR (occurred_at = ? AND id ${op} ?))`;
      params.push(query.after.occurredAt, query.after.occurredAt, query.after.id);
    }

    const order = backward ? "DESC" : "ASC";
    sql += ` ORDER BY occurred_at ${order}, id ${order}`;

    if (query.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(query.limit);
    }

    const rows = await this._handle.all<EventRow>(sql, params);
    return rows.map(toEvent);
  }

  async getEvent(kind: LedgerEventKind, id: number): Promise<LedgerEvent | undefined> {
    if (kind === "contribution") {
      const row = await this._handle.get<ContributionRow>(
        `SELECT ${CONTRIBUTION_COLUMNS} FROM contributions WHERE id = ?`,
        [id],
      );
      return row === undefined ? undefined : toContribution(row);
    }
    const row = await this._handle.get<QuantityChangeRow>(
      `SELECT ${QUANTITY_CHANGE_COLUMNS} FROM quantity_changes WHERE id = ?`,
      [id],
    );
    return row === undefined ? undefined : toQuantityChange(row);
  }

  async listContributions(guildId: string, key: ItemKey): Promise<readonly ContributionEvent[]> {
    requireIdentifier(guildId, "guildId");
    const itemKey = normalizeItemKey(key);
    return this._handle.execute((db) => selectContributions(db, guildId, itemKey));
  }

  // ─── Mutation ───────────────────────────────────────────────────────

  async deleteEvent(kind: LedgerEventKind, id: number): Promise<boolean> {
    const table = kind === "contribution" ? "contributions" : "quantity_changes";
    const info = await this._handle.run(`DELETE FROM ${table} WHERE id = ?`, [id]);
    return info.changes > 0;
  }

  async removeEvents(
    guildId: string,
    entries: readonly EventRef[],
  ): Promise<BulkRemovalResult> {
    requireIdentifier(guildId, "guildId");

    return this._handle.transaction((db): BulkRemovalResult => {
      const remove = {
        contribution: db.prepare("DELETE FROM contributions WHERE guild_id = ? AND id = ?"),
        quantity_change: db.prepare("DELETE FROM quantity_changes WHERE guild_id = ? AND id = ?"),
      };
      const removed: EventRef[] = [];
      const failed: FailedRemoval[] = [];

      for (const { kind, id } of entries) {
        const invalid = checkRemovalEntry({ kind, id });
        if (invalid !== undefined) {
          failed.push({ kind, id, message: invalid });
        } else if (remove[kind].run(guildId, id).changes > 0) {
          removed.push({ kind, id });
        } else {
          failed.push(missingEntry({ kind, id }));
        }
      }
      return summarizeRemovals(removed, failed);
    });
  }

  async rewriteContributions(
    guildId: string,
    key: ItemKey,
    rewriter: ContributionRewriter,
  ): Promise<RewriteResult> {
    requireIdentifier(guildId, "guildId");
    const itemKey = normalizeItemKey(key);

    return this._handle.transaction((db): RewriteResult => {
      const before = selectContributions(db, guildId, itemKey);
      const rewrite = rewriter(before);
      if (rewrite === undefined) {
        return { applied: false, before, after: before, correction: undefined };
      }

      validateRewrite(before, rewrite);
      const correction =
        rewrite.correction === undefined
          ? undefined
          : stampAfter(
              normalizeQuantityChange(rewrite.correction, this._now),
              selectLatestOccurredAt(db, guildId, itemKey),
            );

      const update = db.prepare("UPDATE contributions SET quantity = ? WHERE id = ?");
      for (const { id, quantity } of rewrite.updates) {
        update.run(quantity, id);
      }
      const remove = db.prepare("DELETE FROM contributions WHERE id = ?");
      for (const id of rewrite.deletions) {
        remove.run(id);
      }

      return {
        applied: true,
        before,
        after: applyRewrite(before, rewrite),
        correction: correction === undefined ? undefined : insertQuantityChange(db, correction),
      };
    });
  }

  // ─── Archives ───────────────────────────────────────────────────────

  async archiveGuild(input: ArchiveInput): Promise<LedgerArchive> {
    const request = normalizeArchiveInput(input);
    const archivedAt = this._now().toISOString();

    return this._handle.transaction((db): LedgerArchive => {
      const contributions = db
        .prepare<unknown[], ContributionRow>(
          `SELECT ${CONTRIBUTION_COLUMNS} FROM contributions
           WHERE guild_id = ? ORDER BY created_at ASC, id ASC`,
        )
        .all(request.guildId)
        .map(toContribution);
      const quantityChanges = db
        .prepare<unknown[], QuantityChangeRow>(
          `SELECT ${QUANTITY_CHANGE_COLUMNS} FROM quantity_changes
           WHERE guild_id = ? ORDER BY changed_at ASC, id ASC`,
        )
        .all(request.guildId)
        .map(toQuantityChange);

      const data = buildArchiveSnapshot(
        contributions,
        quantityChanges,
        archivedAt,
        request.resetQuantityChanges,
      );
      const dataHash = computeArchiveHash(data);

      const info = db
        .prepare(
          `INSERT INTO ledger_archives
             (guild_id, archive_name, description, notes, archived_data, data_hash,
              total_contributions, total_quantity_changes, created_at, created_by_id)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          request.guildId,
          request.archiveName,
          request.description,
          request.notes,
          JSON.stringify(data),
          dataHash,
          data.totalContributions,
          data.totalQuantityChanges,
          archivedAt,
          request.createdBy,
        );

      db.prepare("DELETE FROM contributions WHERE guild_id = ?").run(request.guildId);
      if (request.resetQuantityChanges) {
        db.prepare("DELETE FROM quantity_changes WHERE guild_id = ?").run(request.guildId);
      }

      return {
        id: Number(info.lastInsertRowid),
        guildId: request.guildId,
        archiveName: request.archiveName,
        description: request.description,
        notes: request.notes,
        createdAt: archivedAt,
        createdBy: request.createdBy,
        dataHash,
        totalContributions: data.totalContributions,
        totalQuantityChanges: data.totalQuantityChanges,
        data,
      };
    });
  }

  async getArchive(id: number): Promise<LedgerArchive | undefined> {
    const row = await this._handle.get<ArchiveRow>(
      `SELECT ${ARCHIVE_SUMMARY_COLUMNS}, archived_data FROM ledger_archives WHERE id = ?`,
      [id],
    );
    if (row === undefined) {
      return undefined;
    }
    return {
      ...toArchiveSummary(row),
      data: parseArchiveSnapshot(row.archived_data, row.data_hash),
    };
  }

  async listArchives(guildId: string): Promise<readonly ArchiveSummary[]> {
    requireIdentifier(guildId, "guildId");
    const rows = await this._handle.all<Omit<ArchiveRow, "archived_data">>(
      `SELECT ${ARCHIVE_SUMMARY_COLUMNS} FROM ledger_archives
       WHERE guild_id = ? ORDER BY created_at DESC, id DESC`,
      [guildId],
    );
    return rows.map(toArchiveSummary);
  }
}
