import { and, eq } from "drizzle-orm";
import type { ISourceAccountStore, SourceAccount, SourceQuery, SourceService } from "@ragsync/types";
import type { DbClient } from "./client.js";
import { sourceAccounts, type SourceAccountRow } from "./schema/index.js";

function toSourceAccount(row: SourceAccountRow): SourceAccount {
  return {
    id: row.id,
    service: row.service,
    userId: row.userId,
    sourceQuery: row.sourceQuery,
    enabled: row.enabled,
    lastCollectedAt: row.lastCollectedAt,
    lastTaskId: row.lastTaskId,
  };
}

export class PgSourceAccountStore implements ISourceAccountStore {
  constructor(private readonly db: DbClient) {}

  async listEnabled(service?: SourceService): Promise<SourceAccount[]> {
    const rows = await this.db
      .select()
      .from(sourceAccounts)
      .where(
        service
          ? and(eq(sourceAccounts.enabled, true), eq(sourceAccounts.service, service))
          : eq(sourceAccounts.enabled, true),
      );
    return rows.map(toSourceAccount);
  }

  async recordCollection(
    accountId: string,
    update: { sourceQuery: SourceQuery; lastCollectedAt: Date; lastTaskId: string },
  ): Promise<void> {
    await this.db
      .update(sourceAccounts)
      .set({
        sourceQuery: update.sourceQuery,
        lastCollectedAt: update.lastCollectedAt,
        lastTaskId: update.lastTaskId,
        updatedAt: new Date(),
      })
      .where(eq(sourceAccounts.id, accountId));
  }
}
