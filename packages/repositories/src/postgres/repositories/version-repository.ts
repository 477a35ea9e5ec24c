import { and, asc, count, eq, sql, type SQL } from 'drizzle-orm';
import type { RecordId, Version } from '@trailkeep/protocol';
import type { DatabaseExecutor } from '../db.js';
import { versions } from '../schema/index.js';
import type {
  VersionRepository,
  AppendVersionInput,
  PatchVersionInput,
  VersionProjection,
  VersionProjectionSource,
  InsertVersionsResult,
  VersionFilter,
  InsertAllOptions,
} from '../../interfaces/index.js';
import { RecordNotFoundError } from '../../errors.js';
import { toPersistenceError } from '../errors.js';
import { rawRowToVersion, resultRows, rowToVersion } from '../rows.js';
import { whereToSql } from '../sql.js';

export class PgVersionRepository implements VersionRepository {
  constructor(private db: DatabaseExecutor) {}

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toPersistenceError(error, 'versions');
    }
  }

  private conditions(filter: VersionFilter): SQL | undefined {
    const conditions: SQL[] = [];
    if (filter.itemType !== undefined) conditions.push(eq(versions.itemType, filter.itemType));
    if (filter.itemId !== undefined) conditions.push(eq(versions.itemId, filter.itemId));
    if (filter.event !== undefined) conditions.push(eq(versions.event, filter.event));
    if (filter.originatorId !== undefined) {
      conditions.push(eq(versions.originatorId, filter.originatorId));
    }
    return conditions.length > 0 ? and(...conditions) : undefined;
  }

  async insert(input: AppendVersionInput): Promise<Version> {
    const [row] = await this.guard(() =>
      this.db
        .insert(versions)
        .values({
          id: input.id,
          event: input.event,
          itemType: input.itemType,
          itemId: input.itemId,
          itemChanges: input.itemChanges,
          originatorId: input.originatorId,
          origin: input.origin,
          meta: input.meta,
          insertedAt: new Date(),
        })
        .returning()
    );
    if (!row) {
      throw toPersistenceError(new Error('Version insert returned no row'), 'versions');
    }
    return rowToVersion(row);
  }

  async insertFromQuery(
    source: VersionProjectionSource,
    projection: VersionProjection,
    options: InsertAllOptions = {}
  ): Promise<InsertVersionsResult> {
    const query = sql`insert into ${versions} (${sql.join(
      [
        'event',
        'item_type',
        'item_id',
        'item_changes',
        'originator_id',
        'origin',
        'meta',
        'inserted_at',
      ].map((column) => sql.identifier(column)),
      sql`, `
    )}) select ${projection.event}, ${projection.itemType}, ${sql.identifier('id')}, ${JSON.stringify(
      projection.itemChanges
    )}::jsonb, ${projection.originatorId}, ${projection.origin}, ${
      projection.meta === null ? null : JSON.stringify(projection.meta)
    }::jsonb, now() from ${sql.identifier(source.table)} where ${whereToSql(
      source.where
    )} order by ${sql.identifier('id')} returning *`;

    const rows = await this.guard(async () => resultRows(await this.db.execute(query)));

    return {
      count: rows.length,
      versions: options.returning ? rows.map((r) => rawRowToVersion(r)) : null,
    };
  }

  async patch(id: RecordId, input: PatchVersionInput): Promise<Version> {
    const [row] = await this.guard(() =>
      this.db
        .update(versions)
        .set({ itemId: input.itemId, itemChanges: input.itemChanges })
        .where(eq(versions.id, id))
        .returning()
    );
    if (!row) {
      throw new RecordNotFoundError('versions', id);
    }
    return rowToVersion(row);
  }

  async get(id: RecordId): Promise<Version | null> {
    const [row] = await this.guard(() =>
      this.db.select().from(versions).where(eq(versions.id, id))
    );
    return row ? rowToVersion(row) : null;
  }

  async list(filter: VersionFilter = {}): Promise<Version[]> {
    const query = this.db
      .select()
      .from(versions)
      .where(this.conditions(filter))
      .orderBy(asc(versions.id))
      .$dynamic();

    if (filter.limit) {
      query.limit(filter.limit);
    }

    if (filter.offset) {
      query.offset(filter.offset);
    }

    const rows = await this.guard(() => query.execute());
    return rows.map((r) => rowToVersion(r));
  }

  async count(filter: VersionFilter = {}): Promise<number> {
    const [row] = await this.guard(() =>
      this.db.select({ count: count() }).from(versions).where(this.conditions(filter))
    );
    return row?.count ?? 0;
  }

  async maxId(): Promise<number> {
    const [row] = await this.guard(() =>
      this.db.select({ max: sql<number>`coalesce(max(${versions.id}), 0)::int` }).from(versions)
    );
    return Number(row?.max ?? 0);
  }

  async reserveId(): Promise<RecordId> {
    const [row] = await this.guard(async () =>
      resultRows(
        await this.db.execute(sql`select nextval(pg_get_serial_sequence('versions', 'id')) as id`)
      )
    );
    return Number(row?.id);
  }
}
