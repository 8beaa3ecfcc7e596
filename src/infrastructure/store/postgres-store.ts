import { and, asc, count, desc, eq, sql, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { parseRecord } from './record-schemas.js';
import { registryRecords } from './schema.js';
import type {
  CollectionName,
  ListOptions,
  RecordFilter,
  RecordOf,
  RegistryStore,
} from './types.js';

function toJsonb(value: object): SQL {
  return sql`${JSON.stringify(value)}::jsonb`;
}

/**
 * Postgres-backed `RegistryStore`.
 *
 * Filters use JSONB containment (`@>`), served by the GIN index created in
 * `ensureRegistrySchema`. One instance wraps one single-connection pool.
 */
export class PostgresStore implements RegistryStore {
  constructor(
    private readonly db: Database,
    readonly name: string,
  ) {}

  async get<C extends CollectionName>(collection: C, id: string): Promise<RecordOf<C> | undefined> {
    const rows = await this.db
      .select({ data: registryRecords.data })
      .from(registryRecords)
      .where(and(eq(registryRecords.collection, collection), eq(registryRecords.record_id, id)))
      .limit(1);

    const row = rows[0];
    return row === undefined ? undefined : parseRecord(collection, row.data);
  }

  async upsert<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void> {
    await this.db
      .insert(registryRecords)
      .values({ collection, record_id: record.id, data: toJsonb(record) })
      .onConflictDoUpdate({
        target: [registryRecords.collection, registryRecords.record_id],
        set: { data: toJsonb(record), updated_at: new Date() },
      });
  }

  async append<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void> {
    await this.db
      .insert(registryRecords)
      .values({ collection, record_id: record.id, data: toJsonb(record) });
  }

  async list<C extends CollectionName>(
    collection: C,
    filter: RecordFilter<C> = {},
    options: ListOptions = {},
  ): Promise<RecordOf<C>[]> {
    let query = this.db
      .select({ data: registryRecords.data })
      .from(registryRecords)
      .where(this.where(collection, filter))
      .orderBy(options.newestFirst ? desc(registryRecords.seq) : asc(registryRecords.seq))
      .$dynamic();

    if (options.limit !== undefined) query = query.limit(options.limit);
    if (options.offset !== undefined) query = query.offset(options.offset);

    const rows = await query;
    return rows.map((row) => parseRecord(collection, row.data));
  }

  async count<C extends CollectionName>(collection: C, filter: RecordFilter<C> = {}): Promise<number> {
    const rows = await this.db
      .select({ total: count() })
      .from(registryRecords)
      .where(this.where(collection, filter));

    return Number(rows[0]?.total ?? 0);
  }

  async remove<C extends CollectionName>(collection: C, id: string): Promise<boolean> {
    const rows = await this.db
      .delete(registryRecords)
      .where(and(eq(registryRecords.collection, collection), eq(registryRecords.record_id, id)))
      .returning({ seq: registryRecords.seq });

    return rows.length > 0;
  }

  private where<C extends CollectionName>(collection: C, filter: RecordFilter<C>): SQL | undefined {
    const conditions: SQL[] = [eq(registryRecords.collection, collection)];

    const defined = Object.entries(filter).filter(([, value]) => value !== undefined);
    if (defined.length > 0) {
      conditions.push(sql`${registryRecords.data} @> ${toJsonb(Object.fromEntries(defined))}`);
    }

    return and(...conditions);
  }
}
