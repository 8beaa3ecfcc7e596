import type {
  CollectionName,
  CollectionRecords,
  ListOptions,
  RecordFilter,
  RecordOf,
  RegistryStore,
  StoreHandles,
} from './types.js';

interface Entry<T> {
  seq: number;
  record: T;
}

type Tables = { [C in CollectionName]: Map<string, Entry<CollectionRecords[C]>> };

/**
 * Process-local backing tables shared by every `MemoryStore` handle
 * opened on it. Records are cloned on the way in and out so callers
 * never alias stored state.
 */
export class MemoryBackend {
  private seq = 0;

  readonly tables: Tables = {
    credentials: new Map(),
    webhooks: new Map(),
    health_results: new Map(),
    listings: new Map(),
    rate_exempt: new Map(),
  };

  nextSeq(): number {
    this.seq += 1;
    return this.seq;
  }
}

export function matchesFilter(record: object, filter: object): boolean {
  const fields = new Map<string, unknown>(Object.entries(record));
  return Object.entries(filter).every(
    ([key, value]) => value === undefined || fields.get(key) === value,
  );
}

/**
 * In-memory `RegistryStore` used for local development and tests.
 *
 * Every operation completes synchronously inside its promise, so a handle
 * is trivially serialized.
 */
export class MemoryStore implements RegistryStore {
  constructor(
    private readonly backend: MemoryBackend,
    readonly name: string,
  ) {}

  async get<C extends CollectionName>(collection: C, id: string): Promise<RecordOf<C> | undefined> {
    const entry = this.table(collection).get(id);
    return entry === undefined ? undefined : structuredClone(entry.record);
  }

  async upsert<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void> {
    const table = this.table(collection);
    const existing = table.get(record.id);
    table.set(record.id, {
      seq: existing?.seq ?? this.backend.nextSeq(),
      record: structuredClone(record),
    });
  }

  async append<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void> {
    const table = this.table(collection);
    if (table.has(record.id)) {
      throw new Error(`Duplicate id ${record.id} in ${collection}`);
    }
    table.set(record.id, { seq: this.backend.nextSeq(), record: structuredClone(record) });
  }

  async list<C extends CollectionName>(
    collection: C,
    filter: RecordFilter<C> = {},
    options: ListOptions = {},
  ): Promise<RecordOf<C>[]> {
    const matched = [...this.table(collection).values()]
      .filter((entry) => matchesFilter(entry.record, filter))
      .sort((a, b) => (options.newestFirst ? b.seq - a.seq : a.seq - b.seq));

    const offset = options.offset ?? 0;
    const end = options.limit === undefined ? undefined : offset + options.limit;

    return matched.slice(offset, end).map((entry) => structuredClone(entry.record));
  }

  async count<C extends CollectionName>(collection: C, filter: RecordFilter<C> = {}): Promise<number> {
    let total = 0;
    for (const entry of this.table(collection).values()) {
      if (matchesFilter(entry.record, filter)) total++;
    }
    return total;
  }

  async remove<C extends CollectionName>(collection: C, id: string): Promise<boolean> {
    return this.table(collection).delete(id);
  }

  private table<C extends CollectionName>(collection: C): Map<string, Entry<RecordOf<C>>> {
    const tables: Tables = this.backend.tables;
    return tables[collection];
  }
}

/** Three independent handles over one shared in-memory backend. */
export function createMemoryHandles(backend = new MemoryBackend()): StoreHandles {
  return {
    requests: new MemoryStore(backend, 'requests'),
    scheduler: new MemoryStore(backend, 'scheduler'),
    webhooks: new MemoryStore(backend, 'webhooks'),
    close: async () => {},
  };
}
