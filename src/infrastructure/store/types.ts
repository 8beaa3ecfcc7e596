import type {
  Credential,
  HealthCheckResult,
  Listing,
  RateExemption,
  Webhook,
} from '../../domain/index.js';

/** Record type held by each named collection. */
export interface CollectionRecords {
  credentials: Credential;
  webhooks: Webhook;
  health_results: HealthCheckResult;
  listings: Listing;
  rate_exempt: RateExemption;
}

export type CollectionName = keyof CollectionRecords;

export type RecordOf<C extends CollectionName> = CollectionRecords[C];

/** Top-level field equality; undefined entries are ignored. */
export type RecordFilter<C extends CollectionName> = Partial<RecordOf<C>>;

export interface ListOptions {
  limit?: number;
  offset?: number;
  /** Insertion order is the default; newest-first reverses it. */
  newestFirst?: boolean;
}

/**
 * Key-indexed persistence port consumed by the operational core.
 *
 * Every record carries an `id` unique within its collection.
 * Each instance is one independently serialized handle: the request path,
 * the scheduler and webhook delivery each hold their own.
 */
export interface RegistryStore {
  readonly name: string;
  get<C extends CollectionName>(collection: C, id: string): Promise<RecordOf<C> | undefined>;
  upsert<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void>;
  /** Inserts a new record; rejects if the id already exists. */
  append<C extends CollectionName>(collection: C, record: RecordOf<C>): Promise<void>;
  list<C extends CollectionName>(
    collection: C,
    filter?: RecordFilter<C>,
    options?: ListOptions,
  ): Promise<RecordOf<C>[]>;
  count<C extends CollectionName>(collection: C, filter?: RecordFilter<C>): Promise<number>;
  remove<C extends CollectionName>(collection: C, id: string): Promise<boolean>;
}

/** The three handles the process runs on, plus their shared teardown. */
export interface StoreHandles {
  requests: RegistryStore;
  scheduler: RegistryStore;
  webhooks: RegistryStore;
  close(): Promise<void>;
}
