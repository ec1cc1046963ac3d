export const DOCUMENT_STORE = Symbol('DOCUMENT_STORE');

export type CollectionName = 'vehicle' | 'event' | 'part';

export type DocumentData = Record<string, unknown>;

export type StoredDocument = DocumentData & {
  id: string;
};

export type DocumentFilter = Record<string, string | number | boolean>;

export interface SortSpec {
  field: string;
  direction: 'asc' | 'desc';
}

export interface FindManyOptions {
  limit?: number;
  sort?: SortSpec;
}

export interface StoreDiagnostics {
  kind: 'mongodb' | 'memory';
  connected: boolean;
  databaseName: string | null;
  collections: string[];
}

/**
 * Schemaless collection-oriented storage. Ids are opaque strings assigned by the store.
 * `update` is a per-document atomic merge of `patch` and reports whether a document matched.
 */
export interface DocumentStore {
  insert(collection: CollectionName, doc: DocumentData): Promise<string>;
  findOne(collection: CollectionName, id: string): Promise<StoredDocument | undefined>;
  findMany(collection: CollectionName, filter: DocumentFilter, options?: FindManyOptions): Promise<StoredDocument[]>;
  update(collection: CollectionName, id: string, patch: DocumentData): Promise<boolean>;
  describe(): Promise<StoreDiagnostics>;
}

export class DocumentStoreError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'DocumentStoreError';
  }
}

export class DocumentStoreUnavailableError extends DocumentStoreError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'DocumentStoreUnavailableError';
  }
}
