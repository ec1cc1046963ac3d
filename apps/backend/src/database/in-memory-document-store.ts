import { Types } from 'mongoose';

import {
  CollectionName,
  DocumentData,
  DocumentFilter,
  DocumentStore,
  FindManyOptions,
  StoreDiagnostics,
  StoredDocument,
} from './document-store';

export type IdFactory = () => string;

const defaultIdFactory: IdFactory = () => new Types.ObjectId().toHexString();

function cloneValue(value: unknown): unknown {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (value !== null && typeof value === 'object') {
    return cloneDocument(Object.fromEntries(Object.entries(value)));
  }

  return value;
}

function cloneDocument(doc: DocumentData): DocumentData {
  return Object.fromEntries(Object.entries(doc).map(([key, value]) => [key, cloneValue(value)]));
}

/**
 * Process-local store used when no database is configured. Documents are cloned on the way
 * in and out so callers never share references with the stored copy.
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<CollectionName, Map<string, DocumentData>>();

  constructor(private readonly nextId: IdFactory = defaultIdFactory) {}

  async insert(collection: CollectionName, doc: DocumentData): Promise<string> {
    const id = this.nextId();
    const now = new Date();
    const stored: DocumentData = {
      ...this.withoutUndefined(doc),
      created_at: now,
      updated_at: now,
    };

    this.collection(collection).set(id, cloneDocument(stored));
    return id;
  }

  async findOne(collection: CollectionName, id: string): Promise<StoredDocument | undefined> {
    const doc = this.collections.get(collection)?.get(id);
    return doc ? this.toStored(id, doc) : undefined;
  }

  async findMany(
    collection: CollectionName,
    filter: DocumentFilter,
    options: FindManyOptions = {},
  ): Promise<StoredDocument[]> {
    const docs = this.collections.get(collection) ?? new Map<string, DocumentData>();
    const matches = [...docs.entries()].filter(([, doc]) =>
      Object.entries(filter).every(([field, value]) => doc[field] === value),
    );

    const { sort } = options;
    if (sort) {
      const factor = sort.direction === 'asc' ? 1 : -1;
      matches.sort(([, a], [, b]) => factor * this.compareValues(a[sort.field], b[sort.field]));
    }

    const limited = options.limit === undefined ? matches : matches.slice(0, options.limit);
    return limited.map(([id, doc]) => this.toStored(id, doc));
  }

  async update(collection: CollectionName, id: string, patch: DocumentData): Promise<boolean> {
    const docs = this.collections.get(collection);
    const current = docs?.get(id);
    if (!docs || !current) {
      return false;
    }

    docs.set(id, { ...current, ...cloneDocument(this.withoutUndefined(patch)) });
    return true;
  }

  async describe(): Promise<StoreDiagnostics> {
    return {
      kind: 'memory',
      connected: true,
      databaseName: null,
      collections: [...this.collections.keys()],
    };
  }

  private collection(name: CollectionName): Map<string, DocumentData> {
    let docs = this.collections.get(name);
    if (!docs) {
      docs = new Map();
      this.collections.set(name, docs);
    }

    return docs;
  }

  private toStored(id: string, doc: DocumentData): StoredDocument {
    return { ...cloneDocument(doc), id };
  }

  private withoutUndefined(doc: DocumentData): DocumentData {
    return Object.fromEntries(Object.entries(doc).filter(([, value]) => value !== undefined));
  }

  // Missing values sort first, like MongoDB's ascending order for absent fields.
  private compareValues(a: unknown, b: unknown): number {
    const left = a instanceof Date ? a.getTime() : a;
    const right = b instanceof Date ? b.getTime() : b;

    if (left === right) {
      return 0;
    }
    if (left === undefined || left === null) {
      return -1;
    }
    if (right === undefined || right === null) {
      return 1;
    }
    if (typeof left === 'number' && typeof right === 'number') {
      return left - right;
    }

    return String(left).localeCompare(String(right));
  }
}
