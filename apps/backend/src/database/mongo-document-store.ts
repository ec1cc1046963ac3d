import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Connection, createConnection, isValidObjectId, mongo, Types } from 'mongoose';

import {
  CollectionName,
  DocumentData,
  DocumentFilter,
  DocumentStore,
  DocumentStoreError,
  DocumentStoreUnavailableError,
  FindManyOptions,
  StoreDiagnostics,
  StoredDocument,
} from './document-store';

const SERVER_SELECTION_TIMEOUT_MS = 5000;
const DIAGNOSTIC_COLLECTION_LIMIT = 10;

export interface MongoStoreOptions {
  url: string;
  databaseName: string;
}

export class MongoDocumentStore implements DocumentStore, OnModuleDestroy {
  private readonly logger = new Logger(MongoDocumentStore.name);

  private constructor(private readonly connection: Connection) {}

  static async connect(options: MongoStoreOptions): Promise<MongoDocumentStore> {
    const logger = new Logger(MongoDocumentStore.name);

    try {
      const connection = await createConnection(options.url, {
        dbName: options.databaseName,
        ignoreUndefined: true,
        bufferCommands: false,
        serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS,
      }).asPromise();

      logger.log(`Connected to MongoDB database "${options.databaseName}"`);
      return new MongoDocumentStore(connection);
    } catch (error) {
      throw new DocumentStoreUnavailableError('Unable to connect to MongoDB', error);
    }
  }

  async insert(collection: CollectionName, doc: DocumentData): Promise<string> {
    const now = new Date();
    const result = await this.run('insert', () =>
      this.connection.collection(collection).insertOne({ ...doc, created_at: now, updated_at: now }),
    );

    return result.insertedId.toString();
  }

  async findOne(collection: CollectionName, id: string): Promise<StoredDocument | undefined> {
    if (!isValidObjectId(id)) {
      return undefined;
    }

    const doc = await this.run('findOne', () =>
      this.connection.collection(collection).findOne({ _id: new Types.ObjectId(id) }),
    );

    return doc ? this.serialize(doc) : undefined;
  }

  async findMany(
    collection: CollectionName,
    filter: DocumentFilter,
    options: FindManyOptions = {},
  ): Promise<StoredDocument[]> {
    const docs = await this.run('findMany', () => {
      let cursor = this.connection.collection(collection).find(filter);
      if (options.sort) {
        cursor = cursor.sort({ [options.sort.field]: options.sort.direction === 'asc' ? 1 : -1 });
      }
      if (options.limit !== undefined) {
        cursor = cursor.limit(options.limit);
      }

      return cursor.toArray();
    });

    return docs.map((doc) => this.serialize(doc));
  }

  async update(collection: CollectionName, id: string, patch: DocumentData): Promise<boolean> {
    if (!isValidObjectId(id)) {
      return false;
    }

    const result = await this.run('update', () =>
      this.connection.collection(collection).updateOne({ _id: new Types.ObjectId(id) }, { $set: patch }),
    );

    return result.matchedCount > 0;
  }

  async describe(): Promise<StoreDiagnostics> {
    const connected = this.connection.readyState === 1;
    const db = this.connection.db;
    if (!connected || !db) {
      return { kind: 'mongodb', connected: false, databaseName: this.connection.name, collections: [] };
    }

    const collections = await this.run('describe', () => db.listCollections({}, { nameOnly: true }).toArray());

    return {
      kind: 'mongodb',
      connected,
      databaseName: db.databaseName,
      collections: collections.map((item) => item.name).slice(0, DIAGNOSTIC_COLLECTION_LIMIT),
    };
  }

  async onModuleDestroy() {
    await this.connection.close();
  }

  private serialize(doc: DocumentData): StoredDocument {
    const { _id, ...rest } = doc;
    const serialized: StoredDocument = { ...rest, id: String(_id) };

    for (const [key, value] of Object.entries(serialized)) {
      if (value instanceof Types.ObjectId) {
        serialized[key] = value.toHexString();
      }
    }

    return serialized;
  }

  private async run<T>(operation: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      const detail = error instanceof Error ? error.message : 'unknown error';
      this.logger.error(`MongoDB ${operation} failed: ${detail}`);

      if (
        error instanceof mongo.MongoNetworkError ||
        error instanceof mongo.MongoServerSelectionError ||
        error instanceof mongo.MongoNotConnectedError
      ) {
        throw new DocumentStoreUnavailableError(`Database unavailable during ${operation}`, error);
      }

      throw new DocumentStoreError(`Database ${operation} failed: ${detail}`, error);
    }
  }
}
