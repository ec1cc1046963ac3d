import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DOCUMENT_STORE, DocumentStore } from './document-store';
import { InMemoryDocumentStore } from './in-memory-document-store';
import { MongoDocumentStore } from './mongo-document-store';

@Global()
@Module({
  providers: [
    {
      provide: DOCUMENT_STORE,
      inject: [ConfigService],
      useFactory: async (config: ConfigService): Promise<DocumentStore> => {
        const url = config.get<string>('DATABASE_URL', '').trim();
        if (!url) {
          new Logger(DatabaseModule.name).warn('DATABASE_URL not set, using the in-memory document store');
          return new InMemoryDocumentStore();
        }

        return MongoDocumentStore.connect({
          url,
          databaseName: config.get<string>('DATABASE_NAME', 'elv_tracking'),
        });
      },
    },
  ],
  exports: [DOCUMENT_STORE],
})
export class DatabaseModule {}
