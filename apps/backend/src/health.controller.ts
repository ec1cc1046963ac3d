import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DOCUMENT_STORE, DocumentStore } from './database/document-store';

const SERVICE_NAME = 'elv-tracking-backend';

@Controller()
export class HealthController {
  constructor(
    @Inject(DOCUMENT_STORE) private readonly store: DocumentStore,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {}

  @Get()
  root() {
    return { message: 'ELV Tracking Backend is running' };
  }

  @Get('health')
  status() {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      time: new Date().toISOString(),
    };
  }

  @Get('test')
  async diagnostics() {
    const environment = {
      database_url_env: this.config.get<string>('DATABASE_URL') ? 'set' : 'not set',
      database_name_env: this.config.get<string>('DATABASE_NAME') ? 'set' : 'not set',
    };

    try {
      const store = await this.store.describe();
      return {
        backend: 'running',
        database: store.kind,
        connection_status: store.connected ? 'connected' : 'not connected',
        database_name: store.databaseName,
        collections: store.collections,
        ...environment,
      };
    } catch (error) {
      return {
        backend: 'running',
        database: 'error',
        connection_status: 'error',
        detail: error instanceof Error ? error.message.slice(0, 80) : 'unknown error',
        ...environment,
      };
    }
  }
}
