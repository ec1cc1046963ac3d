import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DEFAULT_SYNC_MAX_MUTATIONS } from '../config/env.validation';
import { ElvService } from '../elv/elv.service';
import { EntityValidationError, EntityValidator } from '../elv/entity-validator';
import { isSyncOperation, Mutation, MutationResult, SyncOperation, SyncResponse } from './sync.types';

interface AppliedMutation {
  id: string;
  warning?: string;
}

type OperationHandler = (data: Record<string, unknown>) => Promise<AppliedMutation>;

const FRACTIONAL_SECONDS = /:\d{2}\.(\d+)/;

interface Instant {
  millis: number;
  // Fraction of a millisecond, which Date.parse drops.
  subMillis: number;
}

function toInstant(timestamp: string): Instant {
  const millis = Date.parse(timestamp);
  if (Number.isNaN(millis)) {
    return { millis: Number.POSITIVE_INFINITY, subMillis: 0 };
  }

  const extra = FRACTIONAL_SECONDS.exec(timestamp)?.[1].slice(3) ?? '';
  return { millis, subMillis: extra ? Number(`0.${extra}`) : 0 };
}

/**
 * Orders mutations by client timestamp, keeping input order for equal timestamps.
 * Digits past the millisecond still count. Unparseable timestamps sort last.
 */
export function orderMutations<T extends Pick<Mutation, 'client_timestamp'>>(mutations: readonly T[]): T[] {
  return mutations
    .map((mutation, index) => ({ mutation, index, at: toInstant(mutation.client_timestamp) }))
    .sort((a, b) => {
      if (a.at.millis !== b.at.millis) {
        return a.at.millis < b.at.millis ? -1 : 1;
      }
      if (a.at.subMillis !== b.at.subMillis) {
        return a.at.subMillis < b.at.subMillis ? -1 : 1;
      }

      return a.index - b.index;
    })
    .map(({ mutation }) => mutation);
}

/**
 * Applies offline mutation batches one at a time against the store. There is no rollback:
 * each mutation reports its own outcome and a failure never stops the rest of the batch.
 */
@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  private readonly maxMutations: number;
  private readonly handlers: Record<SyncOperation, OperationHandler>;

  constructor(
    @Inject(EntityValidator) private readonly validator: EntityValidator,
    @Inject(ElvService) private readonly elv: ElvService,
    @Inject(ConfigService) private readonly config: ConfigService,
  ) {
    this.maxMutations = Number(this.config.get('SYNC_MAX_MUTATIONS', DEFAULT_SYNC_MAX_MUTATIONS));
    this.handlers = {
      createVehicle: async (data) => ({ id: await this.elv.persistVehicle(await this.validator.validateVehicle(data)) }),
      logEvent: async (data) => this.logEvent(data),
      registerPart: async (data) => ({ id: await this.elv.persistPart(await this.validator.validatePart(data)) }),
    };
  }

  async reconcile(mutations: readonly Mutation[]): Promise<SyncResponse> {
    if (mutations.length > this.maxMutations) {
      throw new BadRequestException(`Too many mutations (max ${this.maxMutations} per request).`);
    }

    const results: MutationResult[] = [];
    for (const mutation of orderMutations(mutations)) {
      results.push(await this.applyMutation(mutation));
    }

    const response: SyncResponse = { results, server_time: new Date().toISOString() };
    this.logSummary(mutations, results);
    return response;
  }

  private async applyMutation(mutation: Mutation): Promise<MutationResult> {
    const base = {
      op: mutation.op,
      client_id: mutation.client_id,
      client_timestamp: mutation.client_timestamp,
    };

    if (!isSyncOperation(mutation.op)) {
      return { ...base, status: 'ignored', reason: 'unknown op' };
    }

    try {
      const applied = await this.handlers[mutation.op](mutation.data);
      return { ...base, status: 'ok', ...applied };
    } catch (error) {
      if (error instanceof EntityValidationError) {
        this.logger.warn(`${mutation.op} from ${mutation.client_id} rejected: ${error.message}`);
        return { ...base, status: 'error', error: error.message, issues: error.issues };
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${mutation.op} from ${mutation.client_id} failed: ${message}`);
      return { ...base, status: 'error', error: message };
    }
  }

  // Once the event is stored the mutation counts as applied, even if the vehicle update fails.
  private async logEvent(data: Record<string, unknown>): Promise<AppliedMutation> {
    const event = await this.validator.validateEvent(data);
    const id = await this.elv.recordEvent(event);

    try {
      await this.elv.applyDerivedState(event);
      return { id };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Event ${id} recorded but its vehicle update failed: ${message}`);
      return { id, warning: `vehicle update failed: ${message}` };
    }
  }

  private logSummary(mutations: readonly Mutation[], results: MutationResult[]) {
    const counts = { ok: 0, ignored: 0, error: 0 };
    for (const result of results) {
      counts[result.status] += 1;
    }

    const clients = [...new Set(mutations.map((mutation) => mutation.client_id))].join(', ');
    this.logger.log(
      `Reconciled ${results.length} mutations from [${clients}]: ${counts.ok} ok, ${counts.ignored} ignored, ${counts.error} error`,
    );
  }
}
