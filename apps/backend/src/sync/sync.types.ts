import { ValidationIssue } from '../common/validation';

export const SYNC_OPERATIONS = ['createVehicle', 'logEvent', 'registerPart'] as const;
export type SyncOperation = (typeof SYNC_OPERATIONS)[number];

export function isSyncOperation(op: string): op is SyncOperation {
  return SYNC_OPERATIONS.some((known) => known === op);
}

/** A client-recorded write replayed during sync. */
export interface Mutation {
  op: string;
  data: Record<string, unknown>;
  client_id: string;
  client_timestamp: string;
}

interface MutationResultBase {
  op: string;
  client_id: string;
  client_timestamp: string;
}

export type MutationResult =
  // `warning` means the write landed but a follow-up effect did not; resending would duplicate it.
  | (MutationResultBase & { status: 'ok'; id: string; warning?: string })
  | (MutationResultBase & { status: 'ignored'; reason: string })
  | (MutationResultBase & { status: 'error'; error: string; issues?: ValidationIssue[] });

export interface SyncResponse {
  results: MutationResult[];
  server_time: string;
}
