import { Logger } from '@nestjs/common';

export type RollcallErrorCode =
  | 'UNREGISTERED_SENDER'
  | 'NO_RECIPIENTS'
  | 'TRANSPORT_FAILURE'
  | 'LEDGER_UNAVAILABLE'
  | 'ATTACHMENT_PROCESSING_FAILURE';

export abstract class RollcallError extends Error {
  abstract readonly code: RollcallErrorCode;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class UnregisteredSenderError extends RollcallError {
  readonly code = 'UNREGISTERED_SENDER';

  constructor(readonly address: string) {
    super(`Sender ${address} is not on the roster`);
  }
}

export class NoRecipientsError extends RollcallError {
  readonly code = 'NO_RECIPIENTS';

  constructor() {
    super('No active members to send to');
  }
}

export class TransportFailureError extends RollcallError {
  readonly code = 'TRANSPORT_FAILURE';

  constructor(readonly address: string, reason: string) {
    super(`Delivery to ${address} failed: ${reason}`);
  }
}

// Raised for directory outages as well; both are batch-fatal the same way.
export class LedgerUnavailableError extends RollcallError {
  readonly code = 'LEDGER_UNAVAILABLE';

  constructor(operation: string, cause?: unknown) {
    super(`Storage unavailable during ${operation}`, cause);
  }
}

export class AttachmentProcessingError extends RollcallError {
  readonly code = 'ATTACHMENT_PROCESSING_FAILURE';

  constructor(mimeType: string, cause?: unknown) {
    super(`Could not store ${mimeType} attachment`, cause);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a storage call, turning any driver or connection failure into a
 * LedgerUnavailableError. The stack is logged here and not passed on.
 */
export async function guardStore<T>(
  logger: Logger,
  operation: string,
  query: () => Promise<T>,
): Promise<T> {
  try {
    return await query();
  } catch (error) {
    if (error instanceof RollcallError) {
      throw error;
    }
    logger.error(`${operation} failed: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
    throw new LedgerUnavailableError(operation, error);
  }
}
