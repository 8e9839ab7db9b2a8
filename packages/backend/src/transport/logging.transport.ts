import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { Transport, TransportResult } from '../ports/transport.port';

/** Dry-run transport: logs what would be sent and reports success. */
@Injectable()
export class LoggingTransport implements Transport {
  private readonly logger = new Logger(LoggingTransport.name);

  async send(address: string, text: string): Promise<TransportResult> {
    this.logger.log(`[DRY RUN] Would send to ${address}: ${text}`);
    return { ok: true, providerId: `dry-run-${uuidv4()}` };
  }
}
