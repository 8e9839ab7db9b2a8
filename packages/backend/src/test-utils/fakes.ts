import { ConfigService } from '@nestjs/config';
import { Member, MemberIdentity, Recipient } from '@rollcall/common';
import { RecipientDirectory } from '../ports/recipient-directory.port';
import { Transport, TransportResult } from '../ports/transport.port';
import { BlobStore } from '../ports/blob-store.port';
import { AttachmentProcessingError } from '../common/errors/rollcall.errors';
import { normalizeAddress } from '../common/utils/address';

export function testConfig(values: Record<string, string | number> = {}): ConfigService {
  return new ConfigService(values);
}

/** Directory stand-in with the extra roster calls InboundService makes. */
export class FakeDirectory implements RecipientDirectory {
  readonly members: Member[] = [];

  add(address: string, name: string, isAdmin = false): Member {
    const member: Member = {
      id: `m${this.members.length + 1}`,
      address: normalizeAddress(address),
      name,
      isAdmin,
      active: true,
      createdAt: new Date(0),
    };
    this.members.push(member);
    return member;
  }

  async activeRecipients(excludeAddress?: string): Promise<Recipient[]> {
    const excluded = excludeAddress === undefined ? undefined : normalizeAddress(excludeAddress);
    return this.members
      .filter(m => m.active && m.address !== excluded)
      .map(m => ({ address: m.address, name: m.name, isAdmin: m.isAdmin }));
  }

  async identity(address: string): Promise<MemberIdentity | null> {
    const member = this.members.find(m => m.active && m.address === normalizeAddress(address));
    return member ? { name: member.name, isAdmin: member.isAdmin } : null;
  }

  async countActive(): Promise<number> {
    return this.members.filter(m => m.active).length;
  }

  async addMember(dto: { address: string; name: string; isAdmin?: boolean }): Promise<Member> {
    const address = normalizeAddress(dto.address);
    const existing = this.members.find(m => m.address === address);
    if (existing) {
      existing.name = dto.name;
      existing.active = true;
      return existing;
    }
    return this.add(address, dto.name, dto.isAdmin ?? false);
  }
}

export interface SentMessage {
  address: string;
  text: string;
}

/**
 * Records every send. Addresses in `failing` always get `ok: false`;
 * addresses in `hanging` never answer.
 */
export class FakeTransport implements Transport {
  readonly sent: SentMessage[] = [];
  readonly calls: string[] = [];
  readonly failing = new Set<string>();
  readonly hanging = new Set<string>();
  inFlight = 0;
  maxInFlight = 0;
  private sequence = 0;

  constructor(private readonly latencyMs = 0) {}

  async send(address: string, text: string): Promise<TransportResult> {
    this.calls.push(address);
    if (this.hanging.has(address)) {
      return new Promise<TransportResult>(() => undefined);
    }

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.latencyMs));
      }
      if (this.failing.has(address)) {
        return { ok: false, error: 'carrier rejected' };
      }
      this.sent.push({ address, text });
      this.sequence++;
      return { ok: true, providerId: `sms-${this.sequence}` };
    } finally {
      this.inFlight--;
    }
  }

  textsTo(address: string): string[] {
    return this.sent.filter(m => m.address === address).map(m => m.text);
  }
}

export class FakeBlobStore implements BlobStore {
  readonly stored: string[] = [];

  async store(bytes: Buffer, mimeType: string): Promise<string> {
    if (!mimeType.startsWith('image/')) {
      throw new AttachmentProcessingError(mimeType, new Error('unsupported media type'));
    }
    const url = `https://media.test/${this.stored.length + 1}`;
    this.stored.push(url);
    return url;
  }
}
