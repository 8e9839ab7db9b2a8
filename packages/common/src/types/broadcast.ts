export interface Broadcast {
  id: string;
  senderAddress: string;
  senderName: string;
  text: string;
  mediaUrls: string[];
  createdAt: Date;
  reactionSummary: string | null;
  lastReactionUpdate: Date | null;
}

export interface NewBroadcast {
  senderAddress: string;
  senderName: string;
  text: string;
  mediaUrls: string[];
}

export interface Attachment {
  data: Buffer;
  mimeType: string;
}

export enum MessageKind {
  BROADCAST = 'broadcast',
  REACTION_UPDATE = 'reaction-update',
  DIGEST = 'digest',
  REPLY = 'reply',
}

export enum DeliveryStatus {
  PENDING = 'pending',
  DELIVERED = 'delivered',
  FAILED = 'failed',
}

export interface DeliveryAttempt {
  id: string;
  messageId: string;
  messageKind: MessageKind;
  recipientAddress: string;
  status: DeliveryStatus;
  providerId: string | null;
  error: string | null;
  durationMs: number;
  retryCount: number;
  createdAt: Date;
}

export type NewDeliveryAttempt = Omit<DeliveryAttempt, 'id' | 'createdAt'>;

export interface BroadcastOutcome {
  messageId: string;
  kind: MessageKind;
  sentCount: number;
  failedCount: number;
  elapsedMs: number;
  deliveries: NewDeliveryAttempt[];
}
