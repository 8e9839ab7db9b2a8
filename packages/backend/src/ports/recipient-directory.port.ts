import { MemberIdentity, Recipient } from '@rollcall/common';

export const RECIPIENT_DIRECTORY = Symbol('RECIPIENT_DIRECTORY');

export interface RecipientDirectory {
  activeRecipients(excludeAddress?: string): Promise<Recipient[]>;
  /** `null` when the address is not on the roster (or is deactivated). */
  identity(address: string): Promise<MemberIdentity | null>;
}
