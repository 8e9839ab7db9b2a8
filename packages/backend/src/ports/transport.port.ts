export const TRANSPORT = Symbol('TRANSPORT');

export interface TransportResult {
  ok: boolean;
  providerId?: string;
  error?: string;
}

/** Sends one text to one address. Must be safe to call from concurrent workers. */
export interface Transport {
  send(address: string, text: string): Promise<TransportResult>;
}
