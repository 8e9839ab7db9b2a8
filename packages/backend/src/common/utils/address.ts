/**
 * Normalizes a North American phone number to E.164. Anything that is not a
 * 10-digit or 1-prefixed 11-digit number is returned unchanged.
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  const digits = trimmed.replace(/\D/g, '');
  if (digits.length === 10) {
    return `+1${digits}`;
  }
  if (digits.length === 11 && digits.startsWith('1')) {
    return `+${digits}`;
  }
  return trimmed;
}
