export function truncate(text: string, maxLength: number, ellipsis = '…'): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, maxLength).join('') + ellipsis;
}

export function plural(count: number, word: string): string {
  return count === 1 ? word : `${word}s`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
