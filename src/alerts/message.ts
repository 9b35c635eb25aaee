export function formatAlertMessage(formulaText: string, symbols: readonly string[]): string {
  return `${formulaText}\nTriggered: ${symbols.join(', ')}`;
}

/** Cut to a channel's size limit, marking the cut */
export function truncateMessage(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  const marker = '…';
  return text.slice(0, Math.max(0, maxLength - marker.length)) + marker;
}
