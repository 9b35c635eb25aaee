/**
 * Symbols already announced for their current triggering event, keyed to the
 * candle timestamp that event was seen on. Owned by one ScannerSession; no
 * internal locking, callers run one cycle at a time.
 */
export class AlertState {
  private readonly notified = new Map<string, number>();

  has(symbol: string): boolean {
    return this.notified.has(symbol);
  }

  /** Candle timestamp of the last notified event, if any */
  candleTimeOf(symbol: string): number | undefined {
    return this.notified.get(symbol);
  }

  markNotified(symbol: string, candleTime: number): void {
    this.notified.set(symbol, candleTime);
  }

  clear(symbol: string): boolean {
    return this.notified.delete(symbol);
  }

  reset(): void {
    this.notified.clear();
  }

  get size(): number {
    return this.notified.size;
  }

  symbols(): string[] {
    return Array.from(this.notified.keys()).sort();
  }
}
