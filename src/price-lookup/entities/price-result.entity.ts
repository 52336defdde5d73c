// Outcome of one lookup, serialized as-is for --json.
// price is non-null exactly when success is true.
export interface PriceResult {
  readonly ticker: string;
  readonly name: string;
  readonly price: number | null;
  readonly success: boolean;
}

export function createPriceResult(ticker: string, name: string, price: number | undefined): PriceResult {
  return Object.freeze({
    ticker,
    name,
    price: price ?? null,
    success: price !== undefined,
  });
}
