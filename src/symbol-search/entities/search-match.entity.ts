// Best candidate for a free-text name search. Only the top-ranked
// candidate is kept; discarded once the ticker is resolved.
export interface SearchMatch {
  symbol: string;      // AAPL, BTC-USD, 7203.T
  name: string;        // short name, else long name, else symbol
  assetType?: string;  // EQUITY, ETF, CRYPTOCURRENCY, ...
  exchange?: string;   // NMS, NYQ, CCC, ...
  score?: number;      // provider relevance score
}
