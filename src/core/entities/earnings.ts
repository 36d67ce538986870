export type ExtractedIntent = {
  year: number;
  companyReference: string;
};

export type Transcript = {
  symbol: string;
  /** Call timestamp, `YYYY-MM-DD HH:MM:SS`. */
  date: string;
  year: number;
  quarter?: number;
  content: string;
};

export type PricePoint = {
  date: string;
  close: number;
};

export type PriceWindow = {
  symbol: string;
  from: string;
  to: string;
  marker: string;
  points: PricePoint[];
  status: "ok" | "unavailable";
  reason?: string;
};

export type EarningsCallReport = {
  query: string;
  intent: ExtractedIntent;
  symbol: string;
  requestedYear: number;
  transcript: Transcript;
  analysis: string;
  priceWindow: PriceWindow;
  notices: string[];
};
