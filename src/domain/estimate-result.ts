export type BreakdownItem = {
  dimension: string;
  quantity: number;
  /** Rate exactly as written in the ratecard. */
  rate: string;
  /** Cost rounded half up to six fractional digits. */
  cost: string;
};

export type EstimateResult = {
  pricingVersion: string;
  provider: string;
  model: string;
  breakdown: BreakdownItem[];
  currency: string;
  totalCost: string;
  warnings: string[];
  computedAt: string;
  engineVersion: string;
};
