export type OrderSide = 'buy' | 'sell';

export interface Order {
  symbol: string;
  side: OrderSide;
  quantity: number;
  date: string;
}

export interface Lot {
  symbol: string;
  quantity: number;
  acquisitionDate: string;
  /** Cash paid per share including buy-side costs. */
  costPerShare: number;
}

export type RejectionReason = 'suspended' | 'limit-band' | 'lot-size' | 'settlement';

export type ValidationResult =
  | { accepted: true }
  | { accepted: false; reason: RejectionReason; message: string };

export type ExecutionFailureReason = 'insufficient-funds' | 'insufficient-lots' | 'max-positions';

export interface CostBreakdown {
  commission: number;
  stampDuty: number;
  transferFee: number;
  slippage: number;
  totalCost: number;
}

export interface Trade {
  symbol: string;
  side: OrderSide;
  date: string;
  quantity: number;
  fillPrice: number;
  notional: number;
  costs: CostBreakdown;
  /** Negative for buys, positive for sells. */
  netCashDelta: number;
  /** Sells only: net proceeds minus FIFO cost basis. */
  realizedPnl: number | null;
}

export interface EquityPoint {
  date: string;
  cash: number;
  positionsValue: number;
  totalValue: number;
  dailyReturn: number;
}

export interface PositionView {
  symbol: string;
  quantity: number;
  sellableQuantity: number;
  averageCost: number;
  lastPrice: number;
  marketValue: number;
  unrealizedPnl: number;
}

/** Read-only view handed to the decision policy. */
export interface PortfolioSnapshot {
  date: string;
  cash: number;
  positionsValue: number;
  totalValue: number;
  positions: PositionView[];
}

export type OrderOutcome =
  | { status: 'filled'; order: Order; trade: Trade }
  | { status: 'rejected'; order: Order; reason: RejectionReason; message: string }
  | { status: 'failed'; order: Order; reason: ExecutionFailureReason; message: string };
