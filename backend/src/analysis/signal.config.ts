/**
 * Signal Generator Configuration
 * Fixed constants: identical indicators and quote always give the same signal
 */
export interface SignalConfig {
  /** Factor weights, summing to 1 */
  weights: {
    rsi: number;
    macd: number;
    trend: number;
  };

  /** Net score bounds for a directional signal */
  thresholds: {
    /** Buy when score is above this */
    buy: number;
    /** Sell when score is below this */
    sell: number;
  };

  rsi: {
    oversold: number;
    overbought: number;
  };

  /** Confidence when all three factors agree */
  baseConfidence: number;

  /** Exit levels in multiples of the volatility width */
  exits: {
    stopLossWidth: number;
    takeProfitWidth: number;
  };
}

export const SIGNAL_CONFIG: SignalConfig = {
  weights: {
    rsi: 0.4,
    macd: 0.35,
    trend: 0.25,
  },

  thresholds: {
    buy: 20,
    sell: -20,
  },

  rsi: {
    oversold: 30,
    overbought: 70,
  },

  baseConfidence: 90,

  exits: {
    stopLossWidth: 1.5,
    takeProfitWidth: 2.5,
  },
};
