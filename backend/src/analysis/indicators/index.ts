export * from './ema';
export * from './rsi';
export * from './bollinger';
export * from './macd';
export * from './atr';
export * from './stochastic';
