export {
  PriceBar,
  IntradayInterval,
  INTRADAY_INTERVALS,
  SeriesOutputSize,
  SeriesInterval,
  isSeriesInterval,
} from './price-bar.interface';
export { Quote } from './quote.interface';
export { MarketDataProvider, MARKET_DATA_PROVIDER } from './market-data-provider.interface';
