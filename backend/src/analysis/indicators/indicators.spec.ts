import { makeBars, rampCloses } from '../../testing/price-bars';
import { calculateATR } from './atr';
import { calculateBollingerBands, calculateSMA, calculateStdDev } from './bollinger';
import { calculateEMAFromValues, calculateEMASeriesFromValues } from './ema';
import { calculateMACD, macdMinimumBars } from './macd';
import { calculateRSIFromValues } from './rsi';
import { calculateStochastic } from './stochastic';

describe('indicators', () => {
  describe('EMA', () => {
    it('seeds with the SMA of the first period values', () => {
      expect(calculateEMAFromValues([1, 2, 3], 3)).toBe(2);
    });

    it('applies k = 2 / (n + 1) after the seed', () => {
      // k = 0.5: 4 * 0.5 + 2 * 0.5
      expect(calculateEMAFromValues([1, 2, 3, 4], 3)).toBe(3);
      expect(calculateEMASeriesFromValues([1, 2, 3, 4], 3)).toEqual([2, 3]);
    });

    it('returns null with fewer values than the period', () => {
      expect(calculateEMAFromValues([1, 2], 3)).toBeNull();
    });
  });

  describe('RSI', () => {
    it('is 100 for 20 closes rising from 1.1000 to 1.1190', () => {
      const closes = rampCloses(20);
      expect(closes[19]).toBe(1.119);
      expect(calculateRSIFromValues(closes, 14)).toBe(100);
    });

    it('is 0 when every change is a loss', () => {
      expect(calculateRSIFromValues(rampCloses(20, 1.2, -0.001), 14)).toBe(0);
    });

    it('is 100 for a flat series (no losses)', () => {
      expect(calculateRSIFromValues(new Array(15).fill(1.1), 14)).toBe(100);
    });

    it('is 50 when average gain equals average loss', () => {
      const closes = [1];
      for (let i = 1; i <= 14; i++) {
        closes.push(i % 2 === 0 ? 1 : 2);
      }
      expect(calculateRSIFromValues(closes, 14)).toBe(50);
    });

    it('needs period + 1 closes', () => {
      expect(calculateRSIFromValues(rampCloses(14), 14)).toBeNull();
      expect(calculateRSIFromValues(rampCloses(15), 14)).not.toBeNull();
    });
  });

  describe('Bollinger Bands', () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];

    it('uses the population standard deviation', () => {
      expect(calculateSMA(values, 8)).toBe(5);
      expect(calculateStdDev(values, 8)).toBe(2);
    });

    it('places the bands two deviations around the SMA', () => {
      expect(calculateBollingerBands(makeBars(values), 8, 2)).toEqual({ upper: 9, middle: 5, lower: 1 });
    });

    it('uses only the trailing window', () => {
      expect(calculateSMA([100, ...values], 8)).toBe(5);
    });

    it('collapses to the mean on a flat series', () => {
      const bands = calculateBollingerBands(makeBars(new Array(20).fill(1.25)));
      expect(bands).toEqual({ upper: 1.25, middle: 1.25, lower: 1.25 });
    });
  });

  describe('MACD', () => {
    it('needs 34 bars for the signal line', () => {
      expect(macdMinimumBars()).toBe(34);
      expect(calculateMACD(makeBars(rampCloses(33)))).toBeNull();
      expect(calculateMACD(makeBars(rampCloses(34)))).not.toBeNull();
    });

    it('is zero on a flat series', () => {
      expect(calculateMACD(makeBars(new Array(40).fill(1.25)))).toEqual({ line: 0, signal: 0, histogram: 0 });
    });

    it('has a positive line on a rising series', () => {
      const macd = calculateMACD(makeBars(rampCloses(40)));
      expect(macd).not.toBeNull();
      expect(macd?.line).toBeGreaterThan(0);
      expect(macd?.histogram).toBeCloseTo((macd?.line ?? 0) - (macd?.signal ?? 0), 12);
    });
  });

  describe('ATR', () => {
    it('equals the constant bar range on a flat series', () => {
      expect(calculateATR(makeBars(new Array(20).fill(1.1), 0.0005), 14)).toBeCloseTo(0.001, 10);
    });

    it('needs period + 1 bars', () => {
      expect(calculateATR(makeBars(rampCloses(14)), 14)).toBeNull();
    });
  });

  describe('Stochastic', () => {
    it('places the close within the 14-bar high/low range', () => {
      // Every window spans 0.014 and closes 0.0135 above its low
      const result = calculateStochastic(makeBars(rampCloses(16), 0.0005), 14, 3);

      expect(result?.k).toBeCloseTo(96.4285714, 6);
      expect(result?.d).toBeCloseTo(96.4285714, 6);
    });

    it('reads 0 when the close is the lowest low', () => {
      expect(calculateStochastic(makeBars(rampCloses(16, 1.2, -0.001), 0), 14, 3)).toEqual({ k: 0, d: 0 });
    });

    it('reads 50 on a range-less window instead of NaN', () => {
      expect(calculateStochastic(makeBars(new Array(16).fill(1.1), 0), 14, 3)).toEqual({ k: 50, d: 50 });
    });

    it('needs period + dPeriod - 1 bars', () => {
      expect(calculateStochastic(makeBars(rampCloses(15)), 14, 3)).toBeNull();
    });
  });
});
