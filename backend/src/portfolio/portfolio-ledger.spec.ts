import {
  ConfigurationError,
  InsufficientFundsError,
  InsufficientHoldingsError,
  InvalidQuoteError,
  InvalidTransactionError,
} from '../common/errors/trading.errors';
import { makeQuote } from '../testing/price-bars';
import { PortfolioRecord, TradeSide } from './interfaces';
import { PortfolioLedger } from './portfolio-ledger';

describe('PortfolioLedger', () => {
  it('buys 460 EUR with 500 USD at 0.9200', () => {
    const ledger = PortfolioLedger.open({ initialAmount: 1000, currency: 'USD' });

    const tx = ledger.apply({ pair: 'USD/EUR', side: TradeSide.BUY, amount: 500, price: 0.92 });

    expect(ledger.cashBalance).toBe(500);
    expect(ledger.position('USD/EUR')?.amount).toBeCloseTo(460, 9);
    expect(ledger.position('USD/EUR')?.currency).toBe('EUR');
    expect(tx.currencyGiven).toBe('USD');
    expect(tx.currencyReceived).toBe('EUR');
    expect(tx.realizedPnl).toBeNull();
  });

  it('rejects a non-positive initial amount or bad currency', () => {
    expect(() => PortfolioLedger.open({ initialAmount: 0, currency: 'USD' })).toThrow(ConfigurationError);
    expect(() => PortfolioLedger.open({ initialAmount: 100, currency: 'DOLLAR' })).toThrow(ConfigurationError);
  });

  describe('when the ledger currency is the quote', () => {
    let ledger: PortfolioLedger;

    beforeEach(() => {
      ledger = PortfolioLedger.open({ initialAmount: 2000, currency: 'USD', accountId: 'acc-1' });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 1000, price: 1.25, id: 'tx-1' });
    });

    it('receives amount / price of the base', () => {
      const position = ledger.position('EUR/USD');
      expect(position?.amount).toBe(800);
      expect(position?.costBasis).toBe(1000);
      expect(position?.averageEntryPrice).toBe(1.25);
    });

    it('marks at the bid and leaves realized P&L alone', () => {
      const unrealized = ledger.markToMarket('EUR/USD', makeQuote('EUR/USD', 1.3, 1.3002));

      expect(unrealized).toBeCloseTo(40, 9);
      const snapshot = ledger.snapshot();
      expect(snapshot.realizedPnl).toBe(0);
      expect(snapshot.unrealizedPnl).toBeCloseTo(40, 9);
      expect(snapshot.totalValue).toBeCloseTo(2040, 9);
    });

    it('realizes P&L on a partial sell and reduces cost proportionally', () => {
      ledger.markToMarket('EUR/USD', makeQuote('EUR/USD', 1.3, 1.3002));
      const tx = ledger.apply({ pair: 'EUR/USD', side: TradeSide.SELL, amount: 400, price: 1.3 });

      // 400 * 1.3 = 520 proceeds against 500 cost
      expect(tx.amountReceived).toBeCloseTo(520, 9);
      expect(tx.realizedPnl).toBeCloseTo(20, 9);
      expect(ledger.cashBalance).toBeCloseTo(1520, 9);
      expect(ledger.position('EUR/USD')?.amount).toBe(400);
      expect(ledger.position('EUR/USD')?.costBasis).toBe(500);

      const snapshot = ledger.snapshot();
      expect(snapshot.realizedPnl).toBeCloseTo(20, 9);
      expect(snapshot.unrealizedPnl).toBeCloseTo(20, 9);
      expect(snapshot.totalValue).toBeCloseTo(2040, 9);
      expect(snapshot.realizedPnl + snapshot.unrealizedPnl).toBeCloseTo(snapshot.totalValue - snapshot.initialValue, 9);
    });

    it('closes the position when the whole amount is sold', () => {
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.SELL, amount: 800, price: 1.2 });

      expect(ledger.position('EUR/USD')).toBeNull();
      expect(ledger.cashBalance).toBeCloseTo(1960, 9);
      expect(ledger.snapshot().breakdown).toEqual([
        { pair: 'EUR/USD', realizedPnl: expect.closeTo(-40, 9), unrealizedPnl: 0, marketValue: 0, position: null },
      ]);
    });

    it('weights the average entry price by foreign amount', () => {
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 500, price: 1 });

      const position = ledger.position('EUR/USD');
      expect(position?.amount).toBe(1300);
      expect(position?.costBasis).toBe(1500);
      // (1.25 * 800 + 1 * 500) / 1300
      expect(position?.averageEntryPrice).toBeCloseTo(1500 / 1300, 12);
    });
  });

  it('marks at the ask when the ledger currency is the base', () => {
    const ledger = PortfolioLedger.open({ initialAmount: 1000, currency: 'USD' });
    ledger.apply({ pair: 'USD/JPY', side: TradeSide.BUY, amount: 1000, price: 150 });

    expect(ledger.position('USD/JPY')?.amount).toBe(150000);
    expect(ledger.markToMarket('USD/JPY', makeQuote('USD/JPY', 149.9, 150))).toBe(0);
    expect(ledger.markToMarket('USD/JPY', makeQuote('USD/JPY', 159.9, 160))).toBe(-62.5);

    const tx = ledger.apply({ pair: 'USD/JPY', side: TradeSide.SELL, amount: 150000, price: 160 });
    expect(tx.amountReceived).toBe(937.5);
    expect(tx.realizedPnl).toBe(-62.5);
  });

  describe('validation', () => {
    let ledger: PortfolioLedger;

    beforeEach(() => {
      ledger = PortfolioLedger.open({ initialAmount: 1000, currency: 'USD' });
    });

    it('rejects buys beyond the cash balance without touching state', () => {
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 1500, price: 1.1 })).toThrow(
        InsufficientFundsError,
      );
      expect(ledger.cashBalance).toBe(1000);
      expect(ledger.transactions()).toHaveLength(0);
    });

    it('rejects sells beyond holdings', () => {
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.SELL, amount: 1, price: 1.1 })).toThrow(
        InsufficientHoldingsError,
      );
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 110, price: 1.1 });
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.SELL, amount: 101, price: 1.1 })).toThrow(
        InsufficientHoldingsError,
      );
    });

    it('rejects non-positive amounts and prices', () => {
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 0, price: 1.1 })).toThrow(
        InvalidTransactionError,
      );
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 10, price: -1 })).toThrow(
        InvalidTransactionError,
      );
    });

    it('rejects pairs without the ledger currency', () => {
      expect(() => ledger.apply({ pair: 'EUR/GBP', side: TradeSide.BUY, amount: 10, price: 0.85 })).toThrow(
        InvalidTransactionError,
      );
    });

    it('rejects a duplicate id', () => {
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 10, price: 1.1, id: 'same' });
      expect(() => ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 10, price: 1.1, id: 'same' })).toThrow(
        InvalidTransactionError,
      );
    });

    it('rejects a quote for another pair when marking', () => {
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 10, price: 1.1 });
      expect(() => ledger.markToMarket('EUR/USD', makeQuote('GBP/USD', 1.27, 1.2702))).toThrow(InvalidQuoteError);
    });

    it('returns null when marking a pair with no position', () => {
      expect(ledger.markToMarket('EUR/USD', makeQuote('EUR/USD', 1.1, 1.1002))).toBeNull();
    });
  });

  describe('replay', () => {
    function tradedLedger(): PortfolioLedger {
      const ledger = PortfolioLedger.open({ initialAmount: 10000, currency: 'USD', accountId: 'acc-replay', createdAt: 5 });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 2500, price: 1.0856, timestamp: 10 });
      ledger.apply({ pair: 'USD/JPY', side: TradeSide.BUY, amount: 1200, price: 149.37, timestamp: 20 });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.SELL, amount: 700.5, price: 1.0912, timestamp: 30 });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 333.33, price: 1.0801, timestamp: 40 });
      ledger.apply({ pair: 'USD/JPY', side: TradeSide.SELL, amount: 50000, price: 151.02, timestamp: 50 });
      ledger.markToMarket('EUR/USD', makeQuote('EUR/USD', 1.09, 1.0902));
      return ledger;
    }

    it('reproduces cash and positions from the transaction log', () => {
      const live = tradedLedger();
      const replayed = PortfolioLedger.replay(live.toRecord());

      expect(replayed.cashBalance).toBe(live.cashBalance);
      expect(replayed.openPositions().map(({ pair, amount, costBasis, averageEntryPrice }) => ({
        pair,
        amount,
        costBasis,
        averageEntryPrice,
      }))).toEqual(
        live.openPositions().map(({ pair, amount, costBasis, averageEntryPrice }) => ({
          pair,
          amount,
          costBasis,
          averageEntryPrice,
        })),
      );
      expect(replayed.snapshot(0).realizedPnl).toBe(live.snapshot(0).realizedPnl);
      expect(replayed.transactions()).toEqual(live.transactions());
    });

    it('survives a JSON round trip', () => {
      const live = tradedLedger();
      const record: PortfolioRecord = JSON.parse(JSON.stringify(live.toRecord()));
      const replayed = PortfolioLedger.replay(record);

      expect(replayed.accountId).toBe('acc-replay');
      expect(replayed.createdAt).toBe(5);
      expect(replayed.cashBalance).toBe(live.cashBalance);
    });
  });

  describe('snapshot', () => {
    it('is frozen and unaffected by later transactions', () => {
      const ledger = PortfolioLedger.open({ initialAmount: 1000, currency: 'USD' });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 100, price: 1.1 });
      const snapshot = ledger.snapshot();

      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 100, price: 1.1 });

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.positions[0])).toBe(true);
      expect(snapshot.cashBalance).toBe(900);
      expect(snapshot.transactionCount).toBe(1);
      expect(ledger.snapshot().transactionCount).toBe(2);
    });

    it('values unmarked positions at cost', () => {
      const ledger = PortfolioLedger.open({ initialAmount: 1000, currency: 'USD' });
      ledger.apply({ pair: 'EUR/USD', side: TradeSide.BUY, amount: 250, price: 1.1 });

      const snapshot = ledger.snapshot();
      expect(snapshot.totalValue).toBe(1000);
      expect(snapshot.unrealizedPnl).toBe(0);
      expect(snapshot.positions[0].markPrice).toBeNull();
    });
  });
});
