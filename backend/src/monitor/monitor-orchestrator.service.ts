/**
 * Monitor Orchestrator Service
 *
 * Runs the monitoring loop as one long-lived task:
 * poll every tracked pair → indicators → signals and execution decisions →
 * single-writer ledger phase → alerts → sleep.
 *
 * Key features:
 * - Per-pair failure isolation (one pair's fetch error never aborts the tick)
 * - Degraded alert after 3 consecutive failures of the same pair
 * - Exponential sleep backoff while the provider reports rate limiting
 * - One AbortSignal cancels in-flight fetches and the inter-tick sleep
 * - Readers get frozen portfolio snapshots, never the live ledger
 * - One run at a time: overlapping start() calls share the first one's startup
 */

import { Inject, Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SchedulerRegistry } from '@nestjs/schedule';

import { CustomLoggerService } from '../common/logging/custom-logger.service';
import { LogLevelName } from '../common/logging/logger.config';
import { MonitorEventType } from '../entities/monitor-log.entity';
import { SystemEventType } from '../entities/system-log.entity';
import {
  loadMonitoringConfig,
  mergeMonitoringConfig,
  MonitoringConfig,
  validateMonitoringConfig,
} from '../common/config/monitoring.config';
import {
  ConfigurationError,
  DataProviderError,
  DataProviderErrorKind,
  errorMessage,
  errorStack,
  isAbortError,
  MonitorStateError,
  TradingError,
} from '../common/errors/trading.errors';
import { abortError } from '../common/utils/abortable-delay';
import { DeepReadonly } from '../common/utils/deep-freeze';

// Market data
import { CurrencyPair, parsePair } from '../market-data/currency-pair';
import { MARKET_DATA_PROVIDER, MarketDataProvider, PriceBar } from '../market-data/interfaces';
import { PriceSeriesStore, QuoteUpdate } from '../market-data/price-series-store';

// Analysis
import { computeIndicators, IndicatorSet, INDICATOR_MIN_BARS } from '../analysis/indicator-engine';
import { generateSignal, SignalDirection, TradingSignal } from '../analysis/signal-generator';

// Portfolio
import { PortfolioSnapshot, PositionLevels, TradeSide, Transaction } from '../portfolio/interfaces';
import { foreignCurrency, PortfolioLedger } from '../portfolio/portfolio-ledger';
import { PortfolioPersistenceService } from '../portfolio/portfolio-persistence.service';

// Monitor
import {
  createInitialMonitorContext,
  isRunningState,
  isStoppable,
  MonitorEvent,
  MonitorState,
  MonitorStateContext,
} from './state-machine/monitor-state';
import { processMonitorTransition } from './state-machine/monitor-transitions';
import { decideExecution, ExecutionDecision, positionSize, ProtectiveLevels } from './execution-policy';
import { rateChangeAlert, signalAlert } from './alert-rules';
import { AlertService, NewAlert } from './alert.service';
import { Alert, AlertKind, AlertSeverity, PairFailure, TickReport } from './interfaces';
import { MONITOR_EVENTS, MonitorStateChange } from './monitor.events';

/** Consecutive fetch failures that mark a pair degraded */
export const DEGRADED_AFTER_FAILURES = 3;

/** SchedulerRegistry name of the inter-tick sleep */
export const MONITOR_SLEEP_TIMEOUT = 'monitor-sleep';

const CONTEXT = 'MonitorOrchestrator';

const ALERT_LOG_LEVELS: Record<AlertSeverity, LogLevelName> = {
  [AlertSeverity.INFO]: 'info',
  [AlertSeverity.WARNING]: 'warn',
  [AlertSeverity.CRITICAL]: 'error',
};

const ALERT_EVENT_TYPES: Record<AlertKind, MonitorEventType> = {
  [AlertKind.RATE_CHANGE]: MonitorEventType.RATE_CHANGE,
  [AlertKind.SIGNAL_TRIGGERED]: MonitorEventType.SIGNAL_GENERATED,
  [AlertKind.STOP_LOSS_HIT]: MonitorEventType.STOP_LOSS_HIT,
  [AlertKind.TAKE_PROFIT_HIT]: MonitorEventType.TAKE_PROFIT_HIT,
  [AlertKind.DATA_FETCH_FAILED]: MonitorEventType.DATA_FETCH_FAILED,
  [AlertKind.PAIR_DEGRADED]: MonitorEventType.PAIR_DEGRADED,
  [AlertKind.ANALYSIS_FAILED]: MonitorEventType.ANALYSIS_FAILED,
  [AlertKind.TRADE_EXECUTED]: MonitorEventType.TRADE_EXECUTED,
  [AlertKind.TRADE_REJECTED]: MonitorEventType.TRADE_REJECTED,
};

/**
 * Per-pair loop state
 */
interface PairTracker {
  pair: CurrencyPair;
  /** Ledger currency is one side of the pair */
  tradable: boolean;
  consecutiveFailures: number;
  lastSeriesFetchAt: number | null;
  lastSignal: TradingSignal | null;
  /** Protective levels of the open position */
  levels: ProtectiveLevels | null;
}

/**
 * Everything owned by one start() … stop() run
 */
interface MonitorRun {
  config: MonitoringConfig;
  ledger: PortfolioLedger;
  store: PriceSeriesStore;
  abort: AbortController;
  trackers: Map<string, PairTracker>;
  /** Sleep doubles per level; reset by a tick without rate limiting */
  backoffLevel: number;
  startedAt: number;
}

interface PolledPair {
  tracker: PairTracker;
  update: QuoteUpdate;
}

interface AnalyzedPair extends PolledPair {
  indicators: IndicatorSet | null;
}

interface OpenedLedger {
  ledger: PortfolioLedger;
  /** Stored levels of the positions a resumed account still holds */
  levels: Record<string, PositionLevels>;
}

interface TickWaiter {
  resolve: (report: TickReport) => void;
  reject: (error: Error) => void;
}

export interface PairStatus {
  pair: string;
  tradable: boolean;
  consecutiveFailures: number;
  degraded: boolean;
  lastSignal: SignalDirection | null;
  hasOpenPosition: boolean;
}

export interface MonitorStatus {
  running: boolean;
  state: MonitorState;
  tick: number;
  stateEnteredAt: number;
  startedAt: number | null;
  accountId: string | null;
  config: MonitoringConfig | null;
  backoffLevel: number;
  pairs: PairStatus[];
  lastTick: { tick: number; finishedAt: number; durationMs: number; nextSleepMs: number } | null;
}

/**
 * Sleep before the next tick: interval · 2^backoffLevel, capped at the max backoff
 */
export function computeSleepMs(
  config: Pick<MonitoringConfig, 'intervalSeconds' | 'maxBackoffSeconds'>,
  backoffLevel: number,
): number {
  const base = config.intervalSeconds * 1000;
  if (backoffLevel <= 0) {
    return base;
  }
  return Math.min(base * 2 ** backoffLevel, Math.max(base, config.maxBackoffSeconds * 1000));
}

@Injectable()
export class MonitorOrchestratorService implements OnModuleDestroy {
  private context: MonitorStateContext = createInitialMonitorContext();
  private run: MonitorRun | null = null;
  private loopPromise: Promise<void> | null = null;
  private starting: Promise<MonitorStatus> | null = null;

  // Immutable handoff to the interactive path
  private latestSnapshot: DeepReadonly<PortfolioSnapshot> | null = null;
  private latestTransactions: readonly Transaction[] = [];
  private lastReport: TickReport | null = null;

  private wakeSleep: (() => void) | null = null;
  private tickWaiters: TickWaiter[] = [];

  constructor(
    @Inject(MARKET_DATA_PROVIDER)
    private readonly marketData: MarketDataProvider,
    private readonly configService: ConfigService,
    private readonly logger: CustomLoggerService,
    private readonly alertService: AlertService,
    private readonly eventEmitter: EventEmitter2,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly persistence: PortfolioPersistenceService,
  ) {}

  /**
   * Start the monitoring loop
   * Configuration is validated before the first tick; the first tick starts immediately.
   * A call made while another start is still opening the ledger gets that start's result.
   * @throws ConfigurationError when the configuration or the resumed account is invalid
   */
  async start(overrides: Partial<MonitoringConfig> = {}): Promise<MonitorStatus> {
    if (isRunningState(this.context.state)) {
      this.logger.warn('Monitor already running', CONTEXT);
      return this.getStatus();
    }
    if (this.starting) {
      this.logger.warn('Monitor already starting', CONTEXT);
      return this.starting;
    }

    const starting = this.launch(overrides);
    this.starting = starting;
    try {
      return await starting;
    } finally {
      this.starting = null;
    }
  }

  private async launch(overrides: Partial<MonitoringConfig>): Promise<MonitorStatus> {
    let config: MonitoringConfig;
    let opened: OpenedLedger;
    try {
      config = validateMonitoringConfig(mergeMonitoringConfig(loadMonitoringConfig(this.configService), overrides));
      opened = await this.openLedger(config);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        await this.logger.logSystem({
          level: 'error',
          eventType: SystemEventType.CONFIGURATION_ERROR,
          message: error.message,
          component: CONTEXT,
          metadata: { issues: error.issues },
        });
      }
      throw error;
    }

    const { ledger } = opened;
    const trackers = new Map<string, PairTracker>();
    for (const symbol of config.pairs) {
      const pair = parsePair(symbol);
      if (!pair) {
        continue;
      }
      const stored = ledger.position(pair.symbol) ? opened.levels[pair.symbol] : undefined;
      trackers.set(pair.symbol, {
        pair,
        tradable: foreignCurrency(pair, ledger.currency) !== null,
        consecutiveFailures: 0,
        lastSeriesFetchAt: null,
        lastSignal: null,
        levels: stored ? { long: pair.quote === ledger.currency, ...stored } : null,
      });
    }

    await this.persistence.saveAccount(ledger, config.pairs);

    const run: MonitorRun = {
      config,
      ledger,
      store: new PriceSeriesStore(),
      abort: new AbortController(),
      trackers,
      backoffLevel: 0,
      startedAt: Date.now(),
    };
    this.run = run;
    this.lastReport = null;
    this.publishSnapshot(ledger);

    this.transition(MonitorEvent.START);
    this.loopPromise = this.runLoop(run);

    this.logger.log(
      `🚀 Monitoring ${config.pairs.length} pairs every ${config.intervalSeconds}s (${ledger.initialValue} ${ledger.currency}, auto-trade ${config.autoTrade ? 'on' : 'off'})`,
      CONTEXT,
    );
    await this.logger.logSystem({
      level: 'info',
      eventType: SystemEventType.MONITOR_START,
      message: `Monitoring started for account ${ledger.accountId}`,
      component: CONTEXT,
      metadata: {
        pairs: config.pairs,
        intervalSeconds: config.intervalSeconds,
        currency: ledger.currency,
        initialAmount: ledger.initialValue,
        resumed: config.resumeAccountId !== undefined,
      },
    });

    return this.getStatus();
  }

  /**
   * Stop the loop at its next suspension point (a fetch or the sleep)
   * A ledger write phase in progress completes first.
   */
  async stop(): Promise<MonitorStatus> {
    const run = this.run;
    const loop = this.loopPromise;
    if (!run || !loop || !isRunningState(this.context.state)) {
      this.logger.warn('Monitor is not running', CONTEXT);
      return this.getStatus();
    }

    this.logger.log('⏹️  Stopping monitor...', CONTEXT);
    if (!isStoppable(this.context)) {
      this.logger.log('Ledger write in progress; stopping once it completes', CONTEXT);
    }
    run.abort.abort();
    await loop;

    await this.logger.logSystem({
      level: 'info',
      eventType: SystemEventType.MONITOR_STOP,
      message: `Monitoring stopped after ${this.context.tick} ticks`,
      component: CONTEXT,
      metadata: { accountId: run.ledger.accountId, ticks: this.context.tick },
    });

    return this.getStatus();
  }

  /**
   * Cut the current sleep short and run the next tick now
   * @throws MonitorStateError unless the loop is sleeping
   */
  triggerTick(): Promise<TickReport> {
    const wake = this.wakeSleep;
    if (this.context.state !== MonitorState.SLEEPING || !wake) {
      return Promise.reject(
        new MonitorStateError(`A manual tick needs a sleeping monitor (state is ${this.context.state})`),
      );
    }

    const next = new Promise<TickReport>((resolve, reject) => {
      this.tickWaiters.push({ resolve, reject });
    });
    wake();
    return next;
  }

  /**
   * Cleanup on module destroy
   */
  async onModuleDestroy(): Promise<void> {
    if (isRunningState(this.context.state)) {
      await this.stop();
    }
  }

  getStatus(): MonitorStatus {
    const run = this.run;
    const report = this.lastReport;
    const openPairs = new Set((this.latestSnapshot?.positions ?? []).map((p) => p.pair));

    return {
      running: isRunningState(this.context.state),
      state: this.context.state,
      tick: this.context.tick,
      stateEnteredAt: this.context.enteredAt,
      startedAt: run ? run.startedAt : null,
      accountId: run ? run.ledger.accountId : null,
      config: run ? { ...run.config, pairs: [...run.config.pairs] } : null,
      backoffLevel: run ? run.backoffLevel : 0,
      pairs: run
        ? [...run.trackers.values()].map((tracker) => ({
            pair: tracker.pair.symbol,
            tradable: tracker.tradable,
            consecutiveFailures: tracker.consecutiveFailures,
            degraded: tracker.consecutiveFailures >= DEGRADED_AFTER_FAILURES,
            lastSignal: tracker.lastSignal ? tracker.lastSignal.direction : null,
            hasOpenPosition: openPairs.has(tracker.pair.symbol),
          }))
        : [],
      lastTick: report
        ? {
            tick: report.tick,
            finishedAt: report.finishedAt,
            durationMs: report.durationMs,
            nextSleepMs: report.nextSleepMs,
          }
        : null,
    };
  }

  /**
   * Latest portfolio snapshot, taken after the last ledger write
   * @returns null before the first start
   */
  getSnapshot(): DeepReadonly<PortfolioSnapshot> | null {
    return this.latestSnapshot;
  }

  getTransactions(): readonly Transaction[] {
    return this.latestTransactions;
  }

  /**
   * Most recent signal per pair
   */
  getLatestSignals(): TradingSignal[] {
    if (!this.run) {
      return [];
    }
    const signals: TradingSignal[] = [];
    for (const tracker of this.run.trackers.values()) {
      if (tracker.lastSignal) {
        signals.push(tracker.lastSignal);
      }
    }
    return signals;
  }

  getLastReport(): TickReport | null {
    return this.lastReport;
  }

  /**
   * New ledger, or a stored account rebuilt from its transaction log
   */
  private async openLedger(config: MonitoringConfig): Promise<OpenedLedger> {
    if (config.resumeAccountId === undefined) {
      return {
        ledger: PortfolioLedger.open({ initialAmount: config.initialAmount, currency: config.initialCurrency }),
        levels: {},
      };
    }

    const record = await this.persistence.loadRecord(config.resumeAccountId);
    if (!record) {
      throw new ConfigurationError([`unknown account ${config.resumeAccountId}`]);
    }

    const ledger = PortfolioLedger.replay(record);
    this.logger.log(
      `Resumed account ${ledger.accountId}: ${record.transactions.length} transactions replayed`,
      CONTEXT,
    );
    return { ledger, levels: record.levels };
  }

  // ============================================
  // Loop
  // ============================================

  private async runLoop(run: MonitorRun): Promise<void> {
    try {
      while (!run.abort.signal.aborted) {
        const report = await this.runTick(run);
        if (!report) {
          break;
        }

        this.lastReport = report;
        this.eventEmitter.emit(MONITOR_EVENTS.TICK_COMPLETED, report);
        this.settleTickWaiters(report);

        try {
          await this.sleep(report.nextSleepMs, run.abort.signal);
        } catch (error) {
          if (isAbortError(error)) {
            break;
          }
          throw error;
        }

        this.transition(MonitorEvent.WAKE);
      }
    } catch (error) {
      this.logger.error(`Monitoring loop failed: ${errorMessage(error)}`, errorStack(error), CONTEXT);
      await this.logger.logSystem({
        level: 'error',
        eventType: SystemEventType.MONITOR_STOP,
        message: `Monitoring loop failed: ${errorMessage(error)}`,
        component: CONTEXT,
        metadata: { tick: this.context.tick },
      });
    } finally {
      this.enterIdle();
      this.settleTickWaiters(null);
      this.publishSnapshot(run.ledger);
    }
  }

  /**
   * One pass through every phase
   * @returns null when the run was stopped while polling
   */
  private async runTick(run: MonitorRun): Promise<TickReport | null> {
    const tick = this.context.tick;
    const startedAt = Date.now();
    const alerts: NewAlert[] = [];
    const failures: PairFailure[] = [];
    const phases = { polling: 0, analyzing: 0, deciding: 0, executing: 0, alerting: 0 };

    // POLLING
    let phaseStart = Date.now();
    const polled = await this.pollPairs(run, alerts, failures);
    phases.polling = Date.now() - phaseStart;

    if (run.abort.signal.aborted) {
      this.logger.debug(`Tick ${tick} cancelled while polling`, CONTEXT);
      return null;
    }
    this.transition(MonitorEvent.DATA_FETCHED);

    // ANALYZING
    phaseStart = Date.now();
    const analyzed = polled.map((entry) => ({
      ...entry,
      indicators: this.analyzePair(entry.tracker, run.store, alerts, failures),
    }));
    phases.analyzing = Date.now() - phaseStart;
    this.transition(MonitorEvent.ANALYSIS_DONE);

    // DECIDING
    phaseStart = Date.now();
    const signals: TradingSignal[] = [];
    const decisions: ExecutionDecision[] = [];
    for (const entry of analyzed) {
      const signal = this.decidePair(run, entry, alerts, failures);
      if (signal) {
        signals.push(signal);
      }
      decisions.push(
        decideExecution({
          pair: entry.tracker.pair,
          signal,
          quote: entry.update.current,
          currency: run.ledger.currency,
          position: run.ledger.position(entry.tracker.pair.symbol),
          levels: entry.tracker.levels,
          now: Date.now(),
          config: run.config,
        }),
      );
    }
    phases.deciding = Date.now() - phaseStart;

    const actionable = decisions.filter((d) => d.action !== 'none');
    const toMark = analyzed.filter((entry) => run.ledger.position(entry.tracker.pair.symbol) !== null);

    // EXECUTING (single writer)
    const transactions: Transaction[] = [];
    if (actionable.length > 0 || toMark.length > 0) {
      this.transition(MonitorEvent.EXECUTE);
      phaseStart = Date.now();
      this.markPositions(run, toMark);
      for (const decision of actionable) {
        const tx = await this.execute(run, decision, alerts);
        if (tx) {
          transactions.push(tx);
        }
      }
      this.publishSnapshot(run.ledger);
      phases.executing = Date.now() - phaseStart;
      this.transition(MonitorEvent.EXECUTION_DONE);
    } else {
      this.transition(MonitorEvent.SKIP_EXECUTION);
    }

    // ALERTING
    phaseStart = Date.now();
    const published = await this.publishAlerts(alerts);
    phases.alerting = Date.now() - phaseStart;

    const rateLimited = failures.some((f) => f.kind === DataProviderErrorKind.RATE_LIMITED);
    run.backoffLevel = rateLimited ? run.backoffLevel + 1 : 0;
    const nextSleepMs = computeSleepMs(run.config, run.backoffLevel);
    if (rateLimited) {
      await this.logger.logSystem({
        level: 'warn',
        eventType: SystemEventType.RATE_LIMIT_BACKOFF,
        message: `Provider rate limit reached, next tick in ${Math.round(nextSleepMs / 1000)}s`,
        component: CONTEXT,
        metadata: { backoffLevel: run.backoffLevel },
      });
    }

    this.transition(MonitorEvent.ALERTS_EMITTED);

    const finishedAt = Date.now();
    const report: TickReport = {
      tick,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      phases,
      signals,
      alerts: published,
      transactions,
      failures,
      portfolio: run.ledger.snapshot(finishedAt),
      nextSleepMs,
    };

    await this.logger.logMonitor({
      level: 'debug',
      eventType: MonitorEventType.TICK_COMPLETED,
      message: `Tick ${tick}: ${signals.length} signals, ${transactions.length} trades, ${failures.length} failures in ${report.durationMs}ms`,
      accountId: run.ledger.accountId,
      context: CONTEXT,
    });

    return report;
  }

  // ============================================
  // Polling
  // ============================================

  private async pollPairs(run: MonitorRun, alerts: NewAlert[], failures: PairFailure[]): Promise<PolledPair[]> {
    const trackers = [...run.trackers.values()];
    const results = await Promise.allSettled(trackers.map((tracker) => this.pollPair(run, tracker)));

    const polled: PolledPair[] = [];
    results.forEach((result, i) => {
      const tracker = trackers[i];
      if (result.status === 'fulfilled') {
        tracker.consecutiveFailures = 0;
        polled.push({ tracker, update: result.value });
        return;
      }

      const error: unknown = result.reason;
      if (isAbortError(error)) {
        return;
      }
      failures.push(this.recordFetchFailure(tracker, error, alerts));
    });

    return polled;
  }

  /**
   * Quote every tick; the bar series when the store is short or the refresh period elapsed
   */
  private async pollPair(run: MonitorRun, tracker: PairTracker): Promise<QuoteUpdate> {
    const symbol = tracker.pair.symbol;
    const { signal } = run.abort;

    const quote = await this.marketData.getQuote(symbol, signal);

    const now = Date.now();
    const refreshDue =
      tracker.lastSeriesFetchAt === null || now - tracker.lastSeriesFetchAt >= run.config.seriesRefreshSeconds * 1000;
    if (refreshDue || run.store.barCount(symbol) < INDICATOR_MIN_BARS) {
      const bars = await this.fetchSeries(run.config, symbol, signal);
      const { appended } = run.store.appendBars(symbol, bars);
      tracker.lastSeriesFetchAt = now;
      this.logger.debug(`${symbol}: ${appended} new bars (${run.store.barCount(symbol)} stored)`, CONTEXT);
    }

    return run.store.setQuote(quote);
  }

  private fetchSeries(config: MonitoringConfig, symbol: string, signal: AbortSignal): Promise<PriceBar[]> {
    return config.seriesSource === 'intraday'
      ? this.marketData.getIntradaySeries(symbol, config.intradayInterval, signal)
      : this.marketData.getDailySeries(symbol, 'compact', signal);
  }

  private recordFetchFailure(tracker: PairTracker, error: unknown, alerts: NewAlert[]): PairFailure {
    const symbol = tracker.pair.symbol;
    tracker.consecutiveFailures++;

    const failure: PairFailure = {
      pair: symbol,
      code: error instanceof TradingError ? error.code : 'UNKNOWN',
      kind: error instanceof DataProviderError ? error.kind : undefined,
      message: errorMessage(error),
      consecutiveFailures: tracker.consecutiveFailures,
    };

    alerts.push({
      kind: AlertKind.DATA_FETCH_FAILED,
      pair: symbol,
      severity: AlertSeverity.WARNING,
      message: `Failed to fetch ${symbol}: ${failure.message}`,
      data: { kind: failure.kind, consecutiveFailures: failure.consecutiveFailures },
    });

    if (tracker.consecutiveFailures === DEGRADED_AFTER_FAILURES) {
      alerts.push({
        kind: AlertKind.PAIR_DEGRADED,
        pair: symbol,
        severity: AlertSeverity.CRITICAL,
        message: `${symbol} degraded: ${DEGRADED_AFTER_FAILURES} consecutive fetch failures`,
        data: { lastError: failure.message },
      });
    }

    return failure;
  }

  // ============================================
  // Analysis & decisions
  // ============================================

  private analyzePair(
    tracker: PairTracker,
    store: PriceSeriesStore,
    alerts: NewAlert[],
    failures: PairFailure[],
  ): IndicatorSet | null {
    const symbol = tracker.pair.symbol;
    try {
      return computeIndicators(symbol, store.getBars(symbol));
    } catch (error) {
      this.recordAnalysisFailure(tracker, error, alerts, failures);
      return null;
    }
  }

  /**
   * Rate-change and signal alerts for one pair
   * @returns The pair's fresh signal, or null when it has no indicators
   */
  private decidePair(
    run: MonitorRun,
    entry: AnalyzedPair,
    alerts: NewAlert[],
    failures: PairFailure[],
  ): TradingSignal | null {
    const { tracker, update, indicators } = entry;

    const rateAlert = rateChangeAlert(update.previous, update.current, run.config.significantChangePercent);
    if (rateAlert) {
      alerts.push(rateAlert);
    }

    if (!indicators) {
      return null;
    }

    let signal: TradingSignal;
    try {
      signal = generateSignal(indicators, update.current);
    } catch (error) {
      this.recordAnalysisFailure(tracker, error, alerts, failures);
      return null;
    }

    const alert = signalAlert(tracker.lastSignal, signal);
    if (alert) {
      alerts.push(alert);
    }
    tracker.lastSignal = signal;
    return signal;
  }

  private recordAnalysisFailure(
    tracker: PairTracker,
    error: unknown,
    alerts: NewAlert[],
    failures: PairFailure[],
  ): void {
    const symbol = tracker.pair.symbol;
    const message = errorMessage(error);

    failures.push({
      pair: symbol,
      code: error instanceof TradingError ? error.code : 'UNKNOWN',
      message,
      consecutiveFailures: tracker.consecutiveFailures,
    });
    alerts.push({
      kind: AlertKind.ANALYSIS_FAILED,
      pair: symbol,
      severity: AlertSeverity.WARNING,
      message: `Analysis of ${symbol} failed: ${message}`,
    });
  }

  // ============================================
  // Execution
  // ============================================

  private markPositions(run: MonitorRun, entries: AnalyzedPair[]): void {
    for (const { tracker, update } of entries) {
      try {
        run.ledger.markToMarket(tracker.pair.symbol, update.current);
      } catch (error) {
        this.logger.warn(`Could not mark ${tracker.pair.symbol}: ${errorMessage(error)}`, CONTEXT);
      }
    }
  }

  /**
   * Apply one decision to the ledger
   * Ledger validation errors reject this trade only.
   */
  private async execute(run: MonitorRun, decision: ExecutionDecision, alerts: NewAlert[]): Promise<Transaction | null> {
    if (decision.action === 'none') {
      return null;
    }

    const tracker = run.trackers.get(decision.pair);
    if (!tracker) {
      return null;
    }

    const { ledger } = run;
    let tx: Transaction;
    let opening: PositionLevels | null = null;
    try {
      if (decision.action === 'open') {
        const amount = positionSize(ledger.cashBalance, ledger.totalValue(), run.config.maxRiskPerTradePercent);
        if (amount === 0) {
          this.logger.debug(`${decision.pair}: no cash left for a new position`, CONTEXT);
          return null;
        }
        tx = ledger.apply({ pair: decision.pair, side: TradeSide.BUY, amount, price: decision.price, reason: 'signal' });
        tracker.levels = decision.levels;
        opening = { stopLoss: decision.levels.stopLoss, takeProfit: decision.levels.takeProfit };
      } else {
        tx = ledger.apply({
          pair: decision.pair,
          side: TradeSide.SELL,
          amount: decision.amount,
          price: decision.price,
          reason: decision.reason,
        });
        tracker.levels = null;
        this.pushExitAlert(decision.reason, tx, alerts);
      }
    } catch (error) {
      if (!(error instanceof TradingError)) {
        throw error;
      }
      alerts.push({
        kind: AlertKind.TRADE_REJECTED,
        pair: decision.pair,
        severity: AlertSeverity.WARNING,
        message: `Trade on ${decision.pair} rejected: ${error.message}`,
        data: { code: error.code, action: decision.action },
      });
      return null;
    }

    alerts.push({
      kind: AlertKind.TRADE_EXECUTED,
      pair: tx.pair,
      severity: AlertSeverity.INFO,
      message: `${tx.side} ${tx.pair}: ${tx.amount.toFixed(2)} ${tx.currencyGiven} → ${tx.amountReceived.toFixed(2)} ${tx.currencyReceived} at ${tx.price}`,
      timestamp: tx.timestamp,
      data: { transactionId: tx.id, side: tx.side, realizedPnl: tx.realizedPnl, reason: tx.reason },
    });

    await this.persistence.saveTransaction(ledger.accountId, ledger.transactions().length, tx, opening);
    return tx;
  }

  private pushExitAlert(reason: string, tx: Transaction, alerts: NewAlert[]): void {
    const pnl = tx.realizedPnl ?? 0;
    const pnlText = `${pnl >= 0 ? '+' : ''}${pnl.toFixed(2)} ${tx.currencyReceived}`;

    if (reason === 'stop-loss') {
      alerts.push({
        kind: AlertKind.STOP_LOSS_HIT,
        pair: tx.pair,
        severity: AlertSeverity.CRITICAL,
        message: `Stop-loss hit on ${tx.pair} at ${tx.price}: ${pnlText}`,
        timestamp: tx.timestamp,
        data: { transactionId: tx.id, price: tx.price, realizedPnl: pnl },
      });
    } else if (reason === 'take-profit') {
      alerts.push({
        kind: AlertKind.TAKE_PROFIT_HIT,
        pair: tx.pair,
        severity: AlertSeverity.INFO,
        message: `Take-profit hit on ${tx.pair} at ${tx.price}: ${pnlText}`,
        timestamp: tx.timestamp,
        data: { transactionId: tx.id, price: tx.price, realizedPnl: pnl },
      });
    }
  }

  // ============================================
  // Alerts, state & sleep
  // ============================================

  private async publishAlerts(pending: NewAlert[]): Promise<Alert[]> {
    const published: Alert[] = [];
    for (const input of pending) {
      const alert = AlertService.create(input);
      this.alertService.publish(alert);
      published.push(alert);

      await this.logger.logMonitor({
        level: ALERT_LOG_LEVELS[alert.severity],
        eventType: ALERT_EVENT_TYPES[alert.kind],
        message: alert.message,
        pair: alert.pair,
        accountId: this.run ? this.run.ledger.accountId : undefined,
        context: CONTEXT,
        metadata: alert.data,
      });
    }
    return published;
  }

  private transition(event: MonitorEvent): void {
    const from = this.context.state;
    const result = processMonitorTransition(this.context, event);
    if (!result.transitioned) {
      this.logger.warn(`Ignored ${event} in state ${from}`, CONTEXT);
      return;
    }

    this.context = result.context;
    const change: MonitorStateChange = { from, to: result.newState, tick: result.context.tick };
    this.eventEmitter.emit(MONITOR_EVENTS.STATE_CHANGED, change);
  }

  private enterIdle(): void {
    if (this.context.state === MonitorState.IDLE) {
      return;
    }
    if (this.context.state === MonitorState.EXECUTING) {
      // Only reached when the loop failed mid-write
      this.context = { ...this.context, state: MonitorState.IDLE, enteredAt: Date.now() };
      return;
    }
    this.transition(MonitorEvent.STOP);
  }

  private publishSnapshot(ledger: PortfolioLedger): void {
    this.latestSnapshot = ledger.snapshot();
    this.latestTransactions = Object.freeze(ledger.transactions());
  }

  private settleTickWaiters(report: TickReport | null): void {
    const waiters = this.tickWaiters;
    this.tickWaiters = [];
    for (const waiter of waiters) {
      if (report) {
        waiter.resolve(report);
      } else {
        waiter.reject(new MonitorStateError('Monitoring stopped before the tick completed'));
      }
    }
  }

  /**
   * Inter-tick sleep, registered with the SchedulerRegistry
   * Rejects with an AbortError on stop; resolves early on a manual tick.
   */
  private sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(abortError());
        return;
      }

      const finish = () => {
        signal.removeEventListener('abort', onAbort);
        this.wakeSleep = null;
        if (this.schedulerRegistry.doesExist('timeout', MONITOR_SLEEP_TIMEOUT)) {
          this.schedulerRegistry.deleteTimeout(MONITOR_SLEEP_TIMEOUT);
        }
      };
      const onAbort = () => {
        finish();
        reject(abortError());
      };

      const timeout = setTimeout(() => {
        finish();
        resolve();
      }, ms);
      this.schedulerRegistry.addTimeout(MONITOR_SLEEP_TIMEOUT, timeout);

      this.wakeSleep = () => {
        finish();
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
