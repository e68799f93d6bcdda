import { Injectable } from '@nestjs/common';
import { IndicatorSet } from '../analysis/indicator-engine';
import { MarketAnalysisService, MarketOverview, QuoteView } from '../analysis/market-analysis.service';
import { TradingSignal } from '../analysis/signal-generator';
import { MonitorStateError } from '../common/errors/trading.errors';
import { DeepReadonly } from '../common/utils/deep-freeze';
import { SeriesInterval } from '../market-data/interfaces';
import { MonitorOrchestratorService } from '../monitor/monitor-orchestrator.service';
import { PortfolioSnapshot } from '../portfolio/interfaces';

/**
 * Arguments per tool
 */
export interface ToolArgs {
  get_quote: { pair: string };
  /** interval defaults to daily */
  get_technical_analysis: { pair: string; interval?: SeriesInterval };
  generate_trading_signal: { pair: string; interval?: SeriesInterval };
  analyze_market_overview: { pairs: string[] };
  get_portfolio_snapshot: Record<string, never>;
}

/**
 * Result per tool
 */
export interface ToolResults {
  get_quote: QuoteView;
  get_technical_analysis: IndicatorSet;
  generate_trading_signal: TradingSignal;
  analyze_market_overview: MarketOverview;
  get_portfolio_snapshot: DeepReadonly<PortfolioSnapshot>;
}

export type ToolName = keyof ToolArgs;

export const TOOL_NAMES: readonly ToolName[] = [
  'get_quote',
  'get_technical_analysis',
  'generate_trading_signal',
  'analyze_market_overview',
  'get_portfolio_snapshot',
];

interface ToolDefinition<K extends ToolName> {
  description: string;
  run: (args: ToolArgs[K]) => Promise<ToolResults[K]>;
}

type ToolTable = { [K in ToolName]: ToolDefinition<K> };

export interface ToolDescription {
  name: ToolName;
  description: string;
}

/**
 * Core Tools
 * Explicit operation table over the analysis core, for an agent or chat layer.
 * Each tool is a thin wrapper; errors propagate as TradingError.
 */
@Injectable()
export class CoreToolsService {
  private readonly tools: ToolTable;

  constructor(
    private readonly marketAnalysis: MarketAnalysisService,
    private readonly monitor: MonitorOrchestratorService,
  ) {
    this.tools = {
      get_quote: {
        description: 'Current bid/ask for a currency pair (BASE/QUOTE), with mid price and spread in pips',
        run: ({ pair }) => this.marketAnalysis.getQuote(pair),
      },
      get_technical_analysis: {
        description:
          'RSI, MACD, Stochastic, Bollinger Bands, SMA/EMA and ATR over the daily or an intraday (1min to 60min) series of a pair',
        run: ({ pair, interval }) => this.marketAnalysis.getTechnicalAnalysis(pair, interval),
      },
      generate_trading_signal: {
        description: 'Buy/Sell/Hold signal for a pair with strength, confidence, entry, stop-loss and take-profit',
        run: ({ pair, interval }) => this.marketAnalysis.generateSignal(pair, interval),
      },
      analyze_market_overview: {
        description: 'Signals across several pairs with the Buy/Sell/Hold distribution and overall sentiment',
        run: ({ pairs }) => this.marketAnalysis.analyzeMarketOverview(pairs),
      },
      get_portfolio_snapshot: {
        description: 'Cash, positions, P&L and total value of the paper-trading portfolio',
        run: () => this.portfolioSnapshot(),
      },
    };
  }

  invoke<K extends ToolName>(name: K, args: ToolArgs[K]): Promise<ToolResults[K]> {
    return this.tools[name].run(args);
  }

  describeTools(): ToolDescription[] {
    return TOOL_NAMES.map((name) => ({
      name,
      description: this.tools[name].description,
    }));
  }

  isToolName(name: string): name is ToolName {
    return TOOL_NAMES.some((tool) => tool === name);
  }

  private async portfolioSnapshot(): Promise<DeepReadonly<PortfolioSnapshot>> {
    const snapshot = this.monitor.getSnapshot();
    if (!snapshot) {
      throw new MonitorStateError('No portfolio yet: start the monitor first');
    }
    return snapshot;
  }
}
