import { Transform, TransformFnParams, Type } from 'class-transformer';
import { IsArray, IsBoolean, IsIn, IsNotEmpty, IsNumber, IsOptional, IsString } from 'class-validator';
import { SeriesSource } from '../../common/config/monitoring.config';
import { INTRADAY_INTERVALS, IntradayInterval } from '../../market-data/interfaces';

const SERIES_SOURCES: readonly SeriesSource[] = ['daily', 'intraday'];

// 'EUR/USD, EUR/GBP' → ['EUR/USD', 'EUR/GBP']
function toPairList({ value }: TransformFnParams): unknown {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
  }
  if (Array.isArray(value)) {
    return value.map((p: unknown) => (typeof p === 'string' ? p.trim() : p));
  }
  return value;
}

function toBoolean({ value }: TransformFnParams): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

/**
 * POST /api/monitor/start body
 * Every field is optional and overrides the configured default. Only the
 * shape is checked here; validateMonitoringConfig checks the values.
 */
export class StartMonitorDto {
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  initialAmount?: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  initialCurrency?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  intervalSeconds?: number;

  @IsOptional()
  @Transform(toPairList)
  @IsArray()
  @IsString({ each: true })
  pairs?: string[];

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  significantChangePercent?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  maxRiskPerTradePercent?: number;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  autoTrade?: boolean;

  @IsOptional()
  @IsIn(SERIES_SOURCES)
  seriesSource?: SeriesSource;

  @IsOptional()
  @IsIn(INTRADAY_INTERVALS)
  intradayInterval?: IntradayInterval;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  resumeAccountId?: string;
}
