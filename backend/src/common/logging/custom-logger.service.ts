import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { LogLevelName, winstonLogger } from './logger.config';
import { MonitorLog, MonitorEventType } from '../../entities/monitor-log.entity';
import { SystemLog, LogLevel, SystemEventType } from '../../entities/system-log.entity';
import { errorMessage } from '../errors/trading.errors';

interface BaseLogData {
  level: LogLevelName;
  message: string;
  context?: string;
  metadata?: Record<string, unknown>;
}

export interface MonitorLogData extends BaseLogData {
  eventType: MonitorEventType;
  pair?: string;
  accountId?: string;
  transactionId?: string;
}

export interface SystemLogData extends BaseLogData {
  eventType: SystemEventType;
  component?: string;
}

const DB_LEVELS: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

// Tier 3 keeps only events worth querying later
const IMPORTANT_MONITOR_EVENTS: readonly MonitorEventType[] = [
  MonitorEventType.SIGNAL_GENERATED,
  MonitorEventType.TRADE_EXECUTED,
  MonitorEventType.TRADE_REJECTED,
  MonitorEventType.STOP_LOSS_HIT,
  MonitorEventType.TAKE_PROFIT_HIT,
  MonitorEventType.PAIR_DEGRADED,
];

const IMPORTANT_SYSTEM_EVENTS: readonly SystemEventType[] = [
  SystemEventType.SYSTEM_START,
  SystemEventType.MONITOR_START,
  SystemEventType.MONITOR_STOP,
  SystemEventType.CONFIGURATION_ERROR,
  SystemEventType.DATABASE_ERROR,
];

/**
 * Custom Logger Service implementing 3-tier logging:
 * 1. Console - Real-time development monitoring
 * 2. File - Daily rotating JSON log files
 * 3. Database - Important logs only (queryable)
 */
@Injectable()
export class CustomLoggerService implements NestLoggerService {
  constructor(
    @InjectRepository(MonitorLog)
    private readonly monitorLogRepo: Repository<MonitorLog>,
    @InjectRepository(SystemLog)
    private readonly systemLogRepo: Repository<SystemLog>,
  ) {}

  /**
   * Tier 1 & 2: Log to console and file
   */
  private logToWinston(level: LogLevelName, message: string, context?: string, metadata?: Record<string, unknown>) {
    winstonLogger.log({
      level,
      message,
      context,
      ...metadata,
    });
  }

  /**
   * Tier 3: Log monitoring events to database (for important events only)
   */
  async logMonitor(data: MonitorLogData): Promise<void> {
    const { level, eventType, message, pair, accountId, transactionId, metadata, context } = data;

    this.logToWinston(level, message, context || 'Monitor', {
      eventType,
      pair,
      transactionId,
      ...metadata,
    });

    if (IMPORTANT_MONITOR_EVENTS.includes(eventType) || level === 'error') {
      try {
        await this.monitorLogRepo.save({
          pair: pair ?? null,
          log_level: DB_LEVELS[level],
          event_type: eventType,
          message,
          account_id: accountId ?? null,
          transaction_id: transactionId ?? null,
          metadata: metadata ?? null,
        });
      } catch (error) {
        // Fail silently to avoid recursion
        winstonLogger.error('Failed to save monitor log to database', { error: errorMessage(error) });
      }
    }
  }

  /**
   * Tier 3: Log system events to database
   */
  async logSystem(data: SystemLogData): Promise<void> {
    const { level, eventType, message, component, metadata, context } = data;

    this.logToWinston(level, message, context || 'System', {
      eventType,
      component,
      ...metadata,
    });

    if (IMPORTANT_SYSTEM_EVENTS.includes(eventType) || level === 'error') {
      try {
        await this.systemLogRepo.save({
          log_level: DB_LEVELS[level],
          event_type: eventType,
          message,
          component: component ?? null,
          metadata: metadata ?? null,
        });
      } catch (error) {
        winstonLogger.error('Failed to save system log to database', { error: errorMessage(error) });
      }
    }
  }

  /**
   * NestJS LoggerService interface implementations
   * These log to console and file only (Tier 1 & 2)
   */
  log(message: string, context?: string) {
    this.logToWinston('info', message, context);
  }

  error(message: string, trace?: string, context?: string) {
    this.logToWinston('error', message, context, { trace });
  }

  warn(message: string, context?: string) {
    this.logToWinston('warn', message, context);
  }

  debug(message: string, context?: string) {
    this.logToWinston('debug', message, context);
  }

  verbose(message: string, context?: string) {
    this.logToWinston('debug', message, context);
  }
}
