import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { LogLevel } from './system-log.entity';

export { LogLevel };

export enum MonitorEventType {
  TICK_COMPLETED = 'TICK_COMPLETED',
  SIGNAL_GENERATED = 'SIGNAL_GENERATED',
  TRADE_EXECUTED = 'TRADE_EXECUTED',
  TRADE_REJECTED = 'TRADE_REJECTED',
  STOP_LOSS_HIT = 'STOP_LOSS_HIT',
  TAKE_PROFIT_HIT = 'TAKE_PROFIT_HIT',
  RATE_CHANGE = 'RATE_CHANGE',
  DATA_FETCH_FAILED = 'DATA_FETCH_FAILED',
  PAIR_DEGRADED = 'PAIR_DEGRADED',
  ANALYSIS_FAILED = 'ANALYSIS_FAILED',
}

@Entity('monitor_logs')
@Index(['pair', 'created_at'])
@Index(['event_type', 'created_at'])
export class MonitorLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', nullable: true })
  @Index()
  pair!: string | null;

  @Column({
    type: 'enum',
    enum: LogLevel,
  })
  log_level!: LogLevel;

  @Column({
    type: 'enum',
    enum: MonitorEventType,
  })
  @Index()
  event_type!: MonitorEventType;

  @Column('text')
  message!: string;

  // Ledger references
  @Column({ type: 'varchar', nullable: true })
  account_id!: string | null;

  @Column({ type: 'varchar', nullable: true })
  transaction_id!: string | null;

  @Column('jsonb', { nullable: true })
  metadata!: Record<string, unknown> | null;

  @CreateDateColumn()
  @Index()
  created_at!: Date;
}
