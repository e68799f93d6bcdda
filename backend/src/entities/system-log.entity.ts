import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export enum SystemEventType {
  SYSTEM_START = 'SYSTEM_START',
  MONITOR_START = 'MONITOR_START',
  MONITOR_STOP = 'MONITOR_STOP',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  RATE_LIMIT_BACKOFF = 'RATE_LIMIT_BACKOFF',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

@Entity('system_logs')
@Index(['log_level', 'created_at'])
@Index(['event_type', 'created_at'])
export class SystemLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    type: 'enum',
    enum: LogLevel,
  })
  @Index()
  log_level!: LogLevel;

  @Column({
    type: 'enum',
    enum: SystemEventType,
  })
  @Index()
  event_type!: SystemEventType;

  @Column('text')
  message!: string;

  @Column({ type: 'varchar', nullable: true })
  component!: string | null; // Which component generated this log

  @Column('jsonb', { nullable: true })
  metadata!: Record<string, unknown> | null;

  @CreateDateColumn()
  @Index()
  created_at!: Date;
}
