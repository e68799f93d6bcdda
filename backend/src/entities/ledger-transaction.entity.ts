import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { TradeSide } from '../portfolio/interfaces';

@Entity('ledger_transactions')
@Index(['account_id', 'sequence'], { unique: true })
export class LedgerTransaction {
  @PrimaryColumn('varchar')
  id!: string;

  @Column('varchar')
  @Index()
  account_id!: string;

  // Position in the account's log; replay order
  @Column('int')
  sequence!: number;

  @Column('varchar')
  pair!: string;

  @Column({
    type: 'enum',
    enum: TradeSide,
  })
  side!: TradeSide;

  @Column('double precision')
  amount!: number;

  @Column('double precision')
  price!: number;

  @Column({ type: 'varchar', length: 3 })
  currency_given!: string;

  @Column({ type: 'varchar', length: 3 })
  currency_received!: string;

  @Column('double precision')
  amount_received!: number;

  @Column('double precision', { nullable: true })
  realized_pnl!: number | null;

  @Column('text', { nullable: true })
  reason!: string | null;

  // Protective levels, set on the Buy that opens a position
  @Column('double precision', { nullable: true })
  stop_loss!: number | null;

  @Column('double precision', { nullable: true })
  take_profit!: number | null;

  // Unix ms of execution
  @Column('double precision')
  executed_at!: number;

  @CreateDateColumn()
  created_at!: Date;
}
