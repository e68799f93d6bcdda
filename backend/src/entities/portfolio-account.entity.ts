import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

@Entity('portfolio_accounts')
export class PortfolioAccount {
  // Ledger account id (uuid generated by the ledger)
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  // double precision: replay must reach the same totals
  @Column('double precision')
  initial_amount!: number;

  // Unix ms when the ledger was opened
  @Column('double precision')
  opened_at!: number;

  @Column('jsonb', { nullable: true })
  tracked_pairs!: string[] | null;

  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
