import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateMonitorTables1791676800000 implements MigrationInterface {

    public async up(queryRunner: QueryRunner): Promise<void> {
        // Enum types (names follow TypeORM's <table>_<column>_enum convention)
        await queryRunner.query(`CREATE TYPE "system_logs_log_level_enum" AS ENUM ('DEBUG', 'INFO', 'WARN', 'ERROR');`);
        await queryRunner.query(`CREATE TYPE "monitor_logs_log_level_enum" AS ENUM ('DEBUG', 'INFO', 'WARN', 'ERROR');`);
        await queryRunner.query(`
            CREATE TYPE "system_logs_event_type_enum" AS ENUM (
                'SYSTEM_START', 'MONITOR_START', 'MONITOR_STOP', 'CONFIGURATION_ERROR',
                'RATE_LIMIT_BACKOFF', 'DATABASE_ERROR'
            );
        `);
        await queryRunner.query(`
            CREATE TYPE "monitor_logs_event_type_enum" AS ENUM (
                'TICK_COMPLETED', 'SIGNAL_GENERATED', 'TRADE_EXECUTED', 'TRADE_REJECTED', 'STOP_LOSS_HIT',
                'TAKE_PROFIT_HIT', 'RATE_CHANGE', 'DATA_FETCH_FAILED', 'PAIR_DEGRADED', 'ANALYSIS_FAILED'
            );
        `);
        await queryRunner.query(`CREATE TYPE "ledger_transactions_side_enum" AS ENUM ('Buy', 'Sell');`);

        // Create system_logs table
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS system_logs (
                id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
                log_level "system_logs_log_level_enum" NOT NULL,
                event_type "system_logs_event_type_enum" NOT NULL,
                message TEXT NOT NULL,
                component VARCHAR NULL,
                metadata JSONB NULL,
                created_at TIMESTAMP NOT NULL DEFAULT now()
            );
        `);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_system_logs_level_created ON system_logs(log_level, created_at);`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_system_logs_event_created ON system_logs(event_type, created_at);`);

        // Create monitor_logs table
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS monitor_logs (
                id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
                pair VARCHAR NULL,
                log_level "monitor_logs_log_level_enum" NOT NULL,
                event_type "monitor_logs_event_type_enum" NOT NULL,
                message TEXT NOT NULL,
                account_id VARCHAR NULL,
                transaction_id VARCHAR NULL,
                metadata JSONB NULL,
                created_at TIMESTAMP NOT NULL DEFAULT now()
            );
        `);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_monitor_logs_pair_created ON monitor_logs(pair, created_at);`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_monitor_logs_event_created ON monitor_logs(event_type, created_at);`);

        // Create portfolio_accounts table (double precision: replay must reach the same totals)
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS portfolio_accounts (
                id VARCHAR PRIMARY KEY,
                currency VARCHAR(3) NOT NULL,
                initial_amount DOUBLE PRECISION NOT NULL,
                opened_at DOUBLE PRECISION NOT NULL,
                tracked_pairs JSONB NULL,
                created_at TIMESTAMP NOT NULL DEFAULT now(),
                updated_at TIMESTAMP NOT NULL DEFAULT now()
            );
        `);

        // Create ledger_transactions table
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS ledger_transactions (
                id VARCHAR PRIMARY KEY,
                account_id VARCHAR NOT NULL,
                sequence INTEGER NOT NULL,
                pair VARCHAR NOT NULL,
                side "ledger_transactions_side_enum" NOT NULL,
                amount DOUBLE PRECISION NOT NULL,
                price DOUBLE PRECISION NOT NULL,
                currency_given VARCHAR(3) NOT NULL,
                currency_received VARCHAR(3) NOT NULL,
                amount_received DOUBLE PRECISION NOT NULL,
                realized_pnl DOUBLE PRECISION NULL,
                reason TEXT NULL,
                stop_loss DOUBLE PRECISION NULL,
                take_profit DOUBLE PRECISION NULL,
                executed_at DOUBLE PRECISION NOT NULL,
                created_at TIMESTAMP NOT NULL DEFAULT now()
            );
        `);

        // Replay order per account
        await queryRunner.query(`
            CREATE UNIQUE INDEX IF NOT EXISTS idx_ledger_transactions_account_sequence
            ON ledger_transactions(account_id, sequence);
        `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        // Drop indexes first
        await queryRunner.query(`DROP INDEX IF EXISTS idx_ledger_transactions_account_sequence;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_monitor_logs_event_created;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_monitor_logs_pair_created;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_system_logs_event_created;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_system_logs_level_created;`);

        // Drop tables
        await queryRunner.query(`DROP TABLE IF EXISTS ledger_transactions;`);
        await queryRunner.query(`DROP TABLE IF EXISTS portfolio_accounts;`);
        await queryRunner.query(`DROP TABLE IF EXISTS monitor_logs;`);
        await queryRunner.query(`DROP TABLE IF EXISTS system_logs;`);

        // Drop enum types
        await queryRunner.query(`DROP TYPE IF EXISTS "ledger_transactions_side_enum";`);
        await queryRunner.query(`DROP TYPE IF EXISTS "monitor_logs_event_type_enum";`);
        await queryRunner.query(`DROP TYPE IF EXISTS "system_logs_event_type_enum";`);
        await queryRunner.query(`DROP TYPE IF EXISTS "monitor_logs_log_level_enum";`);
        await queryRunner.query(`DROP TYPE IF EXISTS "system_logs_log_level_enum";`);
    }

}
