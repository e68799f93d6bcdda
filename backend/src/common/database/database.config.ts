import { DataSource, DataSourceOptions } from 'typeorm';
import { config } from 'dotenv';
import { SystemLog } from '../../entities/system-log.entity';
import { MonitorLog } from '../../entities/monitor-log.entity';
import { PortfolioAccount } from '../../entities/portfolio-account.entity';
import { LedgerTransaction } from '../../entities/ledger-transaction.entity';

config();

export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432'),
  username: process.env.DATABASE_USER || 'fx_user',
  password: process.env.DATABASE_PASSWORD || 'fx_password',
  database: process.env.DATABASE_NAME || 'fx_autotrader',
  entities: [SystemLog, MonitorLog, PortfolioAccount, LedgerTransaction],
  migrations: ['dist/migrations/*.js'],
  synchronize: process.env.NODE_ENV === 'development', // Auto-sync in dev
  logging: process.env.NODE_ENV === 'development' ? ['error', 'warn'] : false,
  extra: {
    // Connection pool settings
    max: 10,
    min: 1,
    idleTimeoutMillis: 30000,
  },
};

const dataSource = new DataSource(dataSourceOptions);

export default dataSource;
