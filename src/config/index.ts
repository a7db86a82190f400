import dotenv from 'dotenv';
import { LogLevel, isLogLevel } from '../utils/logger';

// Load environment variables from .env file
dotenv.config();

interface Config {
  port: number;
  nodeEnv: string;
  databaseUrl: string;
  logLevel: LogLevel;
  dbPoolMax: number;
  dbIdleTimeoutMs: number;
  dbConnectionTimeoutMs: number;
  trustProxy: boolean;
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value && isLogLevel(value)) {
    return value;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

const config: Config = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  databaseUrl: process.env.DATABASE_URL || '',
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  dbPoolMax: parseInt(process.env.DB_POOL_MAX || '20', 10),
  dbIdleTimeoutMs: parseInt(process.env.DB_IDLE_TIMEOUT_MS || '30000', 10),
  dbConnectionTimeoutMs: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '2000', 10),
  trustProxy: process.env.TRUST_PROXY === 'true',
};

export default config;
