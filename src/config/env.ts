import dotenv from 'dotenv';

dotenv.config();

export interface Env {
  port: number;
  nodeEnv: string;
  databaseUrl?: string;
  databaseName?: string;
  mongoDebug: boolean;
}

/** Application configuration loaded from environment variables */
export const env: Env = {
  port: Number(process.env.PORT) || 8000,
  nodeEnv: process.env.NODE_ENV || 'development',
  databaseUrl: process.env.DATABASE_URL || undefined,
  databaseName: process.env.DATABASE_NAME || undefined,
  mongoDebug: process.env.MONGO_DEBUG === 'true' || process.env.MONGO_DEBUG === '1',
};
