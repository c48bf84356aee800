import fs from "fs";
import path from "path";
import type { PoolConfig } from "pg";
import type { AppConfig } from "./environment";

export const buildDatabaseConfig = (config: AppConfig): PoolConfig => {
  const { database } = config;
  return {
    host: database.host,
    port: database.port,
    database: database.name,
    user: database.user,
    password: database.password,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    ssl: database.ssl
      ? {
          rejectUnauthorized: true,
          ca: database.sslCertPath
            ? fs.readFileSync(path.resolve(database.sslCertPath)).toString()
            : undefined,
        }
      : false,
  };
};

export const CREATE_PLANS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS plans (
    id UUID PRIMARY KEY,
    goal TEXT NOT NULL,
    body JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL
)
`;

export const CREATE_PLANS_INDEX_SQL = `
CREATE INDEX IF NOT EXISTS idx_plans_created_at
ON plans (created_at)
`;
