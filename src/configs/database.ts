import fs from "fs";
import path from "path";
import { Pool, PoolConfig, types } from "pg";
import { loadConfig } from "./environment";

// DATE columns come back as "YYYY-MM-DD" strings instead of local-midnight Dates
types.setTypeParser(1082, (val) => val);

const config = loadConfig();

const readSslConfig = (certPath?: string): PoolConfig["ssl"] => {
  if (!certPath) return undefined;
  return {
    rejectUnauthorized: true,
    ca: fs.readFileSync(path.resolve(certPath)).toString(),
  };
};

export const DATABASE_CONFIG: PoolConfig = config.database.url
  ? {
      connectionString: config.database.url,
      ssl: readSslConfig(config.database.sslCertPath),
    }
  : {
      host: config.database.host,
      port: config.database.port,
      database: config.database.name,
      user: config.database.user,
      password: config.database.password,
      ssl: readSslConfig(config.database.sslCertPath),
    };

export const createPool = (overrides: PoolConfig = {}): Pool =>
  new Pool({
    ...DATABASE_CONFIG,
    max: config.database.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
    ...overrides,
  });
