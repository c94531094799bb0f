/**
 * Gateway Configuration
 *
 * Everything the gateway needs is carried in an explicit GatewayConfig that is
 * passed to its constructor. getGatewayConfig() builds one from environment
 * variables; nothing is cached at module level, so tests can build their own.
 */

export interface GatewayConfig {
  /** MongoDB connection string */
  mongodbUri: string;
  /** Logical database name */
  databaseName: string;
  /** Documents older than this many days are removed by cleanup() */
  retentionDays: number;
  /** Actor id that bypasses visibility filtering */
  adminId: string;
}

const DEFAULT_MONGODB_URI = 'mongodb://localhost:27017';
const DEFAULT_DATABASE = 'workflow_automation';
const DEFAULT_RETENTION_DAYS = 30;
const DEFAULT_ADMIN_ID = 'admin';

type Env = Record<string, string | undefined>;

function parseRetentionDays(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_RETENTION_DAYS;
  }
  const days = Number(raw);
  if (!Number.isInteger(days) || days < 0) {
    console.warn(`⚠️  Invalid DATA_CUT_OFF_DAYS "${raw}" - using ${DEFAULT_RETENTION_DAYS}`);
    return DEFAULT_RETENTION_DAYS;
  }
  return days;
}

/**
 * Build a GatewayConfig from environment variables.
 */
export function getGatewayConfig(env: Env = process.env): GatewayConfig {
  return {
    mongodbUri: env.MONGODB_URI || DEFAULT_MONGODB_URI,
    databaseName: env.MONGODB_DATABASE || DEFAULT_DATABASE,
    retentionDays: parseRetentionDays(env.DATA_CUT_OFF_DAYS),
    adminId: env.ADMIN_ID || DEFAULT_ADMIN_ID,
  };
}

/**
 * Fill in defaults for a partially specified config.
 */
export function withDefaults(config: Partial<GatewayConfig>): GatewayConfig {
  return {
    mongodbUri: config.mongodbUri ?? DEFAULT_MONGODB_URI,
    databaseName: config.databaseName ?? DEFAULT_DATABASE,
    retentionDays: config.retentionDays ?? DEFAULT_RETENTION_DAYS,
    adminId: config.adminId ?? DEFAULT_ADMIN_ID,
  };
}
