import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const MINUTE = 60;
const HOUR = MINUTE * 60;
const DAY = HOUR * 24;

interface Config {
  nodeEnv: string;
  port: number;
  logLevel: string;
  paths: {
    documentFile: string;
  };
  redis: {
    url?: string;
  };
  cache: {
    prefix: string;
    ttl: CacheTtlConfig;
  };
  neo4j: {
    uri: string;
    user: string;
    password: string;
    database: string;
  };
}

export interface CacheTtlConfig {
  overview: number;   // whole document and overview
  content: number;    // single chapter / article
  search: number;
  popular: number;
  related: number;
  chapterList: number;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

const debugMode = process.env.DEBUG_MODE === 'true' || process.env.DEBUG_MODE === '1';

const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 3000),
  // DEBUG_MODE turns on cache hit/miss logging unless LOG_LEVEL says otherwise
  logLevel: process.env.LOG_LEVEL || (debugMode ? 'debug' : 'info'),
  paths: {
    documentFile: path.resolve(process.env.DOCUMENT_PATH || './data/constitution.json'),
  },
  redis: {
    url: process.env.REDIS_URL || undefined,
  },
  cache: {
    prefix: process.env.CACHE_PREFIX || 'constitution',
    ttl: {
      overview: intFromEnv('CACHE_TTL_OVERVIEW', 6 * HOUR),
      content: intFromEnv('CACHE_TTL_CONTENT', DAY),
      search: intFromEnv('CACHE_TTL_SEARCH', HOUR),
      popular: intFromEnv('CACHE_TTL_POPULAR', HOUR),
      related: 6 * HOUR,
      chapterList: HOUR,
    },
  },
  neo4j: {
    uri: process.env.NEO4J_URI || 'bolt://localhost:7687',
    user: process.env.NEO4J_USER || 'neo4j',
    password: process.env.NEO4J_PASSWORD || 'password',
    database: process.env.NEO4J_DATABASE || 'neo4j',
  },
};

if (!config.redis.url && config.nodeEnv !== 'test') {
  console.warn('REDIS_URL is not set. Falling back to the in-process cache backend; cached entries will not be shared between instances.');
}

export default config;
