import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';

import type { Role } from '../auth/roles.js';

import {
  parseBoolean,
  parseChoice,
  parseInteger,
  parseList,
  parseLogLevel,
  parsePort,
  parseUrlEnv,
} from './env-parsers.js';
import type { LogLevel, StreamHeaderPolicy } from './types.js';

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../../package.json', import.meta.url)
);
function readPackageVersion(path: string): string {
  const packageJson: unknown = require(path);
  const version =
    packageJson && typeof packageJson === 'object' && 'version' in packageJson
      ? packageJson.version
      : undefined;
  if (typeof version !== 'string') {
    throw new Error('package.json version is missing');
  }
  return version;
}

export const serverVersion: string = readPackageVersion(packageJsonPath);

const STREAM_HEADER_POLICIES: readonly StreamHeaderPolicy[] = [
  'strict',
  'permissive',
];
const STDIO_ROLES: readonly Role[] = ['read-only', 'read-write'];

export interface GatewayConfig {
  readonly server: {
    readonly name: string;
    readonly version: string;
    readonly host: string;
    readonly port: number;
    readonly useStdio: boolean;
    readonly stdioRole: Role;
    readonly trustProxy: boolean;
    readonly sessionTtlMs: number;
    readonly maxSessions: number;
    readonly streamHeaderPolicy: StreamHeaderPolicy;
  };
  readonly auth: {
    readonly readOnlyKeys: readonly string[];
    readonly readWriteKeys: readonly string[];
    readonly legacyKeys: readonly string[];
  };
  readonly trello: {
    readonly apiKey: string | undefined;
    readonly token: string | undefined;
    readonly baseUrl: URL;
    readonly timeoutMs: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly enabled: boolean;
  };
}

export function buildConfig(
  env: NodeJS.ProcessEnv,
  argv: readonly string[] = []
): GatewayConfig {
  return {
    server: {
      name: 'trello-mcp-gateway',
      version: serverVersion,
      host: env.MCP_SERVER_HOST ?? '0.0.0.0',
      port: parsePort(env.MCP_SERVER_PORT, 8000),
      useStdio:
        argv.includes('--stdio') || parseBoolean(env.USE_STDIO, false),
      stdioRole: parseChoice(env.STDIO_ROLE, STDIO_ROLES, 'read-write'),
      trustProxy: parseBoolean(env.TRUST_PROXY, false),
      sessionTtlMs: parseInteger(
        env.SESSION_TTL_MS,
        30 * 60 * 1000,
        60 * 1000,
        24 * 60 * 60 * 1000
      ),
      maxSessions: parseInteger(env.MAX_SESSIONS, 200, 1, 10000),
      streamHeaderPolicy: parseChoice(
        env.STREAM_HEADER_POLICY,
        STREAM_HEADER_POLICIES,
        'permissive'
      ),
    },
    auth: {
      readOnlyKeys: parseList(env.MCP_API_KEYS_READ_ONLY),
      readWriteKeys: parseList(env.MCP_API_KEYS_READ_WRITE),
      legacyKeys: parseList(env.MCP_API_KEYS),
    },
    trello: {
      apiKey: env.TRELLO_API_KEY?.trim() || undefined,
      token: env.TRELLO_TOKEN?.trim() || undefined,
      baseUrl:
        parseUrlEnv(env.TRELLO_API_BASE_URL, 'TRELLO_API_BASE_URL') ??
        new URL('https://api.trello.com/1'),
      timeoutMs: parseInteger(env.TRELLO_TIMEOUT_MS, 30000, 1000, 120000),
    },
    logging: {
      level: parseLogLevel(env.LOG_LEVEL),
      enabled: parseBoolean(env.ENABLE_LOGGING, true),
    },
  };
}

export const config: GatewayConfig = buildConfig(process.env, process.argv);
