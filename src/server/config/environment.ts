/**
 * Environment configuration
 *
 * Reads process.env once and caches the result. Call resetEnvironmentConfig()
 * after changing the environment (dotenv load, tests).
 */
import { logger } from '../../utils/logger.js';

export interface EnvironmentConfig {
  nodeEnv: string;
  isDevelopment: boolean;
  isProduction: boolean;
  port: number;
  portProvided: boolean;
  databasePath: string;
  databasePathProvided: boolean;
  allowedOrigins: string[];
  // Traceroute analysis bounds
  analysisWindowDays: number;
  maxTraceroutePackets: number;
  locationHistoryLimit: number;
}

let cachedConfig: EnvironmentConfig | null = null;

function parsePositiveInt(name: string, defaultValue: number): { value: number; provided: boolean } {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return { value: defaultValue, provided: false };
  }

  const parsed = parseInt(raw, 10);
  if (isNaN(parsed) || parsed <= 0) {
    logger.warn(`⚠️ Invalid ${name}="${raw}", using default ${defaultValue}`);
    return { value: defaultValue, provided: false };
  }
  return { value: parsed, provided: true };
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

export function getEnvironmentConfig(): EnvironmentConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const nodeEnv = process.env.NODE_ENV || 'development';
  const port = parsePositiveInt('PORT', 5008);
  const databasePath = process.env.DATABASE_PATH;

  cachedConfig = {
    nodeEnv,
    isDevelopment: nodeEnv === 'development',
    isProduction: nodeEnv === 'production',
    port: port.value,
    portProvided: port.provided,
    databasePath: databasePath || 'meshtastic_history.db',
    databasePathProvided: !!databasePath,
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS),
    analysisWindowDays: parsePositiveInt('ANALYSIS_WINDOW_DAYS', 7).value,
    maxTraceroutePackets: parsePositiveInt('MAX_TRACEROUTE_PACKETS', 25000).value,
    locationHistoryLimit: parsePositiveInt('LOCATION_HISTORY_LIMIT', 50).value
  };

  return cachedConfig;
}

export function resetEnvironmentConfig(): void {
  cachedConfig = null;
}
