import dotenv from 'dotenv';
import { DEFAULT_BORDER_SOURCE_URL, DEFAULT_USER_AGENT } from '../domain/entities/BorderSource';
import { isDateFormat } from '../domain/entities/DateRange';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    corsOrigins: string[];

    // Upstream source
    borderSourceUrl: string;
    /** DD-MM-YYYY or YYYY-MM-DD; checked by validateConfig */
    upstreamDateFormat: string;
    fetchTimeoutSeconds: number;
    scraperUserAgent: string;

    // Cache
    cacheTtlSeconds: number;
    redisUrl?: string;

    // Observability
    metricsEnabled: boolean;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value.trim().toLowerCase() === 'true';
}

function getEnvVarList(key: string, defaultValue: string): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 8000),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', '*'),

        // Upstream source
        borderSourceUrl: getEnvVar('BORDER_SOURCE_URL', DEFAULT_BORDER_SOURCE_URL),
        upstreamDateFormat: getEnvVar('UPSTREAM_DATE_FORMAT', 'DD-MM-YYYY'),
        fetchTimeoutSeconds: getEnvVarNumber('FETCH_TIMEOUT_SECONDS', 30),
        scraperUserAgent: getEnvVar('SCRAPER_USER_AGENT', DEFAULT_USER_AGENT),

        // Cache
        cacheTtlSeconds: getEnvVarNumber('CACHE_TTL_SECONDS', 3600),
        redisUrl: process.env.REDIS_URL ? getEnvVar('REDIS_URL') : undefined,

        // Observability
        metricsEnabled: getEnvVarBoolean('METRICS_ENABLED', true),
    };
}

/**
 * Validates loaded values. Returns one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
        errors.push(`PORT must be an integer between 0 and 65535, got: ${config.port}`);
    }
    if (config.cacheTtlSeconds <= 0) {
        errors.push('CACHE_TTL_SECONDS must be greater than zero');
    }
    if (config.fetchTimeoutSeconds <= 0) {
        errors.push('FETCH_TIMEOUT_SECONDS must be greater than zero');
    }
    try {
        const url = new URL(config.borderSourceUrl);
        if (url.protocol !== 'http:' && url.protocol !== 'https:') {
            errors.push(`BORDER_SOURCE_URL must use http or https, got: ${url.protocol}`);
        }
    } catch {
        errors.push(`BORDER_SOURCE_URL is not a valid URL: ${config.borderSourceUrl}`);
    }
    if (!isDateFormat(config.upstreamDateFormat)) {
        errors.push(`UPSTREAM_DATE_FORMAT must be DD-MM-YYYY or YYYY-MM-DD, got: ${config.upstreamDateFormat}`);
    }
    if (config.corsOrigins.length === 0) {
        errors.push('CORS_ORIGINS must name at least one origin, or *');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
