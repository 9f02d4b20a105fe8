/**
 * Environment Configuration Manager
 * Loads and validates environment variables with strict error handling
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

// Load .env file from project root
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type ConfigLogLevel = (typeof LOG_LEVELS)[number];

/**
 * Application configuration interface
 */
export interface EnvConfig {
    /** Directory of localized policy-definition resources (ADML) */
    ADML_DIR: string;
    /** File extension of resource documents */
    RESOURCE_EXTENSION: string;
    /** Value of the check_type version attribute */
    AUDIT_VERSION: string;
    /** group_policy description; empty means derive it from the input file name */
    AUDIT_DESCRIPTION: string;
    /** Directory for generated .audit files when no --output is given */
    OUTPUT_DIR: string;
    /** Console log level */
    LOG_LEVEL: ConfigLogLevel;
    /** Optional plain-text log file */
    LOG_FILE: string;
}

/**
 * Default ADML location: the local PolicyDefinitions store on Windows,
 * a copy beside the working directory elsewhere
 */
export function defaultAdmlDir(platform: NodeJS.Platform = process.platform): string {
    return platform === 'win32'
        ? 'C:\\Windows\\PolicyDefinitions\\en-US'
        : './PolicyDefinitions/en-US';
}

/**
 * Get an optional environment variable with a default value
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set
 * @returns The value or default
 */
function getOptional(key: string, defaultValue: string): string {
    const value = process.env[key];
    return (value !== undefined && value !== null && value.trim() !== '')
        ? value.trim()
        : defaultValue;
}

/**
 * Get an environment variable that must match a pattern
 * @throws Error if the value does not match
 */
function getMatching(key: string, defaultValue: string, pattern: RegExp, expected: string): string {
    const value = getOptional(key, defaultValue);

    if (!pattern.test(value)) {
        throw new Error(
            `[CONFIG ERROR] Invalid value for ${key}: "${value}"\n` +
            `Expected ${expected}.`
        );
    }

    return value;
}

function getLogLevel(key: string, defaultValue: ConfigLogLevel): ConfigLogLevel {
    const value = getOptional(key, defaultValue).toLowerCase();
    const level = LOG_LEVELS.find(candidate => candidate === value);

    if (!level) {
        throw new Error(
            `[CONFIG ERROR] Invalid value for ${key}: "${value}"\n` +
            `Expected one of: ${LOG_LEVELS.join(', ')}.`
        );
    }

    return level;
}

/**
 * Load and validate all environment configuration
 * @returns Validated configuration object
 * @throws Error if any configuration value is invalid
 */
export function loadEnvConfig(): EnvConfig {
    const extension = getMatching(
        'RESOURCE_EXTENSION',
        '.adml',
        /^\.?[A-Za-z0-9_-]+$/,
        'a file extension such as .adml'
    );

    return {
        ADML_DIR: getOptional('ADML_DIR', defaultAdmlDir()),
        RESOURCE_EXTENSION: extension.startsWith('.') ? extension : `.${extension}`,
        AUDIT_VERSION: getMatching('AUDIT_VERSION', '2', /^\d+(\.\d+)*$/, 'a numeric version such as 2'),
        AUDIT_DESCRIPTION: getOptional('AUDIT_DESCRIPTION', ''),
        OUTPUT_DIR: getOptional('OUTPUT_DIR', './audits'),
        LOG_LEVEL: getLogLevel('LOG_LEVEL', 'info'),
        LOG_FILE: getOptional('LOG_FILE', ''),
    };
}

/**
 * Singleton configuration instance
 * Loads configuration on first access
 */
let configInstance: EnvConfig | null = null;

/**
 * Get the configuration singleton
 * @returns The validated configuration object
 * @throws Error if configuration is invalid
 */
export function getConfig(): EnvConfig {
    if (!configInstance) {
        configInstance = loadEnvConfig();
    }
    return configInstance;
}

/**
 * Reset configuration (for testing purposes)
 */
export function resetConfig(): void {
    configInstance = null;
}

export default getConfig;
