// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';

// Load the .env file from the project root. Variables already present in the
// environment (Cloud Run, CI) win over the file.
const projectRootEnvPath = path.resolve(process.cwd(), '.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

const missingEnvFile = Boolean(dotenvResult.error);

// Helper function to get environment variables with defaults and critical checks
const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
    const value = process.env[key];
    if (value === undefined || value === '') {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        if (isCritical) {
            throw new Error(`[config] Environment variable ${key} is missing or empty and has no default. This is required.`);
        }
        return '';
    }
    return value;
};

const getIntEnvVar = (key: string, defaultValue: number): number => {
    const parsed = parseInt(getEnvVar(key, String(defaultValue)), 10);
    return Number.isNaN(parsed) ? defaultValue : parsed;
};

export type LlmProvider = 'groq' | 'openai';

const parseProvider = (value: string): LlmProvider => {
    if (value === 'groq' || value === 'openai') return value;
    throw new Error(`[config] LLM_PROVIDER must be 'groq' or 'openai', got '${value}'`);
};

export const CONFIG = Object.freeze({
    NODE_ENV: nodeEnv,
    PORT: getIntEnvVar('PORT', 3000),
    LOG_LEVEL: getEnvVar('LOG_LEVEL', 'info'),
    LLM_PROVIDER: parseProvider(getEnvVar('LLM_PROVIDER', 'groq')),
    // Keys are only checked when a completion service is actually built.
    GROQ_API_KEY: getEnvVar('GROQ_API_KEY'),
    OPENAI_API_KEY: getEnvVar('OPENAI_API_KEY'),
    MODEL_NAME: getEnvVar('MODEL_NAME', 'llama-3.3-70b-versatile'),
    DATA_DIR: path.resolve(process.cwd(), getEnvVar('DATA_DIR', '.data')),
    UPLOAD_MAX_BYTES: getIntEnvVar('UPLOAD_MAX_BYTES', 10 * 1024 * 1024),
    LLM_MAX_RETRIES: getIntEnvVar('LLM_MAX_RETRIES', 2),
    LLM_RETRY_DELAY_MS: getIntEnvVar('LLM_RETRY_DELAY_MS', 1000),
    ROUND_TABLE_RETRY_DELAY_MS: getIntEnvVar('ROUND_TABLE_RETRY_DELAY_MS', 2000),
    ENV_FILE_LOADED: !missingEnvFile,
});

export type AppConfig = typeof CONFIG;

export { getEnvVar };
