// src/utils/logger.ts

import winston from 'winston';
import { CONFIG } from '../config';

export const logger = winston.createLogger({
    level: CONFIG.LOG_LEVEL,
    silent: CONFIG.NODE_ENV === 'test',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
});

/**
 * Child logger that stamps every line with the emitting component.
 */
export function componentLogger(component: string): winston.Logger {
    return logger.child({ component });
}
