import { pino } from 'pino';
import { config } from '../config.js';

export const logger = pino({
    name: 'x402-paygate',
    level: config.logLevel,
});

export function traceLogger(traceId: string) {
    return logger.child({ traceId });
}
