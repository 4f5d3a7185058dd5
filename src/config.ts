import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

export const config = {
    port: parseInt(process.env.PORT || '3000', 10),
    logLevel: process.env.LOG_LEVEL || 'info',
    paymentsEnabled: process.env.PAYMENTS_ENABLED === 'true' || process.env.PAYMENTS_ENABLED === '1',
    facilitatorBaseUrl: process.env.FACILITATOR_BASE_URL || '',
    facilitatorTimeoutSeconds: parseInt(process.env.FACILITATOR_TIMEOUT_SECONDS || '30', 10),
    facilitatorMaxAttempts: parseInt(process.env.FACILITATOR_MAX_ATTEMPTS || '3', 10),
    paymentSettingsPath: path.resolve(process.env.PAYMENT_SETTINGS_PATH || './config/payments.json'),
};

export type EnvConfig = typeof config;
