import fs from 'fs';
import type { EnvConfig } from '../config.js';
import { ConfigurationError, describeError } from '../domain/errors.js';
import {
    FacilitatorSettingsSchema,
    PaymentSettingsSchema,
    formatIssues,
    type FacilitatorSettings,
    type PaymentSettings,
} from '../domain/schemas.js';

export function parsePaymentSettings(raw: unknown): PaymentSettings {
    const parsed = PaymentSettingsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(formatIssues(parsed.error));
    }
    return parsed.data;
}

export function loadPaymentSettings(filePath: string): PaymentSettings {
    if (!fs.existsSync(filePath)) {
        throw new ConfigurationError([`Payment settings file not found: ${filePath}`]);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigurationError([`Failed to read payment settings ${filePath}: ${describeError(error)}`]);
    }
    return parsePaymentSettings(raw);
}

export function facilitatorSettingsFrom(env: Pick<EnvConfig, 'facilitatorBaseUrl' | 'facilitatorTimeoutSeconds' | 'facilitatorMaxAttempts'>): FacilitatorSettings {
    const parsed = FacilitatorSettingsSchema.safeParse({
        baseUrl: env.facilitatorBaseUrl,
        timeoutSeconds: env.facilitatorTimeoutSeconds,
        maxAttempts: env.facilitatorMaxAttempts,
    });
    if (!parsed.success) {
        throw new ConfigurationError(formatIssues(parsed.error));
    }
    return parsed.data;
}
