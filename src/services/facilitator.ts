import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import type { IFacilitatorClient } from '../domain/facilitator.js';
import { FacilitatorError, describeError } from '../domain/errors.js';
import {
    SettleResponseSchema,
    SupportedResponseSchema,
    VerifyResponseSchema,
    formatIssues,
    type FacilitatorSettings,
} from '../domain/schemas.js';
import {
    X402_VERSION,
    type PaymentPayload,
    type PaymentRequirements,
    type SettleResponse,
    type SupportedResponse,
    type VerifyResponse,
} from '../domain/types.js';
import { traceLogger } from '../utils/logger.js';

export const TRACE_HEADER = 'X-Trace-ID';

const BASE_DELAY_MS = 100;

export interface FacilitatorClientOptions extends FacilitatorSettings {
    baseDelayMs?: number;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function isTransientStatus(status: number): boolean {
    return status >= 500;
}

/**
 * HTTP client for an x402 facilitator (`/verify`, `/settle`, `/supported`).
 *
 * Transient failures (no response, timeout, 5xx) are retried with exponential
 * backoff plus jitter below the base delay. `maxAttempts` caps the total number
 * of attempts for one call. 4xx and unparseable bodies fail immediately.
 */
export class FacilitatorClient implements IFacilitatorClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly baseDelayMs: number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly random: () => number;

    constructor(
        options: FacilitatorClientOptions,
        private readonly http: AxiosInstance = axios.create()
    ) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutSeconds * 1000;
        this.maxAttempts = options.maxAttempts;
        this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
        this.sleep = options.sleep ?? defaultSleep;
        this.random = options.random ?? Math.random;
    }

    async verify(payload: PaymentPayload, requirements: PaymentRequirements, traceId: string): Promise<VerifyResponse> {
        traceLogger(traceId).info({ network: requirements.network, scheme: requirements.scheme }, 'Verifying payment authorization');
        return this.executeWithRetry('verify', 'post', VerifyResponseSchema, traceId, this.paymentBody(payload, requirements));
    }

    async settle(payload: PaymentPayload, requirements: PaymentRequirements, traceId: string): Promise<SettleResponse> {
        traceLogger(traceId).info({ network: requirements.network, scheme: requirements.scheme }, 'Settling payment');
        return this.executeWithRetry('settle', 'post', SettleResponseSchema, traceId, this.paymentBody(payload, requirements));
    }

    async supported(traceId: string): Promise<SupportedResponse> {
        traceLogger(traceId).info('Querying supported networks');
        return this.executeWithRetry('supported', 'get', SupportedResponseSchema, traceId);
    }

    /** Delay before retry number `retry` (1-based). */
    backoffDelay(retry: number): number {
        const exponential = this.baseDelayMs * 2 ** (retry - 1);
        const jitter = Math.floor(this.random() * this.baseDelayMs);
        return exponential + jitter;
    }

    private paymentBody(payload: PaymentPayload, requirements: PaymentRequirements) {
        return {
            x402Version: X402_VERSION,
            paymentPayload: payload,
            paymentRequirements: requirements,
        };
    }

    private async executeWithRetry<T>(
        operation: string,
        method: 'get' | 'post',
        schema: ZodType<T, ZodTypeDef, unknown>,
        traceId: string,
        body?: unknown
    ): Promise<T> {
        const log = traceLogger(traceId);
        let lastError: FacilitatorError | undefined;

        for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
            if (attempt > 1) {
                const delay = this.backoffDelay(attempt - 1);
                log.debug({ operation, attempt, delayMs: delay }, 'Retrying facilitator request after delay');
                await this.sleep(delay);
            }

            try {
                const result = await this.executeOnce(operation, method, schema, traceId, body);
                log.info({ operation, attempt }, 'Facilitator request succeeded');
                return result;
            } catch (error) {
                if (!(error instanceof FacilitatorError)) throw error;

                log.warn({ operation, attempt, retryable: error.retryable, error: error.message }, 'Facilitator request failed');
                if (!error.retryable) throw error;
                lastError = error;
            }
        }

        throw new FacilitatorError(
            `Facilitator ${operation} failed after ${this.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
            true,
            lastError?.status
        );
    }

    private async executeOnce<T>(
        operation: string,
        method: 'get' | 'post',
        schema: ZodType<T, ZodTypeDef, unknown>,
        traceId: string,
        body?: unknown
    ): Promise<T> {
        const url = `${this.baseUrl}/${operation}`;

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.request<unknown>({
                url,
                method,
                data: body,
                timeout: this.timeoutMs,
                headers: { [TRACE_HEADER]: traceId, 'Content-Type': 'application/json' },
                validateStatus: () => true,
            });
        } catch (error) {
            if (error instanceof AxiosError) {
                // No response at all: refused, reset, DNS, or per-attempt timeout
                throw new FacilitatorError(`Facilitator request failed: ${error.code ?? error.message}`, true);
            }
            throw new FacilitatorError(`Facilitator request failed: ${describeError(error)}`, true);
        }

        if (response.status < 200 || response.status >= 300) {
            traceLogger(traceId).error({ operation, status: response.status, body: response.data }, 'Facilitator returned error');
            throw new FacilitatorError(
                `Facilitator ${operation} returned HTTP ${response.status}`,
                isTransientStatus(response.status),
                response.status
            );
        }

        const parsed = schema.safeParse(response.data);
        if (!parsed.success) {
            throw new FacilitatorError(
                `Failed to parse facilitator ${operation} response: ${formatIssues(parsed.error).join('; ')}`,
                false,
                response.status
            );
        }
        return parsed.data;
    }
}
