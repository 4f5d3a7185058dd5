import express, { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import path from 'path';
import { fileURLToPath } from 'url';
import { config } from './config.js';
import { describeError } from './domain/errors.js';
import {
    INTERNAL_ERROR_CODE,
    INVALID_PARAMS_CODE,
    INVALID_PAYMENT_CODE,
    INVALID_REQUEST_CODE,
    METHOD_NOT_FOUND_CODE,
    PARSE_ERROR_CODE,
    PAYMENT_REQUIRED_CODE,
    SERVER_ERROR_CODE,
    rpcError,
    rpcResult,
    type JsonRpcId,
    type JsonRpcResponse,
} from './domain/jsonrpc.js';
import { JsonRpcRequestSchema, ToolCallParamsSchema, formatIssues } from './domain/schemas.js';
import type { PaymentReceipt } from './domain/types.js';
import { findCapabilityGaps } from './services/capabilities.js';
import { FacilitatorClient } from './services/facilitator.js';
import { PaymentOrchestrator } from './services/orchestrator.js';
import { NetworkRegistry } from './services/registry.js';
import { RequirementBuilder } from './services/requirements.js';
import { facilitatorSettingsFrom, loadPaymentSettings } from './services/settings.js';
import { createDefaultTools, type ToolRegistry } from './services/tools.js';
import { logger } from './utils/logger.js';

export interface PaymentGate {
    orchestrator: PaymentOrchestrator;
    requirements: RequirementBuilder;
}

export interface ServerDependencies {
    tools: ToolRegistry;
    /** Omitted when payments are disabled: every tool is then free. */
    payments?: PaymentGate;
}

const TRACE_ID_HEADER = 'x-trace-id';

export function createServer(dependencies: ServerDependencies) {
    const { tools, payments } = dependencies;
    const app = express();
    app.use(express.json());

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok', paymentsEnabled: payments !== undefined });
    });

    async function callTool(id: JsonRpcId, params: unknown, traceId: string, signal: AbortSignal): Promise<JsonRpcResponse> {
        const parsed = ToolCallParamsSchema.safeParse(params);
        if (!parsed.success) {
            return rpcError(id, INVALID_PARAMS_CODE, `Invalid params: ${formatIssues(parsed.error).join('; ')}`);
        }

        const { name, arguments: args, _meta: meta } = parsed.data;
        const tool = tools.get(name);
        if (!tool) {
            return rpcError(id, INVALID_PARAMS_CODE, `Unknown tool '${name}'`);
        }

        let receipt: PaymentReceipt | undefined;
        if (payments && payments.requirements.isProtected(name)) {
            const decision = await payments.orchestrator.authorize({
                resourceId: name,
                meta,
                traceId,
                signal,
            });

            if (decision.outcome === 'payment_required') {
                const { paymentRequired } = decision;
                return rpcError(id, PAYMENT_REQUIRED_CODE, paymentRequired.error ?? 'Payment required', paymentRequired);
            }
            if (decision.outcome === 'rejected') {
                const { error } = decision;
                return error.isCallerError
                    ? rpcError(id, INVALID_PAYMENT_CODE, `Invalid payment: ${error.publicMessage}`)
                    : rpcError(id, SERVER_ERROR_CODE, error.publicMessage, { traceId });
            }
            receipt = decision.receipt;
        }

        try {
            const output = await tool.handler(args, { traceId });
            const result: Record<string, unknown> = {
                content: [{ type: 'text', text: typeof output === 'string' ? output : JSON.stringify(output) }],
            };
            if (receipt) {
                result._meta = { paymentReceipt: receipt };
            }
            return rpcResult(id, result);
        } catch (error) {
            logger.error({ traceId, tool: name, error: describeError(error) }, 'Tool execution failed');
            return rpcError(id, INTERNAL_ERROR_CODE, `Tool '${name}' failed`, receipt ? { paymentReceipt: receipt } : undefined);
        }
    }

    app.post('/rpc', async (req: Request, res: Response) => {
        const parsed = JsonRpcRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json(rpcError(null, INVALID_REQUEST_CODE, 'Invalid JSON-RPC request'));
            return;
        }

        const { id = null, method, params } = parsed.data;
        const headerTrace = req.header(TRACE_ID_HEADER);
        const traceId = headerTrace && headerTrace.length <= 128 ? headerTrace : randomUUID();

        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        try {
            switch (method) {
                case 'tools/list':
                    res.json(
                        rpcResult(id, {
                            tools: tools.list().map(tool => ({
                                name: tool.name,
                                description: tool.description,
                                price: payments?.requirements.priceOf(tool.name),
                            })),
                        })
                    );
                    return;
                case 'tools/call':
                    res.json(await callTool(id, params, traceId, controller.signal));
                    return;
                default:
                    res.json(rpcError(id, METHOD_NOT_FOUND_CODE, `Method '${method}' not found`));
            }
        } catch (error) {
            logger.error({ traceId, method, error: describeError(error) }, 'RPC request failed');
            res.json(rpcError(id, INTERNAL_ERROR_CODE, 'Internal error', { traceId }));
        }
    });

    // Body parser failures land here
    app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (error instanceof SyntaxError) {
            res.status(400).json(rpcError(null, PARSE_ERROR_CODE, 'Parse error'));
            return;
        }
        next(error);
    });

    return app;
}

async function start() {
    let dependencies: ServerDependencies;

    if (config.paymentsEnabled) {
        const settings = loadPaymentSettings(config.paymentSettingsPath);
        const registry = NetworkRegistry.fromSettings(settings.networks);
        const requirements = new RequirementBuilder(registry, settings);
        const facilitator = new FacilitatorClient(facilitatorSettingsFrom(config));
        const orchestrator = new PaymentOrchestrator({ registry, requirements, facilitator });

        try {
            const supported = await facilitator.supported(randomUUID());
            for (const gap of findCapabilityGaps(registry, supported)) {
                logger.warn(gap, 'Facilitator does not cover configured network');
            }
        } catch (error) {
            logger.warn({ error: describeError(error) }, 'Could not query facilitator capabilities');
        }

        logger.info({ networks: registry.list().map(policy => policy.network), settingsPath: config.paymentSettingsPath }, 'Payments enabled');
        dependencies = { tools: createDefaultTools(registry), payments: { orchestrator, requirements } };
    } else {
        logger.warn('Payments disabled, all tools are free');
        dependencies = { tools: createDefaultTools() };
    }

    const app = createServer(dependencies);
    app.listen(config.port, () => {
        logger.info({ port: config.port, paymentsEnabled: config.paymentsEnabled }, 'x402 payment gate started');
    });
}

const entryPoint = process.argv[1] ? path.resolve(process.argv[1]) : undefined;
if (entryPoint === fileURLToPath(import.meta.url)) {
    start().catch(err => {
        logger.error({ error: describeError(err) }, 'Failed to start server');
        process.exit(1);
    });
}
