import type { NetworkRegistry } from './registry.js';

export interface ToolContext {
    traceId: string;
}

export interface ToolDefinition {
    name: string;
    description: string;
    handler: (args: Record<string, unknown>, context: ToolContext) => Promise<unknown>;
}

export class ToolRegistry {
    private readonly tools = new Map<string, ToolDefinition>();

    register(tool: ToolDefinition): this {
        if (this.tools.has(tool.name)) {
            throw new Error(`Tool '${tool.name}' is already registered`);
        }
        this.tools.set(tool.name, tool);
        return this;
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name);
    }

    list(): ToolDefinition[] {
        return Array.from(this.tools.values());
    }
}

export function createDefaultTools(registry?: NetworkRegistry): ToolRegistry {
    const tools = new ToolRegistry().register({
        name: 'ping',
        description: 'Returns pong',
        handler: async () => 'pong',
    });
    if (!registry) return tools;

    return tools.register({
        name: 'listPaymentNetworks',
        description: 'Lists the networks and assets payments are accepted in',
        handler: async () =>
            registry.list().map(policy => ({
                network: policy.network,
                payTo: policy.payTo,
                assets: Array.from(policy.assets.values()),
            })),
    });
}
