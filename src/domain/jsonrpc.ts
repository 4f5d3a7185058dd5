export const PAYMENT_REQUIRED_CODE = -40200;
export const INVALID_PAYMENT_CODE = -40201;
export const SERVER_ERROR_CODE = -32000;

export const PARSE_ERROR_CODE = -32700;
export const INVALID_REQUEST_CODE = -32600;
export const METHOD_NOT_FOUND_CODE = -32601;
export const INVALID_PARAMS_CODE = -32602;
export const INTERNAL_ERROR_CODE = -32603;

export type JsonRpcId = string | number | null;

export interface JsonRpcError {
    code: number;
    message: string;
    data?: unknown;
}

export type JsonRpcResponse =
    | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
    | { jsonrpc: '2.0'; id: JsonRpcId; error: JsonRpcError };

export function rpcResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
    return { jsonrpc: '2.0', id, result };
}

export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
    const error: JsonRpcError = data === undefined ? { code, message } : { code, message, data };
    return { jsonrpc: '2.0', id, error };
}
