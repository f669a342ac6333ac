export type { Result } from "./result.js";
export { Ok, Err, errorMessage } from "./result.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, runMain, onShutdownSignal } from "./server.js";
