export { createMCPServer, executeTool, startMCPServer } from './server.js';
export type { ToolResult } from './server.js';
export { TOOL_DEFINITIONS, TOOL_NAMES, type ToolName } from './tools.js';
