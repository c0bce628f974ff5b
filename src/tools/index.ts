export { handleToolCall } from './dispatcher.js';
export type { ToolCallResult } from './dispatcher.js';
export { getTools, getToolSpec, getToolSpecs, isToolExposed, TOOL_SPECS } from './registry.js';
export type { ToolExposure, ToolSpec } from './registry.js';
