export { registerToolHandlers, dispatchTool } from './tool-handlers.js';
export { toolDefinitions, toolSchemas, zodToJsonSchema } from './tool-definitions.js';
export type { ToolName, JsonObjectSchema } from './tool-definitions.js';
