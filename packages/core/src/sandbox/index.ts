export { Sandbox, type SandboxOptions } from './sandbox.js';
export {
  ToolRegistry,
  ToolRegistrationError,
  ToolNameCollisionError,
  normalizeToolName,
  type ToolDefinition,
} from './tools.js';
