/**
 * Tool registry.
 *
 * Host tools are named by method (`stripe/charges.create`); guests reach them
 * through identifiers with `. / - :` replaced by `_`. Two names that
 * normalize to the same identifier are rejected at registration.
 */

export interface ToolDefinition {
  /** Method name, matched against capability patterns */
  name: string;
  description?: string;
  /** JSON Schema of the arguments object */
  parameters?: Record<string, unknown>;
}

const SEPARATORS = /[./\-:]/g;
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function normalizeToolName(name: string): string {
  return name.replace(SEPARATORS, '_');
}

export class ToolRegistrationError extends Error {
  public readonly code: string;
  public readonly toolName: string;

  constructor(code: string, toolName: string, message: string) {
    super(message);
    this.name = 'ToolRegistrationError';
    this.code = code;
    this.toolName = toolName;
  }
}

export class ToolNameCollisionError extends ToolRegistrationError {
  public readonly identifier: string;
  public readonly existingName: string;

  constructor(toolName: string, existingName: string, identifier: string) {
    super(
      'TOOL_NAME_COLLISION',
      toolName,
      `Tool "${toolName}" and "${existingName}" both normalize to "${identifier}"`
    );
    this.name = 'ToolNameCollisionError';
    this.identifier = identifier;
    this.existingName = existingName;
  }
}

export class ToolRegistry {
  private readonly byIdentifier = new Map<string, ToolDefinition>();

  constructor(tools: readonly ToolDefinition[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): string {
    const identifier = normalizeToolName(tool.name);
    if (!IDENTIFIER.test(identifier)) {
      throw new ToolRegistrationError(
        'INVALID_TOOL_NAME',
        tool.name,
        `Tool "${tool.name}" does not normalize to a valid identifier`
      );
    }

    const existing = this.byIdentifier.get(identifier);
    if (existing) {
      throw new ToolNameCollisionError(tool.name, existing.name, identifier);
    }

    this.byIdentifier.set(identifier, { ...tool });
    return identifier;
  }

  /** Look up by method name or guest identifier. */
  get(nameOrIdentifier: string): ToolDefinition | undefined {
    return this.byIdentifier.get(normalizeToolName(nameOrIdentifier));
  }

  hasMethod(method: string): boolean {
    return this.get(method)?.name === method;
  }

  /** Guest identifier -> method name. */
  identifiers(): ReadonlyMap<string, string> {
    return new Map([...this.byIdentifier].map(([identifier, tool]) => [identifier, tool.name]));
  }

  list(): ToolDefinition[] {
    return [...this.byIdentifier.values()];
  }

  get size(): number {
    return this.byIdentifier.size;
  }
}
