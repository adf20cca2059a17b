import {
  INVALID_PARAMS,
  InputSchema,
  Prompt,
  PromptArgument,
  Resource,
  ResourceTemplate,
  ResourceTemplateArgument,
  Tool,
  ToolAnnotations
} from '../core/mcp-types';
import { MCPError, ProtocolError } from '../core/errors';
import { ToolArguments, findArgumentProblem } from './parameters';

export type ToolHandler = (args: ToolArguments) => unknown;
export type ResourceHandler = (params: Record<string, string>) => unknown;
export type PromptHandler = (args: Record<string, unknown>) => unknown;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: InputSchema;
  handler: ToolHandler;
  annotations?: ToolAnnotations;
}

export interface ResourceDefinition {
  /**
   * A fixed URI, or a template with `{param}` placeholders
   */
  uri: string;
  name: string;
  description: string;
  handler: ResourceHandler;
  mimeType?: string;
  arguments?: ResourceTemplateArgument[];
}

export interface PromptDefinition {
  name: string;
  description: string;
  handler: PromptHandler;
  arguments?: PromptArgument[];
}

/**
 * Throws INVALID_PARAMS when `args` do not satisfy the schema
 */
export function validateArguments(schema: InputSchema, args: ToolArguments): void {
  const problem = findArgumentProblem(schema, args);
  if (problem !== undefined) {
    throw new ProtocolError(problem, INVALID_PARAMS);
  }
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  public get size(): number {
    return this.tools.size;
  }

  /**
   * Registers a tool. Names are unique.
   */
  public register(definition: ToolDefinition): void {
    if (!definition.name) {
      throw new MCPError('Tool name must not be empty');
    }
    if (this.tools.has(definition.name)) {
      throw new MCPError(`Tool already registered: ${definition.name}`);
    }
    this.tools.set(definition.name, definition);
  }

  public unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  public get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * Wire descriptions in registration order
   */
  public list(): Tool[] {
    return Array.from(this.tools.values(), (definition) => {
      const tool: Tool = {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema
      };
      if (definition.annotations) {
        tool.annotations = definition.annotations;
      }
      return tool;
    });
  }
}

const PLACEHOLDER = /\{([^{}]+)\}/g;
const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface CompiledTemplate {
  pattern: RegExp;
  parameters: string[];
}

/**
 * Compiles a URI template into an anchored regex. `{name}` and `{name:hint}`
 * both capture one path segment into `name`.
 */
export function compileUriTemplate(template: string): CompiledTemplate {
  const parameters: string[] = [];
  let source = '';
  let last = 0;

  for (const match of template.matchAll(PLACEHOLDER)) {
    const index = match.index ?? 0;
    const name = match[1].split(':')[0].trim();
    if (!PARAMETER_NAME.test(name)) {
      throw new MCPError(`Invalid template parameter "${name}" in ${template}`);
    }
    if (parameters.includes(name)) {
      throw new MCPError(`Duplicate template parameter "${name}" in ${template}`);
    }
    parameters.push(name);
    source += escapeRegExp(template.slice(last, index)) + `(?<${name}>[^/]+)`;
    last = index + match[0].length;
  }
  source += escapeRegExp(template.slice(last));

  return { pattern: new RegExp(`^${source}$`), parameters };
}

export function isUriTemplate(uri: string): boolean {
  return /\{[^{}]+\}/.test(uri);
}

interface TemplateEntry {
  definition: ResourceDefinition;
  compiled: CompiledTemplate;
}

export interface ResourceMatch {
  resource: ResourceDefinition;
  params: Record<string, string>;
}

export class ResourceRegistry {
  private order: ResourceDefinition[] = [];
  private fixed: Map<string, ResourceDefinition> = new Map();
  private templates: TemplateEntry[] = [];

  public get size(): number {
    return this.order.length;
  }

  /**
   * Registers a resource; a URI containing `{...}` registers a template
   */
  public register(definition: ResourceDefinition): void {
    if (isUriTemplate(definition.uri)) {
      if (this.templates.some((entry) => entry.definition.uri === definition.uri)) {
        throw new MCPError(`Resource template already registered: ${definition.uri}`);
      }
      this.templates.push({ definition, compiled: compileUriTemplate(definition.uri) });
    } else {
      if (this.fixed.has(definition.uri)) {
        throw new MCPError(`Resource already registered: ${definition.uri}`);
      }
      this.fixed.set(definition.uri, definition);
    }
    this.order.push(definition);
  }

  /**
   * Finds the resource serving `uri`: exact matches win over templates,
   * templates are tried in registration order.
   */
  public match(uri: string): ResourceMatch | undefined {
    const exact = this.fixed.get(uri);
    if (exact) {
      return { resource: exact, params: {} };
    }

    for (const entry of this.templates) {
      const found = entry.compiled.pattern.exec(uri);
      if (found) {
        return { resource: entry.definition, params: { ...found.groups } };
      }
    }
    return undefined;
  }

  public list(): (Resource | ResourceTemplate)[] {
    return this.order.map((definition): Resource | ResourceTemplate => {
      if (isUriTemplate(definition.uri)) {
        const template: ResourceTemplate = {
          uriTemplate: definition.uri,
          name: definition.name,
          description: definition.description
        };
        const args =
          definition.arguments ??
          compileUriTemplate(definition.uri).parameters.map((name) => ({ name, required: true }));
        if (args.length > 0) {
          template.arguments = args;
        }
        if (definition.mimeType) {
          template.mimeType = definition.mimeType;
        }
        return template;
      }

      const resource: Resource = {
        uri: definition.uri,
        name: definition.name,
        description: definition.description
      };
      if (definition.mimeType) {
        resource.mimeType = definition.mimeType;
      }
      return resource;
    });
  }
}

export class PromptRegistry {
  private prompts: Map<string, PromptDefinition> = new Map();

  public get size(): number {
    return this.prompts.size;
  }

  public register(definition: PromptDefinition): void {
    if (!definition.name) {
      throw new MCPError('Prompt name must not be empty');
    }
    if (this.prompts.has(definition.name)) {
      throw new MCPError(`Prompt already registered: ${definition.name}`);
    }
    this.prompts.set(definition.name, definition);
  }

  public get(name: string): PromptDefinition | undefined {
    return this.prompts.get(name);
  }

  public list(): Prompt[] {
    return Array.from(this.prompts.values(), (definition) => {
      const prompt: Prompt = { name: definition.name, description: definition.description };
      if (definition.arguments && definition.arguments.length > 0) {
        prompt.arguments = definition.arguments;
      }
      return prompt;
    });
  }
}
