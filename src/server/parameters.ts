import { InputSchema, JsonSchemaType, PropertySchema } from '../core/mcp-types';
import { isPlainObject } from '../core/jsonrpc-wrapper';

export type ToolArguments = Record<string, unknown>;

export interface ParameterSpec {
  type: JsonSchemaType;
  description?: string;

  /**
   * Defaults to true
   */
  required?: boolean;
  enum?: readonly (string | number)[];
}

/**
 * Compact description of a tool's arguments: a type name, or a spec object, per argument
 */
export type ParameterMap = Record<string, JsonSchemaType | ParameterSpec>;

type ValueOf<T extends JsonSchemaType> = T extends 'string'
  ? string
  : T extends 'number' | 'integer'
  ? number
  : T extends 'boolean'
  ? boolean
  : T extends 'array'
  ? unknown[]
  : T extends 'object'
  ? Record<string, unknown>
  : null;

type ParameterValue<S> = S extends JsonSchemaType
  ? ValueOf<S>
  : S extends { type: infer T extends JsonSchemaType }
  ? ValueOf<T>
  : never;

type OptionalKeys<P extends ParameterMap> = {
  [K in keyof P]: P[K] extends { required: false } ? K : never;
}[keyof P];

type RequiredKeys<P extends ParameterMap> = Exclude<keyof P, OptionalKeys<P>>;

/**
 * The argument object a handler receives for a given parameter map
 */
export type ToolArgs<P extends ParameterMap> = { [K in RequiredKeys<P>]: ParameterValue<P[K]> } & {
  [K in OptionalKeys<P>]?: ParameterValue<P[K]>;
};

/**
 * Converts a parameter map into the tool's JSON input schema
 */
export function parametersToSchema(parameters: ParameterMap): InputSchema {
  const properties: { [key: string]: PropertySchema } = {};
  const required: string[] = [];

  for (const [name, entry] of Object.entries(parameters)) {
    const spec: ParameterSpec = typeof entry === 'string' ? { type: entry } : entry;
    const property: PropertySchema = { type: spec.type };
    if (spec.description !== undefined) {
      property.description = spec.description;
    }
    if (spec.enum !== undefined) {
      property.enum = [...spec.enum];
    }
    properties[name] = property;
    if (spec.required !== false) {
      required.push(name);
    }
  }

  return { type: 'object', properties, required };
}

/**
 * Checks a value against a JSON schema primitive type name. Unknown names accept anything.
 */
export function matchesType(value: unknown, type: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
    case 'null':
      return value === null;
    default:
      return true;
  }
}

/**
 * Returns the first problem with `args` against `schema`, or undefined when they conform
 */
export function findArgumentProblem(schema: InputSchema, args: ToolArguments): string | undefined {
  for (const name of schema.required ?? []) {
    if (!(name in args)) {
      return `Missing required argument: ${name}`;
    }
  }

  const properties = schema.properties ?? {};
  for (const [name, value] of Object.entries(args)) {
    const property = properties[name];
    if (!property) {
      continue;
    }
    if (property.type !== undefined && !matchesType(value, property.type)) {
      return `Argument ${name} has wrong type, expected ${property.type}`;
    }
    const allowed = property.enum;
    if (Array.isArray(allowed) && !allowed.includes(value)) {
      return `Argument ${name} must be one of: ${allowed.map((item) => String(item)).join(', ')}`;
    }
  }
  return undefined;
}

/**
 * Narrows validated arguments to the handler's argument type
 */
export function conformsTo<P extends ParameterMap>(
  schema: InputSchema,
  args: ToolArguments
): args is ToolArguments & ToolArgs<P> {
  return findArgumentProblem(schema, args) === undefined;
}
