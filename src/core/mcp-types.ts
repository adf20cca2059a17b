/**
 * Core MCP types based on the Model Context Protocol specification
 * Adapted from modelcontextprotocol/schema/2025-03-26/schema.ts
 */

/* JSON-RPC types */

export const JSONRPC_VERSION = '2.0';
export const LATEST_PROTOCOL_VERSION = '2025-03-26';

/**
 * Versions accepted without legacy mode.
 */
export const SUPPORTED_PROTOCOL_VERSIONS: readonly string[] = [LATEST_PROTOCOL_VERSION];

/**
 * The prior revision, accepted only when legacy mode is enabled.
 */
export const LEGACY_PROTOCOL_VERSION = '2024-11-05';

/**
 * A uniquely identifying ID for a request in JSON-RPC.
 */
export type RequestId = string | number;

/**
 * An opaque token used to represent a cursor for pagination.
 */
export type Cursor = string;

export type Params = Record<string, unknown>;

export interface Result {
  /**
   * This result property is reserved by the protocol to allow clients and servers to attach additional metadata to their responses.
   */
  _meta?: { [key: string]: unknown };
  [key: string]: unknown;
}

/**
 * A request that expects a response.
 */
export interface JSONRPCRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  method: string;
  params?: Params;
}

/**
 * A notification which does not expect a response. It never carries an `id` key.
 */
export interface JSONRPCNotification {
  jsonrpc: typeof JSONRPC_VERSION;
  id?: never;
  method: string;
  params?: Params;
}

export interface JSONRPCErrorObject {
  /**
   * The error type that occurred.
   */
  code: number;
  /**
   * A short description of the error. The message SHOULD be limited to a concise single sentence.
   */
  message: string;
  data?: unknown;
}

/**
 * A successful (non-error) response to a request.
 */
export interface JSONRPCResponse {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  result: Result;
}

/**
 * A response to a request that indicates an error occurred.
 */
export interface JSONRPCError {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId | null;
  error: JSONRPCErrorObject;
}

export type JSONRPCResponseMessage = JSONRPCResponse | JSONRPCError;

/**
 * Refers to any valid JSON-RPC object that can be decoded off the wire, or encoded to be sent.
 */
export type JSONRPCMessage = JSONRPCRequest | JSONRPCNotification | JSONRPCResponseMessage;

// Standard JSON-RPC error codes
export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;

// Protocol specific error codes
export const INITIALIZATION_FAILED = -32000;
export const CAPABILITY_NOT_SUPPORTED = -32001;
export const TOOL_NOT_FOUND = -32002;
export const RESOURCE_NOT_FOUND = -32003;
export const PROMPT_NOT_FOUND = -32004;
export const AUTHENTICATION_FAILED = -32005;
export const AUTHORIZATION_FAILED = -32006;

/* Connection lifecycle */

export const ConnectionState = {
  DISCONNECTED: 'disconnected',
  CONNECTING: 'connecting',
  INITIALIZING: 'initializing',
  OPERATING: 'operating',
  SHUTTING_DOWN: 'shutting_down',
  ERROR: 'error'
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

/* Initialization */

/**
 * Describes the name and version of an MCP implementation.
 */
export interface Implementation {
  name: string;
  version: string;
}

/**
 * Sub-options of a capability. Presence of the capability is what matters, not its contents.
 */
export type CapabilityOptions = { [key: string]: unknown };

/**
 * Capabilities either peer may declare. Each entry is present or absent.
 */
export interface Capabilities {
  tools?: CapabilityOptions;
  resources?: CapabilityOptions;
  prompts?: CapabilityOptions;
  roots?: CapabilityOptions;
  sampling?: CapabilityOptions;
}

export const CAPABILITY_KEYS = ['tools', 'resources', 'prompts', 'roots', 'sampling'] as const;

export type CapabilityKey = (typeof CAPABILITY_KEYS)[number];

export interface InitializeParams extends Params {
  /**
   * The latest version of the Model Context Protocol that the client supports.
   */
  protocolVersion: string;
  capabilities: Capabilities;
  clientInfo: Implementation;
}

/**
 * After receiving an initialize request from the client, the server sends this response.
 */
export interface InitializeResult extends Result {
  /**
   * The version of the Model Context Protocol that the server wants to use. If the client cannot support this version, it MUST disconnect.
   */
  protocolVersion: string;
  capabilities: Capabilities;
  serverInfo: Implementation;

  /**
   * Instructions describing how to use the server and its features.
   */
  instructions?: string;
}

/* Content */

/**
 * The sender or recipient of messages and data in a conversation.
 */
export type Role = 'user' | 'assistant';

/**
 * Optional annotations for the client. The client can use annotations to inform how objects are used or displayed
 */
export interface Annotations {
  audience?: Role[];

  /**
   * 1 means "most important", 0 means "least important".
   */
  priority?: number;
}

/**
 * Text provided to or from an LLM.
 */
export interface TextContent {
  type: 'text';
  text: string;
  annotations?: Annotations;
}

/**
 * An image provided to or from an LLM.
 */
export interface ImageContent {
  type: 'image';

  /**
   * The base64-encoded image data.
   */
  data: string;
  mimeType: string;
  annotations?: Annotations;
}

/**
 * Arbitrary binary data, base64-encoded.
 */
export interface BlobContent {
  type: 'blob';
  data: string;
  mimeType: string;
  annotations?: Annotations;
}

export type ContentItem = TextContent | ImageContent | BlobContent;

/* Tools */

export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null';

export interface PropertySchema {
  type?: JsonSchemaType;
  description?: string;
  [key: string]: unknown;
}

/**
 * A JSON Schema object defining the expected parameters for the tool.
 */
export interface InputSchema {
  type: 'object';
  properties?: { [key: string]: PropertySchema };
  required?: string[];
}

/**
 * Additional properties describing a Tool to clients.
 */
export interface ToolAnnotations {
  /**
   * A human-readable title for the tool.
   */
  title?: string;

  /**
   * If true, the tool does not modify its environment.
   *
   * Default: false
   */
  readOnlyHint?: boolean;

  /**
   * If true, the tool may perform destructive updates to its environment.
   * If false, the tool performs only additive updates.
   *
   * Default: true
   */
  destructiveHint?: boolean;

  /**
   * If true, calling the tool repeatedly with the same arguments
   * will have no additional effect on the its environment.
   *
   * Default: false
   */
  idempotentHint?: boolean;

  /**
   * If true, this tool may interact with an "open world" of external
   * entities. If false, the tool's domain of interaction is closed.
   *
   * Default: true
   */
  openWorldHint?: boolean;
}

/**
 * Definition for a tool the client can call, as sent on the wire.
 */
export interface Tool {
  name: string;
  description: string;
  inputSchema: InputSchema;
  annotations?: ToolAnnotations;
}

export interface ListToolsResult extends Result {
  tools: Tool[];
  nextCursor?: Cursor;
}

/**
 * The server's response to a tool call.
 */
export interface CallToolResult extends Result {
  content: ContentItem[];

  /**
   * Whether the tool call ended in an error.
   */
  isError: boolean;
}

/* Resources */

/**
 * A known resource that the server is capable of reading.
 */
export interface Resource {
  uri: string;
  name: string;
  description: string;
  mimeType?: string;
}

export interface ResourceTemplateArgument {
  name: string;
  description?: string;
  required?: boolean;
}

/**
 * A template description for resources available on the server.
 */
export interface ResourceTemplate {
  uriTemplate: string;
  name: string;
  description: string;
  mimeType?: string;
  arguments?: ResourceTemplateArgument[];
}

export interface ListResourcesResult extends Result {
  resources: (Resource | ResourceTemplate)[];
  nextCursor?: Cursor;
}

export interface TextResourceContents {
  uri: string;
  mimeType?: string;

  /**
   * The text of the item. This must only be set if the item can actually be represented as text (not binary data).
   */
  text: string;
}

export interface BlobResourceContents {
  uri: string;
  mimeType?: string;

  /**
   * A base64-encoded string representing the binary data of the item.
   */
  blob: string;
}

export interface ReadResourceResult extends Result {
  contents: (TextResourceContents | BlobResourceContents)[];
}

/* Prompts */

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface Prompt {
  name: string;
  description: string;
  arguments?: PromptArgument[];
}

export interface PromptMessage {
  role: Role;
  content: ContentItem;
}

export interface ListPromptsResult extends Result {
  prompts: Prompt[];
  nextCursor?: Cursor;
}

export interface GetPromptResult extends Result {
  description: string;
  messages: PromptMessage[];
}
