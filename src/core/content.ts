import {
  Annotations,
  BlobContent,
  ContentItem,
  ImageContent,
  PromptMessage,
  Role,
  TextContent
} from './mcp-types';
import { isPlainObject } from './jsonrpc-wrapper';

/**
 * Creates a text content item
 */
export function createTextContent(text: string, annotations?: Annotations): TextContent {
  const item: TextContent = { type: 'text', text };
  if (annotations) {
    item.annotations = annotations;
  }
  return item;
}

/**
 * Creates an image content item from base64 data
 */
export function createImageContent(data: string, mimeType = 'image/png', annotations?: Annotations): ImageContent {
  const item: ImageContent = { type: 'image', data, mimeType };
  if (annotations) {
    item.annotations = annotations;
  }
  return item;
}

/**
 * Creates a blob content item from base64 data
 */
export function createBlobContent(data: string, mimeType: string, annotations?: Annotations): BlobContent {
  const item: BlobContent = { type: 'blob', data, mimeType };
  if (annotations) {
    item.annotations = annotations;
  }
  return item;
}

export function isContentItem(value: unknown): value is ContentItem {
  if (!isPlainObject(value)) {
    return false;
  }
  switch (value.type) {
    case 'text':
      return typeof value.text === 'string';
    case 'image':
    case 'blob':
      return typeof value.data === 'string' && typeof value.mimeType === 'string';
    default:
      return false;
  }
}

/**
 * Converts whatever a handler returned into a list of content items.
 *
 * Content items (single or listed) pass through, strings become one text item,
 * `undefined` becomes an empty list and everything else is rendered as text.
 */
export function normalizeContent(value: unknown): ContentItem[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === 'string') {
    return [createTextContent(value)];
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return [createTextContent(String(value))];
  }
  if (isContentItem(value)) {
    return [value];
  }
  if (Array.isArray(value) && value.every(isContentItem)) {
    return value;
  }
  return [createTextContent(stringify(value))];
}

function isRole(value: unknown): value is Role {
  return value === 'user' || value === 'assistant';
}

function isPromptMessage(value: unknown): value is PromptMessage {
  return isPlainObject(value) && isRole(value.role) && isContentItem(value.content);
}

/**
 * Converts a prompt handler's return value into role/content messages.
 * Strings become a single user message; `{role, content: string}` entries are accepted too.
 */
export function normalizePromptMessages(value: unknown): PromptMessage[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (typeof value === 'string') {
    return [{ role: 'user', content: createTextContent(value) }];
  }

  const entries: unknown[] = Array.isArray(value) ? value : [value];
  return entries.map((entry): PromptMessage => {
    if (isPromptMessage(entry)) {
      return entry;
    }
    if (typeof entry === 'string') {
      return { role: 'user', content: createTextContent(entry) };
    }
    if (isPlainObject(entry) && isRole(entry.role)) {
      const [content] = normalizeContent(entry.content);
      return { role: entry.role, content: content ?? createTextContent('') };
    }
    return { role: 'user', content: createTextContent(stringify(entry)) };
  });
}

function stringify(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch (error) {
    // Cyclic structures and the like
    return String(value);
  }
}
