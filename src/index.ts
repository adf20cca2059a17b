export * from './core/mcp-types';
export * from './core/errors';
export * from './core/jsonrpc-wrapper';
export * from './core/content';
export * from './core/protocol';
export * from './core/connection';

export * from './transport/message-queue';
export * from './transport/line-framer';
export * from './transport/stdio-transport';
export * from './transport/server-stdio-transport';
export * from './transport/http-transport';
export * from './transport/websocket-transport';

export * from './router/method-router';

export * from './server/parameters';
export * from './server/registry';
export * from './server/server-handler';
export * from './server/mcp-server';

export * from './http/http-server';

export * from './client/mcp-client';
export { ServerManager, ServerRunner } from './client/server-manager';
export type { ServerManagerOptions } from './client/server-manager';

export * from './config/config';
export { createLogger, getLogLevel, setLogLevel, setLogSink } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';
