import {
  JSONRPCNotification,
  JSONRPCRequest,
  JSONRPCResponseMessage,
  METHOD_NOT_FOUND,
  Params,
  Result
} from '../core/mcp-types';
import { createErrorResponse, createSuccessResponse } from '../core/jsonrpc-wrapper';
import { errorMessage, toErrorObject } from '../core/errors';
import { Logger } from '../utils/logger';

export type RequestRoute = (params: Params, request: JSONRPCRequest) => Promise<Result> | Result;
export type NotificationRoute = (params: Params, notification: JSONRPCNotification) => Promise<void> | void;

/**
 * Maps method names to handlers and turns their outcome into responses
 */
export class MethodRouter {
  private requestRoutes: Map<string, RequestRoute> = new Map();
  private notificationRoutes: Map<string, NotificationRoute> = new Map();
  private log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  /**
   * Registers a request handler for one or more method names
   */
  public onRequest(methods: string | string[], route: RequestRoute): this {
    for (const method of Array.isArray(methods) ? methods : [methods]) {
      this.requestRoutes.set(method, route);
    }
    return this;
  }

  /**
   * Registers a notification handler for one or more method names
   */
  public onNotification(methods: string | string[], route: NotificationRoute): this {
    for (const method of Array.isArray(methods) ? methods : [methods]) {
      this.notificationRoutes.set(method, route);
    }
    return this;
  }

  /**
   * Runs the handler for a request. Never throws: failures become error responses.
   */
  public async dispatchRequest(request: JSONRPCRequest): Promise<JSONRPCResponseMessage> {
    this.log.debug(`Received request: ${request.method}`);

    const route = this.requestRoutes.get(request.method);
    if (!route) {
      return createErrorResponse(request.id, METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }

    try {
      const result = await route(request.params ?? {}, request);
      return createSuccessResponse(request.id, result);
    } catch (error) {
      const errorObject = toErrorObject(error);
      this.log.error(`Error handling request ${request.method}: ${errorMessage(error)}`);
      return createErrorResponse(request.id, errorObject.code, errorObject.message, errorObject.data);
    }
  }

  /**
   * Runs the handler for a notification. Unknown methods and handler failures are logged.
   */
  public async dispatchNotification(notification: JSONRPCNotification): Promise<void> {
    this.log.debug(`Received notification: ${notification.method}`);

    const route = this.notificationRoutes.get(notification.method);
    if (!route) {
      this.log.warn(`No handler registered for notification: ${notification.method}`);
      return;
    }

    try {
      await route(notification.params ?? {}, notification);
    } catch (error) {
      this.log.error(`Error handling notification ${notification.method}: ${errorMessage(error)}`);
    }
  }
}
