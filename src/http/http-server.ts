import { Server } from 'http';
import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import morgan from 'morgan';

import { MessageHandler } from '../core/connection';
import {
  AUTHENTICATION_FAILED,
  INTERNAL_ERROR,
  INVALID_REQUEST,
  JSONRPCMessage,
  JSONRPCResponseMessage,
  PARSE_ERROR
} from '../core/mcp-types';
import {
  createErrorResponse,
  decodeMessage,
  isNotification,
  isPlainObject,
  isRequest,
  isRequestId,
  isResponseShaped
} from '../core/jsonrpc-wrapper';
import { ProtocolError, errorMessage } from '../core/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('http-server');

export const RPC_ENDPOINTS = ['/initialize', '/tools', '/resources', '/prompts', '/rpc'];

export interface HttpServerConfig {
  port?: number;
  host?: string;
  corsOrigins?: string[];
  rateLimitWindowMs?: number;
  rateLimitMax?: number;

  /**
   * When set, requests must carry it in X-API-Key or as a bearer token
   */
  apiKey?: string;
  bodyLimit?: string;
}

interface HttpReply {
  status: number;
  body?: JSONRPCResponseMessage | JSONRPCResponseMessage[];
}

/**
 * Exposes a message handler over HTTP, one POST per message or batch
 */
export class HttpServer {
  public readonly app: Application;

  private handler: MessageHandler;
  private config: HttpServerConfig;
  private server?: Server;

  constructor(handler: MessageHandler, config: HttpServerConfig = {}) {
    this.handler = handler;
    this.config = {
      port: 3000,
      corsOrigins: ['*'],
      rateLimitWindowMs: 15 * 60 * 1000, // 15 minutes
      rateLimitMax: 1000,
      bodyLimit: '50mb',
      ...config
    };
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(
      cors({
        origin: this.config.corsOrigins,
        credentials: true
      })
    );

    this.app.use(
      morgan('combined', {
        stream: { write: (line: string) => log.debug(line.trim()) }
      })
    );

    this.app.use(
      rateLimit({
        windowMs: this.config.rateLimitWindowMs,
        limit: this.config.rateLimitMax,
        standardHeaders: true,
        legacyHeaders: false,
        message: createErrorResponse(null, INVALID_REQUEST, 'Too many requests, please try again later')
      })
    );

    if (this.config.apiKey) {
      this.app.use(RPC_ENDPOINTS, this.authMiddleware.bind(this));
    }

    this.app.use(bodyParser.json({ limit: this.config.bodyLimit }));
  }

  private authMiddleware(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers['x-api-key'];
    const authorization = req.headers.authorization;
    const bearer = authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : undefined;
    const presented = typeof header === 'string' ? header : bearer;

    if (!presented || presented !== this.config.apiKey) {
      res.status(401).json(createErrorResponse(null, AUTHENTICATION_FAILED, 'Invalid or missing API key'));
      return;
    }
    next();
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.post(RPC_ENDPOINTS, (req, res, next) => {
      this.handleBody(req.body)
        .then((reply) => {
          if (reply.body === undefined) {
            res.status(reply.status).end();
          } else {
            res.status(reply.status).json(reply.body);
          }
        })
        .catch(next);
    });

    this.app.use((req, res) => {
      res.status(404).json({
        error: 'Not Found',
        message: `Route ${req.method} ${req.path} not found`
      });
    });

    this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const type = isPlainObject(err) ? err.type : undefined;
      if (type === 'entity.parse.failed') {
        res.status(400).json(createErrorResponse(null, PARSE_ERROR, 'Parse error'));
        return;
      }
      if (type === 'entity.too.large') {
        res.status(413).json(createErrorResponse(null, INVALID_REQUEST, 'Request body too large'));
        return;
      }
      log.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
      res.status(500).json(createErrorResponse(null, INTERNAL_ERROR, errorMessage(err) || 'Internal error'));
    });
  }

  /**
   * Processes a request body: one message or a batch
   */
  public async handleBody(body: unknown): Promise<HttpReply> {
    if (Array.isArray(body)) {
      if (body.length === 0) {
        return { status: 400, body: createErrorResponse(null, INVALID_REQUEST, 'Empty batch') };
      }
      const replies = await Promise.all(body.map((item: unknown) => this.handleItem(item)));
      const responses = replies.filter((reply): reply is JSONRPCResponseMessage => reply !== undefined);
      return responses.length > 0 ? { status: 200, body: responses } : { status: 204 };
    }

    const response = await this.handleItem(body);
    return response ? { status: 200, body: response } : { status: 204 };
  }

  private async handleItem(value: unknown): Promise<JSONRPCResponseMessage | undefined> {
    if (isResponseShaped(value)) {
      log.debug('Ignoring response posted to the server');
      return undefined;
    }

    let message: JSONRPCMessage;
    try {
      message = decodeMessage(value);
    } catch (error) {
      const id = isPlainObject(value) && isRequestId(value.id) ? value.id : null;
      const code = error instanceof ProtocolError ? error.code : INVALID_REQUEST;
      return createErrorResponse(id, code, errorMessage(error));
    }

    if (isNotification(message)) {
      await this.handler.handleNotification(message);
      return undefined;
    }
    if (!isRequest(message)) {
      return undefined;
    }

    try {
      return await this.handler.handleRequest(message);
    } catch (error) {
      log.error(`Error handling request ${message.method}: ${errorMessage(error)}`);
      return createErrorResponse(message.id, INTERNAL_ERROR, errorMessage(error) || 'Internal error');
    }
  }

  /**
   * Starts listening. Resolves with the bound port.
   */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port ?? 0, this.config.host ?? '127.0.0.1', () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : 0;
        log.info(`HTTP server listening on port ${port}`);
        resolve(port);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = undefined;
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
