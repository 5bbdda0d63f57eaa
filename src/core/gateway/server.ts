import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createHash, randomUUID, timingSafeEqual } from 'node:crypto';
import type { Duplex } from 'node:stream';
import { WebSocket, WebSocketServer } from 'ws';
import { z } from 'zod';
import type {
  GatewayCallContext,
  GatewayRequest,
  GatewayResponse,
  HealthStatus,
  RuntimeConfig,
  StructuredLogger
} from '../kernel/contracts.js';
import type { GatewayMethodRegistry, HttpRouteRegistry } from '../kernel/registries.js';
import { JsonValueSchema } from '../utils/json.js';
import { TaskdeckError, errorCodeFor, errorMessage } from '../../errors.js';
import type { EventBroadcaster } from './broadcaster.js';
import { json, readJsonBody, sendError } from './http.js';
import { ClientMessageSchema, isChannelName, type ChannelName, type ControlMessage } from './protocol.js';

const GatewayRequestSchema = z.object({
  method: z.string().min(1),
  params: JsonValueSchema.optional(),
  requestId: z.string().optional(),
});

const WS_PATH = /^\/ws\/([a-z]+)\/?$/;

export interface ChatSubmission {
  task_id: string;
  status: string;
}

export interface TaskdeckGatewayOptions {
  config: RuntimeConfig;
  methods: GatewayMethodRegistry;
  routes: HttpRouteRegistry;
  broadcaster: EventBroadcaster;
  logger: StructuredLogger;
  healthProvider: () => HealthStatus;
  /** Chat-channel shortcut for task submission. */
  submitChat?: (threadId: string, prompt: string) => Promise<ChatSubmission>;
}

function parseAuthorizationToken(req: IncomingMessage, url: URL): string | undefined {
  const auth = req.headers.authorization;
  if (auth) {
    if (!auth.startsWith('Bearer ')) {
      return undefined;
    }
    return auth.slice('Bearer '.length).trim();
  }
  return url.searchParams.get('token')?.trim() || undefined;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function tokensMatch(expected: string, provided: string | undefined): boolean {
  if (provided === undefined) return false;
  return timingSafeEqual(digest(expected), digest(provided));
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

/**
 * HTTP + WebSocket transport. Routes come from the plugin registries; the
 * three streaming channels are fed by the {@link EventBroadcaster}.
 */
export class TaskdeckGateway {
  private readonly server: Server;
  private readonly ws: WebSocketServer;
  private heartbeat: NodeJS.Timeout | null = null;
  private boundPort: number | null = null;

  constructor(private readonly options: TaskdeckGatewayOptions) {
    this.server = createServer((req, res) => {
      this.handleHttp(req, res).catch((error: unknown) => {
        this.options.logger.error('Unhandled gateway error', { reason: errorMessage(error) });
        if (!res.headersSent) sendError(res, error);
      });
    });
    this.ws = new WebSocketServer({ noServer: true });
    this.server.on('upgrade', (req, socket, head) => this.handleUpgrade(req, socket, head));
  }

  /** Port actually bound; differs from the configured one when that is 0. */
  get port(): number {
    return this.boundPort ?? this.options.config.gateway.port;
  }

  async start(): Promise<void> {
    const { host, port } = this.options.config.gateway;
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.server.once('error', onError);
      this.server.listen(port, host, () => {
        this.server.off('error', onError);
        resolve();
      });
    });

    const address = this.server.address();
    this.boundPort = address && typeof address === 'object' ? address.port : port;

    const heartbeatMs = this.options.config.broadcaster.heartbeatMs;
    if (heartbeatMs > 0) {
      this.heartbeat = setInterval(() => {
        this.options.broadcaster.publish('logs', 'heartbeat', {
          server_time: new Date().toISOString(),
          subscribers: this.options.broadcaster.subscriberCount(),
        });
      }, heartbeatMs);
      this.heartbeat.unref();
    }

    this.options.logger.info('Gateway started', { host, port: this.port });
  }

  async stop(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const client of this.ws.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => this.ws.close(() => resolve()));
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      this.server.closeAllConnections();
    });
    this.options.logger.info('Gateway stopped');
  }

  private isAuthorized(req: IncomingMessage, url: URL): boolean {
    const expected = this.options.config.gateway.authToken;
    if (!expected) return true;
    return tokensMatch(expected, parseAuthorizationToken(req, url));
  }

  private async executeRpc(input: GatewayRequest, authToken: string): Promise<GatewayResponse> {
    const method = this.options.methods.get(input.method);
    if (!method) {
      return {
        requestId: input.requestId,
        ok: false,
        error: { code: 'METHOD_NOT_FOUND', message: `Gateway method not found: ${input.method}` }
      };
    }

    const context: GatewayCallContext = { authToken, requestId: input.requestId };
    try {
      const result = await method.handler(input.params, context);
      return { requestId: input.requestId, ok: true, result };
    } catch (error) {
      if (!(error instanceof TaskdeckError)) {
        this.options.logger.error('RPC method failed', { method: input.method, reason: errorMessage(error) });
      }
      return {
        requestId: input.requestId,
        ok: false,
        error: {
          code: errorCodeFor(error),
          message: error instanceof TaskdeckError ? error.message : 'Internal server error'
        }
      };
    }
  }

  private async handleHttp(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!req.url || !req.method) {
      json(res, 404, { ok: false, error: { code: 'NOT_FOUND', message: 'Not found' } });
      return;
    }

    const url = new URL(req.url, `http://${req.headers.host ?? '127.0.0.1'}`);
    const pathname = url.pathname;

    if (pathname === '/health' && req.method === 'GET') {
      json(res, 200, this.options.healthProvider());
      return;
    }

    const match = this.options.routes.match(req.method, pathname);
    if (!match?.route.public && !this.isAuthorized(req, url)) {
      json(res, 401, { ok: false, error: { code: 'UNAUTHORIZED', message: 'Unauthorized' } });
      return;
    }
    const authToken = parseAuthorizationToken(req, url) ?? '';

    if (pathname === '/rpc' && req.method === 'POST') {
      try {
        const body = GatewayRequestSchema.safeParse(await readJsonBody(req));
        if (!body.success) {
          json(res, 400, { ok: false, error: { code: 'VALIDATION_ERROR', message: 'Expected {method, params?, requestId?}' } });
          return;
        }
        const response = await this.executeRpc(
          {
            method: body.data.method,
            params: body.data.params ?? null,
            requestId: body.data.requestId ?? randomUUID(),
          },
          authToken
        );
        json(res, response.ok ? 200 : 400, response);
      } catch (error) {
        sendError(res, error);
      }
      return;
    }

    if (!match) {
      const allowed = this.options.routes.allowedMethods(pathname);
      if (allowed.length > 0) {
        res.setHeader('allow', allowed.join(', '));
        json(res, 405, { ok: false, error: { code: 'METHOD_NOT_ALLOWED', message: `Method ${req.method} not allowed` } });
        return;
      }
      json(res, 404, { ok: false, error: { code: 'NOT_FOUND', message: 'Not found' } });
      return;
    }

    try {
      await match.route.handler(req, res, {
        authToken,
        requestId: randomUUID(),
        params: match.params,
        query: url.searchParams,
      });
    } catch (error) {
      if (!(error instanceof TaskdeckError)) {
        this.options.logger.error('Route handler failed', {
          method: req.method,
          path: match.route.path,
          reason: errorMessage(error)
        });
      }
      sendError(res, error);
    }
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? '127.0.0.1'}`);
    const channel = WS_PATH.exec(url.pathname)?.[1];
    if (!channel || !isChannelName(channel)) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }
    if (!this.isAuthorized(req, url)) {
      rejectUpgrade(socket, 401, 'Unauthorized');
      return;
    }

    this.ws.handleUpgrade(req, socket, head, (webSocket) => {
      this.attach(webSocket, channel);
    });
  }

  private attach(socket: WebSocket, channel: ChannelName): void {
    const subscriberId = randomUUID();
    const unsubscribe = this.options.broadcaster.subscribe(channel, {
      id: subscriberId,
      isOpen: () => socket.readyState === WebSocket.OPEN,
      send: (data) => socket.send(data),
    });

    const reply = (message: ControlMessage): void => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    };

    socket.on('close', unsubscribe);
    socket.on('error', (error) => {
      this.options.logger.debug('WebSocket error', { channel, subscriber: subscriberId, reason: error.message });
    });
    socket.on('message', (raw) => {
      this.handleClientMessage(channel, String(raw), reply).catch((error: unknown) => {
        reply({ type: 'error', code: errorCodeFor(error), message: errorMessage(error) });
      });
    });

    reply({ type: 'hello', channel, server_time: new Date().toISOString() });
    this.options.logger.debug('Channel subscriber connected', { channel, subscriber: subscriberId });
  }

  private async handleClientMessage(
    channel: ChannelName,
    raw: string,
    reply: (message: ControlMessage) => void
  ): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      reply({ type: 'error', code: 'VALIDATION_ERROR', message: 'Message must be valid JSON' });
      return;
    }

    const message = ClientMessageSchema.safeParse(parsed);
    if (!message.success) {
      reply({ type: 'error', code: 'VALIDATION_ERROR', message: 'Unsupported message' });
      return;
    }

    if (message.data.type === 'ping') {
      reply({ type: 'pong', ts: message.data.ts ?? Date.now() });
      return;
    }

    if (channel !== 'chat' || !this.options.submitChat) {
      reply({ type: 'error', code: 'VALIDATION_ERROR', message: `Chat messages are not accepted on ${channel}` });
      return;
    }

    try {
      const submitted = await this.options.submitChat(message.data.thread_id, message.data.prompt);
      reply({ type: 'task_submitted', task_id: submitted.task_id, status: submitted.status });
    } catch (error) {
      reply({
        type: 'error',
        code: errorCodeFor(error),
        message: error instanceof TaskdeckError ? error.message : 'Internal server error'
      });
    }
  }
}
