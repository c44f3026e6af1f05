/**
 * WebSocket Server
 * Accepts drone and application connections over socket.io and hands each one
 * to a ClientSession
 */

import { randomUUID } from 'node:crypto';
import { Server as HTTPServer } from 'http';
import { Server as SocketIOServer, Socket } from 'socket.io';
import { HandshakeSchema } from '../types/schemas';
import type { Role } from '../types';
import { ClientSession } from './clientSession';
import type { ConnectionRegistry } from './connectionRegistry';
import type { MessageRouter } from './messageRouter';
import { serialize } from './serializer';
import { MESSAGE_EVENT, SocketChannel } from './socketChannel';
import type { TaskDispatcher } from './taskDispatcher';

export interface WebSocketServerOptions {
  registry: ConnectionRegistry;
  router: MessageRouter;
  dispatcher: TaskDispatcher;
  path: string;
  corsOrigin: string;
}

export interface Handshake {
  role: Role;
  clientId: string;
}

function firstValue(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Role and client id from the socket.io handshake. `auth` wins over the query string.
 * Returns a reason string when the handshake is not acceptable.
 */
export function readHandshake(auth: Record<string, unknown>, query: Record<string, unknown>): Handshake | string {
  const parsed = HandshakeSchema.safeParse({
    role: firstValue(auth.role ?? query.role),
    client_id: firstValue(auth.client_id ?? query.client_id),
  });
  if (!parsed.success) {
    return parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  }
  return { role: parsed.data.role, clientId: parsed.data.client_id ?? randomUUID() };
}

export class WebSocketServer {
  private io: SocketIOServer | null = null;
  private readonly sessions: Map<string, ClientSession> = new Map();
  private readonly options: WebSocketServerOptions;

  constructor(options: WebSocketServerOptions) {
    this.options = options;
  }

  /**
   * Attach socket.io to the HTTP server
   */
  initialize(httpServer: HTTPServer): void {
    console.log('[WebSocket] Initializing WebSocket server...');

    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: this.options.corsOrigin,
        methods: ['GET', 'POST'],
      },
      path: this.options.path,
      transports: ['websocket', 'polling'],
    });

    this.io.on('connection', (socket: Socket) => {
      this.handleClientConnection(socket);
    });

    console.log(`✓ WebSocket server initialized at ${this.options.path}`);
  }

  private handleClientConnection(socket: Socket): void {
    const handshake = readHandshake(socket.handshake.auth, socket.handshake.query);
    if (typeof handshake === 'string') {
      console.warn(`[WebSocket] Rejected connection ${socket.id}: ${handshake}`);
      socket.emit(
        MESSAGE_EVENT,
        serialize({
          type: 'error',
          code: 'invalid_handshake',
          message: `Invalid handshake: ${handshake}`,
          ref: null,
          timestamp: new Date().toISOString(),
        })
      );
      socket.disconnect(true);
      return;
    }

    const { role, clientId } = handshake;
    console.log(`[WebSocket] ${role} connected: ${clientId} (socket ${socket.id})`);

    const session = new ClientSession({
      role,
      clientId,
      channel: new SocketChannel(socket),
      registry: this.options.registry,
      router: this.options.router,
      dispatcher: this.options.dispatcher,
    });
    this.sessions.set(socket.id, session);

    socket.on(MESSAGE_EVENT, (raw: unknown) => {
      session.receive(raw).catch((error: unknown) => {
        console.error(`[WebSocket] Message handling failed for ${role} ${clientId}:`, error);
      });
    });

    socket.on('disconnect', (reason) => {
      console.log(`[WebSocket] ${role} disconnected: ${clientId} (${reason})`);
      this.sessions.delete(socket.id);
      session.close();
    });

    socket.on('error', (error) => {
      console.error(`[WebSocket] Error for ${role} ${clientId}:`, error);
    });

    session.open().catch((error: unknown) => {
      console.error(`[WebSocket] Failed to open session for ${role} ${clientId}:`, error);
    });
  }

  getConnectedClientsCount(): number {
    return this.sessions.size;
  }

  /**
   * Graceful shutdown
   */
  async shutdown(): Promise<void> {
    console.log('[WebSocket] Shutting down...');

    if (this.io) {
      this.io.emit('server:shutdown', {
        message: 'Server is shutting down',
        timestamp: new Date().toISOString(),
      });

      this.options.registry.closeAll('Server shutting down');
      await this.io.close();
      this.sessions.clear();
      this.io = null;
      console.log('✓ WebSocket server shut down');
    }
  }
}
