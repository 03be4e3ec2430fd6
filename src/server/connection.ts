import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { Mutex } from "../agents/mutex.js";
import type { RequestCoordinator } from "../conversation/coordinator.js";
import { parseClientMessage, type OutboundChannel, type ServerMessage, type SessionInfoMessage } from "./messages.js";

const OPEN = 1;

/** The parts of a ws WebSocket a connection uses. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export class SocketChannel implements OutboundChannel {
  constructor(
    private readonly socket: ClientSocket,
    private readonly logger: Logger,
  ) {}

  send(message: ServerMessage): void {
    if (this.socket.readyState !== OPEN) {
      this.logger.debug({ type: message.type }, "Socket not open, dropping message");
      return;
    }
    this.socket.send(JSON.stringify(message));
  }
}

export interface ConversationSession {
  readonly coordinator: RequestCoordinator;
  readonly info: SessionInfoMessage;
}

/** Builds the agent client and coordinator behind one connection. */
export type SessionFactory = (conversationId: string, channel: OutboundChannel) => ConversationSession;

export const conversationIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/);

export function generateConversationId(): string {
  return randomUUID().replace(/-/g, "").slice(0, 5);
}

/** One browser connection bound to one conversation. */
export class ClientConnection {
  private readonly inbound = new Mutex();
  private closing: Promise<void> | null = null;

  constructor(
    readonly conversationId: string,
    private readonly channel: OutboundChannel,
    private readonly session: ConversationSession,
    private readonly logger: Logger,
  ) {}

  start(): void {
    this.channel.send(this.session.info);
  }

  /** Handles one text frame. Frames are processed in arrival order. */
  handleFrame(data: string): Promise<void> {
    return this.inbound.runExclusive(async () => {
      if (this.closing) return;

      const parsed = parseClientMessage(data);
      if (!parsed.ok) {
        this.logger.warn({ error: parsed.error }, "Rejected client message");
        this.channel.send({ type: "error", message: parsed.error });
        return;
      }

      const { message } = parsed;
      switch (message.type) {
        case "user_message":
          await this.session.coordinator.handleUserMessage(message.content);
          return;
        case "interrupt":
          await this.session.coordinator.handleInterrupt(message.reason);
          return;
        case "config_update":
          // Launch settings are fixed per process; the update is acknowledged only
          this.logger.info({ keys: Object.keys(message.config) }, "Config update received");
          this.channel.send({ type: "config_updated", success: true });
          return;
      }
    });
  }

  close(): Promise<void> {
    this.closing ??= this.session.coordinator.dispose();
    return this.closing;
  }
}

export class ConnectionManager {
  private readonly connections = new Set<ClientConnection>();
  private readonly logger: Logger;

  constructor(
    private readonly createSession: SessionFactory,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "connections" });
  }

  get activeConnections(): number {
    return this.connections.size;
  }

  isConnected(conversationId: string): boolean {
    for (const connection of this.connections) {
      if (connection.conversationId === conversationId) return true;
    }
    return false;
  }

  /** Binds a socket to a conversation, or closes it when the id is unusable. */
  accept(socket: ClientSocket, requestedId: string | null): ClientConnection | null {
    const conversationId = requestedId ?? generateConversationId();
    if (!conversationIdSchema.safeParse(conversationId).success) {
      this.logger.warn({ conversationId }, "Rejected connection with invalid conversation id");
      socket.close(1008, "Invalid conversation id");
      return null;
    }

    const logger = this.logger.child({ conversationId });
    const channel = new SocketChannel(socket, logger);
    const connection = new ClientConnection(conversationId, channel, this.createSession(conversationId, channel), logger);
    this.connections.add(connection);
    connection.start();

    logger.info({ activeConnections: this.connections.size }, "Client connected");
    return connection;
  }

  async release(connection: ClientConnection): Promise<void> {
    if (!this.connections.delete(connection)) return;
    await connection.close();
    this.logger.info(
      { conversationId: connection.conversationId, activeConnections: this.connections.size },
      "Client disconnected",
    );
  }

  async closeAll(): Promise<void> {
    await Promise.allSettled([...this.connections].map((connection) => this.release(connection)));
  }
}
