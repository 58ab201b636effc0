import { LOCAL_CLIENT_ID } from "../config/constants.js";
import type { ClientMessage, ServerMessage } from "../shared/protocol.js";
import type { IClientTransport, IServerTransport } from "./Transport.js";

/**
 * In-memory transport. Every send is delivered synchronously to the other
 * side, so a client and server stepped in the same process see each other's
 * messages within the same tick.
 */
export class LocalTransport {
  readonly serverSide: IServerTransport;

  private serverMessageHandler: ((clientId: string, msg: ClientMessage) => void) | null = null;
  private connectHandler: ((clientId: string) => void) | null = null;
  private disconnectHandler: ((clientId: string) => void) | null = null;
  private clientHandlers = new Map<string, ((msg: ServerMessage) => void) | null>();
  private closed = false;

  constructor() {
    const self = this;

    this.serverSide = {
      send(clientId: string, msg: ServerMessage): void {
        if (self.closed) return;
        self.clientHandlers.get(clientId)?.(msg);
      },
      broadcast(msg: ServerMessage): void {
        if (self.closed) return;
        for (const handler of self.clientHandlers.values()) handler?.(msg);
      },
      onMessage(handler: (clientId: string, msg: ClientMessage) => void): void {
        self.serverMessageHandler = handler;
      },
      onConnect(handler: (clientId: string) => void): void {
        self.connectHandler = handler;
      },
      onDisconnect(handler: (clientId: string) => void): void {
        self.disconnectHandler = handler;
      },
      close(): void {
        self.closed = true;
      },
    };
  }

  /**
   * Create the client end for `clientId` and fire the server's connect
   * handler. Call after the server has registered its handlers.
   */
  connect(clientId = LOCAL_CLIENT_ID): IClientTransport {
    if (this.clientHandlers.has(clientId)) {
      throw new Error(`LocalTransport: client ${clientId} already connected`);
    }
    this.clientHandlers.set(clientId, null);
    const self = this;

    const clientSide: IClientTransport = {
      send(msg: ClientMessage): void {
        if (self.closed || !self.clientHandlers.has(clientId)) return;
        self.serverMessageHandler?.(clientId, msg);
      },
      onMessage(handler: (msg: ServerMessage) => void): void {
        if (!self.clientHandlers.has(clientId)) return;
        self.clientHandlers.set(clientId, handler);
      },
      close(): void {
        self.disconnect(clientId);
      },
      getDebugInfo() {
        return { transport: "Local in-memory" };
      },
    };

    this.connectHandler?.(clientId);
    return clientSide;
  }

  /** Simulate `clientId` dropping its connection. */
  disconnect(clientId: string): void {
    if (!this.clientHandlers.delete(clientId)) return;
    this.disconnectHandler?.(clientId);
  }

  get connectedClients(): string[] {
    return [...this.clientHandlers.keys()];
  }
}
