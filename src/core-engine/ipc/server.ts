import {Type} from "@sinclair/typebox";
import {Value} from "@sinclair/typebox/value";
import Container from "typedi";
import {WebSocket, WebSocketServer} from "ws";
import {describeError} from "../../errors";
import {OutputChannelService} from "../../output-channel.service";
import type {IPCEnvelope, IPCMessageType} from "../../shared-types";

const IncomingEnvelopeSchema = Type.Object({
  type: Type.String(),
  payload: Type.Optional(Type.Unknown()),
});

export type MessageHandler = (payload: unknown, ws: WebSocket | null) => void;

export interface BroadcastOptions {
  /** Envelopes with a cache key are replayed to clients that connect later; a newer one replaces an older one */
  cacheKey?: string;
}

/**
 * EventServer — Streams pipeline progress to WebSocket clients
 * and accepts control messages (`cancel-run`).
 */
export class EventServer {
  private wss: WebSocketServer | null = null;
  private clients = new Set<WebSocket>();
  private messageSequence = 0;
  private handlers = new Map<IPCMessageType, MessageHandler>();
  private stateCache = new Map<string, IPCEnvelope>();
  private readonly output = Container.get(OutputChannelService);

  /**
   * Register a handler for a specific message type.
   */
  onMessage(type: IPCMessageType, handler: MessageHandler): void {
    this.handlers.set(type, handler);
  }

  /**
   * Start listening on a dynamic (0) or specific port; resolves with the bound port.
   */
  start(port = 0, host = "127.0.0.1"): Promise<number> {
    const wss = new WebSocketServer({port, host});
    this.wss = wss;

    wss.on("connection", (ws) => {
      this.clients.add(ws);

      // Replay last known state (run, job statuses, results)
      for (const lastEnvelope of this.stateCache.values()) {
        ws.send(JSON.stringify(lastEnvelope));
      }

      ws.on("close", () => {
        this.clients.delete(ws);
      });

      ws.on("message", (data) => {
        this.dispatch(data.toString(), ws);
      });
    });

    return new Promise<number>((resolve, reject) => {
      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        const address = wss.address();
        resolve(typeof address === "string" ? Number.parseInt(address.split(":").pop() ?? "0", 10) : address.port);
      });
    });
  }

  /**
   * Broadcast a message to all connected clients.
   */
  broadcast<T>(type: IPCMessageType, payload: T, options: BroadcastOptions = {}): IPCEnvelope<T> {
    const envelope: IPCEnvelope<T> = {
      id: `${Date.now()}-${this.messageSequence + 1}`,
      seq: ++this.messageSequence,
      type,
      payload,
      timestamp: Date.now(),
    };

    if (options.cacheKey) {
      this.stateCache.set(options.cacheKey, envelope);
    }

    const data = JSON.stringify(envelope);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(data);
      }
    }
    return envelope;
  }

  /** Envelopes a client connecting now would receive first. */
  get replay(): IPCEnvelope[] {
    return Array.from(this.stateCache.values());
  }

  /**
   * Route one raw incoming message to its handler. Returns false when the
   * message was malformed or had no handler.
   */
  dispatch(data: string, ws: WebSocket | null = null): boolean {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      this.output.warn(`[EventServer] Ignoring unparseable message: ${describeError(error)}`);
      return false;
    }
    if (!Value.Check(IncomingEnvelopeSchema, parsed)) {
      this.output.warn("[EventServer] Ignoring message without a type");
      return false;
    }

    const handler = Array.from(this.handlers).find(([type]) => type === parsed.type)?.[1];
    if (!handler) {
      this.output.warn(`[EventServer] No handler registered for type: ${parsed.type}`);
      return false;
    }
    handler(parsed.payload, ws);
    return true;
  }

  /**
   * Stop the server and disconnect all clients.
   */
  stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    for (const client of this.clients) {
      client.terminate();
    }
    this.clients.clear();
    if (!wss) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
