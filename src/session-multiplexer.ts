/**
 * Session multiplexer
 *
 * An MCP server instance can only be connected to one transport. When the
 * upstream exports a single instance instead of a factory, it is connected
 * once to this multiplexer, and each HTTP session transport is attached to
 * it. Request ids from clients are rewritten on the way in so two sessions
 * that both send `id: 1` never collide, and restored on the way out.
 */

import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { isJSONRPCRequest, type JSONRPCMessage, type RequestId } from "@modelcontextprotocol/sdk/types.js";

type MessageExtra = Parameters<NonNullable<Transport["onmessage"]>>[1];
type SendOptions = Parameters<Transport["send"]>[1];

interface PendingRequest {
  session: Transport;
  id: RequestId;
}

function responseId(message: JSONRPCMessage): RequestId | undefined {
  if (isJSONRPCRequest(message) || !("id" in message)) return undefined;
  const { id } = message;
  return typeof id === "string" || typeof id === "number" ? id : undefined;
}

export class SessionMultiplexer implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: Transport["onmessage"];

  private nextId = 0;
  private readonly sessions = new Set<Transport>();
  private readonly pending = new Map<RequestId, PendingRequest>();
  private lastActive?: Transport;

  async start(): Promise<void> {}

  async close(): Promise<void> {
    this.sessions.clear();
    this.pending.clear();
    this.lastActive = undefined;
    this.onclose?.();
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Route a session's incoming messages to the shared server. */
  async attach(session: Transport): Promise<void> {
    session.onmessage = (message: JSONRPCMessage, extra?: MessageExtra) => {
      this.receive(session, message, extra);
    };
    this.sessions.add(session);
    await session.start();
  }

  detach(session: Transport): void {
    this.sessions.delete(session);
    for (const [id, request] of this.pending) {
      if (request.session === session) this.pending.delete(id);
    }
    if (this.lastActive === session) this.lastActive = undefined;
  }

  private receive(session: Transport, message: JSONRPCMessage, extra?: MessageExtra): void {
    this.lastActive = session;
    if (isJSONRPCRequest(message)) {
      const id = `session-${++this.nextId}`;
      this.pending.set(id, { session, id: message.id });
      this.onmessage?.({ ...message, id }, extra);
      return;
    }
    this.onmessage?.(message, extra);
  }

  async send(message: JSONRPCMessage, options?: SendOptions): Promise<void> {
    const id = responseId(message);
    const route = id === undefined ? undefined : this.pending.get(id);
    if (id !== undefined) {
      // A response for a session that has gone away is dropped.
      if (route) {
        this.pending.delete(id);
        await route.session.send({ ...message, id: route.id }, options);
      }
      return;
    }

    const relatedId = options?.relatedRequestId;
    const related = relatedId === undefined ? undefined : this.pending.get(relatedId);
    if (related) {
      await related.session.send(message, { ...options, relatedRequestId: related.id });
      return;
    }

    // Server-initiated requests go to the session that spoke last;
    // unrelated notifications go to every session.
    if (isJSONRPCRequest(message)) {
      await this.lastActive?.send(message, options);
      return;
    }
    await Promise.all([...this.sessions].map((session) => session.send(message, options)));
  }
}
