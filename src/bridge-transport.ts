/**
 * WebSocket client for the chat-network bridge.
 *
 * The bridge owns the actual messaging session; this side only speaks its
 * JSON frame protocol: inbound messages and operator replies in, text
 * replies out.
 */

import WebSocket from 'ws';
import { z } from 'zod';

import { BRIDGE_URL } from './config.js';
import { errorMessage } from './errors.js';
import type { EventBus } from './events.js';
import { logger, preview } from './logger.js';
import type { Attachment, InboundMessage } from './types.js';

const MediaSchema = z.object({
  mimetype: z.string(),
  filename: z.string().nullish(),
});

const IncomingSchema = z.object({
  id: z.string(),
  from: z.string(),
  body: z.string().default(''),
  timestamp: z.number(), // seconds
  hasMedia: z.boolean().default(false),
  isGroup: z.boolean().default(false),
  audio: MediaSchema.nullish(),
  image: MediaSchema.nullish(),
  document: MediaSchema.nullish(),
});

export const BridgeFrameSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('incoming_message'), message: IncomingSchema }),
  z.object({ type: z.literal('manual_reply'), contact: z.string() }),
  z.object({ type: z.literal('status'), status: z.string(), reason: z.string().nullish() }),
  z.object({
    type: z.literal('message_sent'),
    to: z.string().nullish(),
    success: z.boolean(),
    error: z.string().nullish(),
  }),
  z.object({ type: z.literal('error'), error: z.string() }),
  z.object({ type: z.literal('qr_code') }),
]);

export type BridgeFrame = z.infer<typeof BridgeFrameSchema>;
export type IncomingBridgeMessage = z.infer<typeof IncomingSchema>;

export function parseBridgeFrame(raw: string): BridgeFrame | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = BridgeFrameSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/** "5511999999999@c.us" → "5511999999999". */
export function normalizeThreadId(address: string): string {
  return address.trim().replace(/@(c\.us|s\.whatsapp\.net)$/, '');
}

function isIgnoredSender(from: string, isGroup: boolean): boolean {
  return (
    isGroup ||
    from.endsWith('@g.us') ||
    from.includes('broadcast') ||
    from.includes('@newsletter') ||
    from.includes('@lid')
  );
}

/**
 * Map a bridge message to an inbound event. Null for group, broadcast and
 * channel traffic and for messages with neither text nor media.
 */
export function toInboundMessage(msg: IncomingBridgeMessage): InboundMessage | null {
  if (isIgnoredSender(msg.from, msg.isGroup)) return null;

  const attachments: Attachment[] = [];
  for (const media of [msg.audio, msg.image, msg.document]) {
    if (media) attachments.push({ mimeType: media.mimetype, filename: media.filename ?? undefined });
  }

  const body = msg.body.trim();
  if (!body && attachments.length === 0) return null;

  return {
    threadId: normalizeThreadId(msg.from),
    text: body || `[${attachments.map((a) => a.mimeType).join(', ')} attachment]`,
    attachments: attachments.length > 0 ? attachments : undefined,
    timestamp: msg.timestamp * 1000,
  };
}

export interface BridgeHandlers {
  onInbound: (message: InboundMessage) => Promise<unknown>;
  onHumanReply: (threadId: string) => void;
}

export interface BridgeOptions {
  url?: string;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  maxPendingOutbound?: number;
}

export class BridgeTransport {
  private ws: WebSocket | null = null;
  private backoffMs: number;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = true;
  private ready = false;
  private pendingOutbound: string[] = [];
  private unsubscribe: (() => void) | null = null;
  private readonly url: string;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly maxPendingOutbound: number;

  constructor(
    private readonly bus: EventBus,
    private readonly handlers: BridgeHandlers,
    options: BridgeOptions = {},
  ) {
    this.url = options.url ?? BRIDGE_URL;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.maxBackoffMs = options.maxBackoffMs ?? 30_000;
    this.maxPendingOutbound = options.maxPendingOutbound ?? 100;
    this.backoffMs = this.initialBackoffMs;
  }

  get connected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  get messagingReady(): boolean {
    return this.ready;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.unsubscribe = this.bus.on('outbound', ({ threadId, text }) => this.send(threadId, text));
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
    this.ws?.close();
    this.ws = null;
  }

  send(threadId: string, text: string): void {
    const frame = JSON.stringify({ type: 'send_message', data: { to: threadId, text } });
    if (this.ws && this.connected) {
      this.ws.send(frame);
      logger.info({ threadId, length: text.length }, 'Reply sent to bridge');
      return;
    }
    if (this.pendingOutbound.length >= this.maxPendingOutbound) {
      logger.warn({ threadId }, 'Bridge offline and outbound buffer full, reply dropped');
      return;
    }
    this.pendingOutbound.push(frame);
    logger.warn({ threadId, buffered: this.pendingOutbound.length }, 'Bridge offline, reply buffered');
  }

  /** Dispatch one raw frame. Exposed for the connection handler and tests. */
  handleFrame(raw: string): void {
    const frame = parseBridgeFrame(raw);
    if (!frame) {
      logger.warn({ frame: preview(raw) }, 'Unrecognized bridge frame');
      return;
    }

    switch (frame.type) {
      case 'incoming_message': {
        const inbound = toInboundMessage(frame.message);
        if (!inbound) {
          logger.debug({ from: frame.message.from }, 'Ignoring bridge message');
          return;
        }
        this.handlers.onInbound(inbound).catch((err: unknown) => {
          logger.warn({ threadId: inbound.threadId, err: errorMessage(err) }, 'Inbound message rejected');
        });
        return;
      }
      case 'manual_reply': {
        const threadId = normalizeThreadId(frame.contact);
        try {
          this.handlers.onHumanReply(threadId);
        } catch (err) {
          logger.error({ threadId, err: errorMessage(err) }, 'Failed to pause thread');
        }
        return;
      }
      case 'status':
        this.ready = frame.status === 'ready';
        logger.info({ status: frame.status, reason: frame.reason }, 'Bridge status');
        return;
      case 'message_sent':
        if (!frame.success) logger.error({ to: frame.to, err: frame.error }, 'Bridge failed to send');
        return;
      case 'error':
        logger.error({ err: frame.error }, 'Bridge error');
        return;
      case 'qr_code':
        logger.info('Bridge is waiting for a QR code scan');
        return;
    }
  }

  private connect(): void {
    if (this.stopped) return;
    const ws = new WebSocket(this.url);
    this.ws = ws;

    ws.on('open', () => {
      logger.info({ url: this.url }, 'Connected to bridge');
      this.backoffMs = this.initialBackoffMs;
      const pending = this.pendingOutbound;
      this.pendingOutbound = [];
      for (const frame of pending) ws.send(frame);
    });

    ws.on('message', (data: WebSocket.RawData) => {
      this.handleFrame(data.toString());
    });

    ws.on('error', (err) => {
      logger.warn({ err: err.message }, 'Bridge connection error');
    });

    ws.on('close', () => {
      this.ready = false;
      if (this.ws === ws) this.ws = null;
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;
    const delay = this.backoffMs;
    this.backoffMs = Math.min(this.backoffMs * 2, this.maxBackoffMs);
    logger.info({ delayMs: delay }, 'Bridge disconnected, reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }
}
