import { io, Socket } from 'socket.io-client';
import { SignedCommand } from '@/types/envelope.types';
import { RECONNECT_CONFIG, SOCKET_EVENTS } from '@/config/constants';
import { AgentError } from '@/utils/errors.utils';
import { encodeForTransport } from '@/utils/codec.utils';
import { logger } from '@/utils/logger';

export type InboundHandler = (raw: unknown) => void;

/**
 * Publish/subscribe channel between the device and the platform node
 */
export interface MessageTransport {
  connect(onMessage: InboundHandler): void;
  subscribe(topic: string): void;
  publish(topic: string, message: SignedCommand): void;
  disconnect(): void;
  readonly connected: boolean;
}

export interface SocketTransportOptions {
  reconnectionDelay?: number;
  reconnectionDelayMax?: number;
  randomizationFactor?: number;
}

/**
 * socket.io transport. Topics are re-subscribed after every reconnect;
 * socket.io-client handles the backoff.
 */
export class SocketTransport implements MessageTransport {
  private socket: Socket | null = null;
  private readonly topics = new Set<string>();

  constructor(
    private readonly url: string,
    private readonly options: SocketTransportOptions = {}
  ) {}

  get connected(): boolean {
    return this.socket?.connected ?? false;
  }

  connect(onMessage: InboundHandler): void {
    if (this.socket) {
      return;
    }

    const socket = io(this.url, {
      reconnection: true,
      reconnectionDelay: this.options.reconnectionDelay ?? RECONNECT_CONFIG.DELAY_MS,
      reconnectionDelayMax: this.options.reconnectionDelayMax ?? RECONNECT_CONFIG.DELAY_MAX_MS,
      randomizationFactor: this.options.randomizationFactor ?? RECONNECT_CONFIG.JITTER,
      transports: ['websocket'],
    });

    socket.on('connect', () => {
      logger.info(`Connected to ${this.url}`);
      for (const topic of this.topics) {
        socket.emit(SOCKET_EVENTS.SUBSCRIBE, topic);
      }
    });

    socket.on('disconnect', (reason) => {
      logger.warn(`Disconnected from ${this.url}: ${reason}`);
    });

    socket.on('connect_error', (error) => {
      logger.error(`Connection to ${this.url} failed: ${error.message}`);
    });

    socket.on(SOCKET_EVENTS.MESSAGE, (raw: unknown) => {
      onMessage(raw);
    });

    this.socket = socket;
  }

  subscribe(topic: string): void {
    this.topics.add(topic);
    if (this.socket?.connected) {
      this.socket.emit(SOCKET_EVENTS.SUBSCRIBE, topic);
    }
  }

  publish(topic: string, message: SignedCommand): void {
    if (!this.socket) {
      throw new AgentError('NOT_CONNECTED', `Cannot publish to ${topic}: transport not connected`);
    }
    // Buffered by socket.io while reconnecting
    this.socket.emit(SOCKET_EVENTS.PUBLISH, topic, encodeForTransport(message));
  }

  disconnect(): void {
    this.socket?.removeAllListeners();
    this.socket?.disconnect();
    this.socket = null;
  }
}
