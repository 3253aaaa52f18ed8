import { DeviceInfo } from '@/types/device.types';
import { CommandEnvelope, ReplyBody, SignedCommand } from '@/types/envelope.types';
import { validateCommand } from './auth.service';
import { CommandRouterDeps, routeCommand } from './command-router.service';
import { DecodedCommand, decodeInbound } from '@/utils/codec.utils';
import { SerialQueue } from '@/utils/serial-queue.utils';
import { getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

export interface DispatcherDeps extends CommandRouterDeps {
  getDeviceInfo(): DeviceInfo | null;
  sign(payload: ReplyBody): SignedCommand;
  publish(topic: string, message: SignedCommand): void;
  now?: () => number;         // ms
}

/**
 * Inbound entry point. Envelopes are handled one at a time in arrival order;
 * each gets at most one reply, and nothing thrown by a handler escapes.
 */
export class Dispatcher {
  private readonly queue = new SerialQueue();

  constructor(private readonly deps: DispatcherDeps) {}

  onReceive(raw: unknown): Promise<void> {
    return this.queue.run(() => this.handle(raw));
  }

  /** Resolves once every envelope received so far has been handled. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  get pending(): number {
    return this.queue.size;
  }

  private async handle(raw: unknown): Promise<void> {
    let decoded: DecodedCommand;
    try {
      decoded = decodeInbound(raw);
    } catch (error) {
      logger.error(`Dropping undecodable message: ${getErrorMessage(error)}`);
      return;
    }

    const { signed, envelope } = decoded;
    const responseTopic = envelope.response_topic;
    const now = this.deps.now?.() ?? Date.now();

    if (!validateCommand(signed, envelope, this.deps.getDeviceInfo(), now)) {
      logger.warn('Command rejected: expired or not authorised');
      return;
    }

    const reply = await this.process(envelope);
    if (responseTopic) {
      this.reply(responseTopic, reply);
    }
  }

  private async process(envelope: CommandEnvelope): Promise<ReplyBody> {
    try {
      return await routeCommand(envelope, this.deps);
    } catch (error) {
      logger.error(`Command handling failed: ${getErrorMessage(error)}`);
      return { info: 'error', error: getErrorMessage(error) };
    }
  }

  private reply(topic: string, body: ReplyBody): void {
    try {
      this.deps.publish(topic, this.deps.sign(body));
    } catch (error) {
      logger.error(`Failed to publish reply to ${topic}: ${getErrorMessage(error)}`);
    }
  }
}
