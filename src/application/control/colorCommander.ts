import { TransportError } from '@/domain/errors';
import { buildBrightnessCommand, buildColorCommand } from '@/domain/protocol/commands';
import { REDUNDANCY_PRIORITIES } from '@/domain/protocol/constants';
import type { Rgb } from '@/domain/sequence/types';
import type { DatagramTransport } from '@/ports/DatagramTransport';
import { createLogger } from '@/shared/logging/logger';

export type CommandResult =
  | { kind: 'sent'; address: string; packets: number }
  | { kind: 'send-failed'; address: string; packets: number; error: TransportError };

/**
 * Live colour and brightness control. UDP gives no acknowledgment, so each
 * command goes out once per redundancy priority.
 */
export class ColorCommander {
  private readonly log = createLogger('Control');

  constructor(
    private readonly transport: DatagramTransport,
    private readonly controlPort: number,
  ) {}

  public async sendColor(address: string, color: Rgb): Promise<CommandResult> {
    const commands = REDUNDANCY_PRIORITIES.map((priority) => buildColorCommand(priority, color));
    const result = await this.sendAll(address, commands);
    if (result.kind === 'sent') {
      this.log.info('colour set', { address, color: color.join(',') });
    }
    return result;
  }

  public async sendBrightness(address: string, level: number): Promise<CommandResult> {
    const commands = REDUNDANCY_PRIORITIES.map((priority) => buildBrightnessCommand(priority, level));
    const result = await this.sendAll(address, commands);
    if (result.kind === 'sent') {
      this.log.info('brightness set', { address, level });
    }
    return result;
  }

  private async sendAll(address: string, commands: Buffer[]): Promise<CommandResult> {
    let packets = 0;
    for (const command of commands) {
      try {
        await this.transport.send(command, address, this.controlPort);
      } catch (error) {
        const transportError = TransportError.fromSocketError(error, 'send-failed');
        this.log.warn('control command send failed', { address, packets, message: transportError.message });
        return { kind: 'send-failed', address, packets, error: transportError };
      }
      packets += 1;
      this.log.debug('control packet sent', { address, command });
    }
    return { kind: 'sent', address, packets };
  }
}
