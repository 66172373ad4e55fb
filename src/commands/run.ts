import path from 'node:path';
import { ValidationError } from '@/domain/errors';
import type { DeviceSnapshot } from '@/domain/device/types';
import type { Runtime, RuntimeServices } from '@/runtime/bootstrap';
import { parseCliArgs, USAGE, type CliCommand } from '@/commands/args';
import { errorMessage } from '@/shared/bestEffort';
import { readFileBuffer } from '@/shared/utils/file';
import { createLogger } from '@/shared/logging/logger';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type Output = (line: string) => void;

const log = createLogger('Cli');

/**
 * Parses argv, runs one command against the runtime and returns the exit code.
 * The runtime is always stopped before returning.
 */
export async function runCli(argv: readonly string[], runtime: Runtime, out: Output): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed.kind === 'usage') {
    out(parsed.message);
    out(USAGE);
    return EXIT_USAGE;
  }
  if (parsed.command.name === 'help') {
    out(USAGE);
    return EXIT_OK;
  }

  try {
    const services = await runtime.start();
    return await runCommand(parsed.command, services, out);
  } catch (error) {
    if (error instanceof ValidationError) {
      out(`invalid input (${error.code}): ${error.message}`);
      return EXIT_FAILURE;
    }
    log.error('command failed', { command: parsed.command.name, message: errorMessage(error) });
    out(`error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  } finally {
    await runtime.stop();
  }
}

export async function runCommand(command: CliCommand, services: RuntimeServices, out: Output): Promise<number> {
  switch (command.name) {
    case 'help':
      out(USAGE);
      return EXIT_OK;

    case 'compile': {
      const compiled = await services.compiler.compileFile(command.input, command.output);
      out(
        `wrote ${compiled.outputPath} (${compiled.program.length} bytes, ` +
          `${compiled.sequence.segments.length} segments, crc32 ${compiled.checksum})`,
      );
      return EXIT_OK;
    }

    case 'scan': {
      await services.discovery.start();
      await delay(command.seconds * 1000);
      const devices = services.discovery.devices();
      if (devices.length === 0) {
        out('no devices found');
        return EXIT_FAILURE;
      }
      devices.forEach((device) => out(describeDevice(device)));
      return EXIT_OK;
    }

    case 'upload': {
      const address = command.address ?? (await discoverAddress(services, command.waitSeconds));
      if (!address) {
        out('no device found; pass an address or check the network');
        return EXIT_FAILURE;
      }
      const payload = await readFileBuffer(command.file);
      const result = await services.uploader.upload(address, payload, {
        filename: command.filename ?? path.basename(command.file),
      });
      if (result.kind === 'acknowledged') {
        out(`uploaded ${result.bytesSent} bytes to ${address} (crc32 ${result.checksum})`);
        return EXIT_OK;
      }
      if (result.kind === 'unconfirmed') {
        out(`sent ${result.bytesSent} bytes to ${address} but the device did not confirm; retry the upload`);
        return EXIT_FAILURE;
      }
      out(`upload failed (${result.error.code}): ${result.error.message}`);
      return EXIT_FAILURE;
    }

    case 'play': {
      await waitForDevice(services, command.address, command.waitSeconds);
      const result = await services.playback.play(command.address ?? undefined);
      switch (result.kind) {
        case 'sent':
          out(`play sent to ${result.destination} (op 0x${hex(result.opId)})`);
          return EXIT_OK;
        case 'already-playing':
          out('already playing; stop first');
          return EXIT_FAILURE;
        case 'no-device-status':
          out('no device status received; is the device on and on this network?');
          return EXIT_FAILURE;
        case 'send-failed':
          out(`play failed (${result.error.code}): ${result.error.message}`);
          return EXIT_FAILURE;
      }
    }

    case 'stop': {
      await waitForDevice(services, command.address, command.waitSeconds);
      const result = await services.playback.stop(command.address ?? undefined);
      switch (result.kind) {
        case 'sent':
          out(`stop sent to ${result.destination} (op 0x${hex(result.opId)}, next play 0x${hex(result.nextPlayOpId)})`);
          return EXIT_OK;
        case 'not-playing':
          out('nothing is playing');
          return EXIT_FAILURE;
        case 'no-device-status':
          out('no device status received; is the device on and on this network?');
          return EXIT_FAILURE;
        case 'send-failed':
          out(`stop failed (${result.error.code}): ${result.error.message}`);
          return EXIT_FAILURE;
      }
    }

    case 'color':
    case 'brightness': {
      const address = command.address ?? (await discoverAddress(services, command.waitSeconds));
      if (!address) {
        out('no device found; pass --address or check the network');
        return EXIT_FAILURE;
      }
      const result =
        command.name === 'color'
          ? await services.colors.sendColor(address, command.color)
          : await services.colors.sendBrightness(address, command.level);
      if (result.kind === 'sent') {
        out(`${command.name} sent to ${address} (${result.packets} packets)`);
        return EXIT_OK;
      }
      out(`${command.name} failed after ${result.packets} packets: ${result.error.message}`);
      return EXIT_FAILURE;
    }

    case 'confirm': {
      const session = services.playback.confirm(command.state);
      out(`playback marked ${command.state} (next play op 0x${hex(session.nextPlayOpId)})`);
      return EXIT_OK;
    }
  }
  return EXIT_FAILURE;
}

async function discoverAddress(services: RuntimeServices, waitSeconds: number): Promise<string | null> {
  await services.discovery.start();
  const device = await services.discovery.waitForStatus(waitSeconds * 1000);
  return device?.address ?? null;
}

async function waitForDevice(services: RuntimeServices, address: string | null, waitSeconds: number): Promise<void> {
  await services.discovery.start();
  await services.discovery.waitForStatus(waitSeconds * 1000, address ?? undefined);
}

export function describeDevice(device: DeviceSnapshot): string {
  const status = device.status
    ? `status 0x${hex(device.status.status)} ts ${hex(device.status.timestamp[0])}${hex(device.status.timestamp[1])}`
    : 'no status';
  return `${device.address}  ${status}${device.uploadOk ? '  upload ok' : ''}`;
}

function hex(value: number): string {
  return value.toString(16).padStart(2, '0');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
