import type { Rgb } from '@/domain/sequence/types';

export type CliCommand =
  | { name: 'compile'; input: string; output: string }
  | { name: 'scan'; seconds: number }
  | { name: 'upload'; file: string; address: string | null; filename: string | null; waitSeconds: number }
  | { name: 'play'; address: string | null; waitSeconds: number }
  | { name: 'stop'; address: string | null; waitSeconds: number }
  | { name: 'color'; color: Rgb; address: string | null; waitSeconds: number }
  | { name: 'brightness'; level: number; address: string | null; waitSeconds: number }
  | { name: 'confirm'; state: 'playing' | 'idle' }
  | { name: 'help' };

export type ParseResult = { kind: 'ok'; command: CliCommand } | { kind: 'usage'; message: string };

export const USAGE = [
  'usage: juggle-link <command> [options]',
  '',
  '  compile <in.json> <out.prg>       encode a JSON sequence into a program file',
  '  scan [seconds]                    list devices seen on the LAN (default 5s)',
  '  upload <file.prg> [address]       send a program file to a device',
  '  play                              start the uploaded program',
  '  stop                              stop the running program',
  '  color <r,g,b>                     set a solid colour',
  '  brightness <0-255>                set brightness',
  '  confirm <playing|idle>            record what the device is actually doing',
  '',
  'options:',
  '  --address <ip>    target device (otherwise the first device discovered)',
  '  --wait <seconds>  how long to wait for a device status packet (default 3)',
  '  --name <name>     filename stored on the device (upload only)',
].join('\n');

const DEFAULT_WAIT_SECONDS = 3;
const DEFAULT_SCAN_SECONDS = 5;

export function parseCliArgs(argv: readonly string[]): ParseResult {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      return { kind: 'ok', command: { name: 'help' } };
    }
    if (arg.startsWith('--')) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return usage(`missing value for ${arg}`);
      }
      flags.set(arg.slice(2), value);
      i += 1;
      continue;
    }
    positional.push(arg);
  }

  const [name, ...rest] = positional;
  const address = flags.get('address') ?? null;
  const waitSeconds = flags.has('wait') ? Number(flags.get('wait')) : DEFAULT_WAIT_SECONDS;
  if (!Number.isFinite(waitSeconds) || waitSeconds < 0) {
    return usage('--wait must be a non-negative number of seconds');
  }

  switch (name) {
    case undefined:
    case 'help':
      return { kind: 'ok', command: { name: 'help' } };
    case 'compile':
      if (rest.length !== 2) {
        return usage('compile needs <in.json> <out.prg>');
      }
      return { kind: 'ok', command: { name: 'compile', input: rest[0], output: rest[1] } };
    case 'scan': {
      const seconds = rest.length > 0 ? Number(rest[0]) : DEFAULT_SCAN_SECONDS;
      if (!Number.isFinite(seconds) || seconds <= 0) {
        return usage('scan duration must be a positive number of seconds');
      }
      return { kind: 'ok', command: { name: 'scan', seconds } };
    }
    case 'upload':
      if (rest.length < 1 || rest.length > 2) {
        return usage('upload needs <file.prg> [address]');
      }
      return {
        kind: 'ok',
        command: {
          name: 'upload',
          file: rest[0],
          address: rest[1] ?? address,
          filename: flags.get('name') ?? null,
          waitSeconds,
        },
      };
    case 'play':
    case 'stop':
      return { kind: 'ok', command: { name, address, waitSeconds } };
    case 'color': {
      const color = parseRgb(rest[0]);
      if (!color) {
        return usage('color needs r,g,b with each component 0-255');
      }
      return { kind: 'ok', command: { name: 'color', color, address, waitSeconds } };
    }
    case 'brightness': {
      const level = Number(rest[0]);
      if (!Number.isInteger(level) || level < 0 || level > 255) {
        return usage('brightness needs an integer 0-255');
      }
      return { kind: 'ok', command: { name: 'brightness', level, address, waitSeconds } };
    }
    case 'confirm': {
      const state = rest[0];
      if (state !== 'playing' && state !== 'idle') {
        return usage('confirm needs playing or idle');
      }
      return { kind: 'ok', command: { name: 'confirm', state } };
    }
    default:
      return usage(`unknown command: ${name}`);
  }
}

export function parseRgb(value: string | undefined): Rgb | null {
  const parts = value?.split(',').map((part) => part.trim()) ?? [];
  if (parts.length !== 3 || parts.some((part) => !/^\d{1,3}$/.test(part))) {
    return null;
  }
  const [r, g, b] = parts.map(Number);
  if ([r, g, b].some((component) => component > 255)) {
    return null;
  }
  return [r, g, b];
}

function usage(message: string): ParseResult {
  return { kind: 'usage', message };
}
