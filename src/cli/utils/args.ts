import type { VariationMode } from '../../config/engineConfig.js';

export type ParseResult<T> = { kind: 'ok'; options: T } | { kind: 'error'; message: string };

export type SeekCommandOptions = {
  file: string;
  at: number;
  seed?: number;
  mode?: VariationMode;
  pins: Record<string, string>;
  root?: string;
  json: boolean;
};

export type InstancesCommandOptions = {
  file: string;
  segmentId: string;
  json: boolean;
};

const parseNumber = (flag: string, raw: string | undefined): number | string => {
  if (raw === undefined || raw.trim() === '') {
    return `${flag} requires a value`;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : `${flag} expects a number, received "${raw}"`;
};

/** `seek <file> --at <s> [--seed n] [--mode m] [--pin Var=Value]... [--root id] [--json]` */
export const parseSeekArgs = (args: readonly string[]): ParseResult<SeekCommandOptions> => {
  let file: string | undefined;
  let at: number | undefined;
  const options: Omit<SeekCommandOptions, 'file' | 'at'> = { pins: {}, json: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--at':
      case '--seed': {
        const value = parseNumber(arg, args[++i]);
        if (typeof value === 'string') return { kind: 'error', message: value };
        if (arg === '--at') at = value;
        else options.seed = value;
        break;
      }
      case '--mode': {
        const mode = args[++i];
        if (mode !== 'planning' && mode !== 'simulation') {
          return { kind: 'error', message: `Unsupported mode "${mode ?? ''}". Use planning or simulation.` };
        }
        options.mode = mode;
        break;
      }
      case '--pin': {
        const pin = args[++i] ?? '';
        const separator = pin.indexOf('=');
        if (separator <= 0 || separator === pin.length - 1) {
          return { kind: 'error', message: `--pin expects Variation=Value, received "${pin}"` };
        }
        options.pins[pin.slice(0, separator)] = pin.slice(separator + 1);
        break;
      }
      case '--root': {
        const root = args[++i];
        if (!root) return { kind: 'error', message: '--root requires a segment id' };
        options.root = root;
        break;
      }
      case '--json':
        options.json = true;
        break;
      default:
        if (arg.startsWith('--')) {
          return { kind: 'error', message: `Unknown flag "${arg}"` };
        }
        if (file !== undefined) {
          return { kind: 'error', message: `Unexpected argument "${arg}"` };
        }
        file = arg;
    }
  }
  if (file === undefined) {
    return { kind: 'error', message: 'seek requires an encounter path.' };
  }
  if (at === undefined) {
    return { kind: 'error', message: 'seek requires --at <seconds>.' };
  }
  return { kind: 'ok', options: { file, at, ...options } };
};

/** `instances <file> <segmentId> [--json]` */
export const parseInstancesArgs = (args: readonly string[]): ParseResult<InstancesCommandOptions> => {
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const unknown = args.find((arg) => arg.startsWith('--') && arg !== '--json');
  if (unknown) {
    return { kind: 'error', message: `Unknown flag "${unknown}"` };
  }
  if (positional.length !== 2) {
    return { kind: 'error', message: 'instances requires an encounter path and a segment id.' };
  }
  const [file, segmentId] = positional;
  return { kind: 'ok', options: { file, segmentId, json: args.includes('--json') } };
};
