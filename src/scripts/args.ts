import { DownloadApproach } from '../http/types.js';

export const USAGE = [
  'Usage: npm run download -- <url> <output> [options]',
  '',
  'Options:',
  '  --threads <n>         split into n segments',
  '  --segment-size <b>    split into segments of b bytes',
  '  --retries <n>         attempts per segment (first one included)',
  '  --retry-delay <ms>    pause between attempts',
].join('\n');

export interface CliOptions {
  url: string;
  output: string;
  approach: DownloadApproach;
  segmentParam: number;
  retries?: number;
  retryDelay?: number;
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a non-negative integer`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = [];
  let approach: DownloadApproach = DownloadApproach.Auto;
  let segmentParam = 0;
  let retries: number | undefined;
  let retryDelay: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--threads':
        approach = DownloadApproach.Thread;
        segmentParam = parseNumber(arg, argv[++i]);
        break;
      case '--segment-size':
        approach = DownloadApproach.Size;
        segmentParam = parseNumber(arg, argv[++i]);
        break;
      case '--retries':
        retries = parseNumber(arg, argv[++i]);
        break;
      case '--retry-delay':
        retryDelay = parseNumber(arg, argv[++i]);
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length !== 2) {
    throw new Error('Expected <url> and <output>');
  }

  return { url: positional[0], output: positional[1], approach, segmentParam, retries, retryDelay };
}
