import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigError } from '../src/errors';
import { createLogger } from '../src/logger';
import { DEFAULT_WPM, MAX_WPM, MIN_WPM } from '../src/rsvp/timing';

const log = createLogger('CONFIG');

export interface ReadingConfig {
  wpm: number;
  chunkSize: number;
  skip: number;
}

export interface AppConfig {
  reading: ReadingConfig;
  // null reads standard input
  source: string | null;
  debug: boolean;
}

export interface CliArgs {
  config?: string;
  wpm?: number;
  chunkSize?: number;
  skip?: number;
  debug?: boolean;
  help?: boolean;
  source?: string;
}

export const DEFAULT_CHUNK_SIZE = 40;

const fileConfigSchema = z
  .object({
    wpm: z.number().int().min(MIN_WPM).max(MAX_WPM),
    chunkSize: z.number().int().min(1),
    debug: z.boolean(),
  })
  .partial();

type FileConfig = z.infer<typeof fileConfigSchema>;

export const USAGE = `Usage: glance [options] [file]

Reads words from file (or standard input when omitted or "-") and shows
them one at a time.

Options:
  -w, --wpm <n>      words per minute, negative reads backwards (default ${DEFAULT_WPM})
  -c, --chunk <n>    context words shown around the current word (default ${DEFAULT_CHUNK_SIZE})
  -s, --skip <n>     start at word n (default 0)
  -d, --debug        log diagnostics to stderr
      --config <p>   read settings from this JSON file
  -h, --help         show this help

Keys:
  space / p          pause or resume
  ] + = / up         faster
  [ - / down         slower
  right / l          next word (while paused)
  left / h           previous word (while paused)
  q                  quit
`;

function expandPath(p: string): string {
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

function parseInteger(flag: string, value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new ConfigError(`${flag} expects an integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

const VALUE_FLAGS: Record<string, 'config' | 'wpm' | 'chunkSize' | 'skip'> = {
  '--config': 'config',
  '-w': 'wpm',
  '--wpm': 'wpm',
  '-c': 'chunkSize',
  '--chunk': 'chunkSize',
  '-s': 'skip',
  '--skip': 'skip',
};

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      result.help = true;
      continue;
    }
    if (arg === '-d' || arg === '--debug') {
      result.debug = true;
      continue;
    }
    if (arg === '-' || !arg.startsWith('-')) {
      if (result.source !== undefined) {
        throw new ConfigError(`Only one input file can be read, got "${result.source}" and "${arg}"`);
      }
      result.source = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS[flag];
    if (key === undefined) {
      throw new ConfigError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    } else {
      throw new ConfigError(`${flag} expects a value`);
    }

    if (key === 'config') {
      result.config = value;
    } else {
      result[key] = parseInteger(flag, value);
    }
  }

  validateCliArgs(result);
  return result;
}

function validateCliArgs(args: CliArgs): void {
  if (args.wpm !== undefined && (args.wpm < MIN_WPM || args.wpm > MAX_WPM)) {
    throw new ConfigError(`--wpm must be between ${MIN_WPM} and ${MAX_WPM}, got ${args.wpm}`);
  }
  if (args.chunkSize !== undefined && args.chunkSize < 1) {
    throw new ConfigError(`--chunk must be at least 1, got ${args.chunkSize}`);
  }
  if (args.skip !== undefined && args.skip < 0) {
    throw new ConfigError(`--skip cannot be negative, got ${args.skip}`);
  }
}

export interface ConfigLocations {
  homeDir?: string;
  cwd?: string;
}

function findConfigFile(cliConfigPath: string | undefined, locations: ConfigLocations): string | null {
  // CLI override takes priority
  if (cliConfigPath) {
    const expanded = expandPath(cliConfigPath);
    if (fs.existsSync(expanded)) {
      return expanded;
    }
    log.warn(`Config file not found: ${expanded}`);
    return null;
  }

  const homeDir = locations.homeDir ?? os.homedir();
  const cwd = locations.cwd ?? process.cwd();
  const defaultPaths = [
    path.join(homeDir, '.config', 'glance', 'config.json'),
    path.join(cwd, 'glance.json'),
  ];

  for (const p of defaultPaths) {
    if (fs.existsSync(p)) {
      return p;
    }
  }

  return null;
}

function readConfigFile(configPath: string): FileConfig {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed = fileConfigSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      log.warn(`Ignoring invalid config file ${configPath}`, issues);
      return {};
    }
    log.debug(`Loaded config from: ${configPath}`);
    return parsed.data;
  } catch (err) {
    log.warn(`Failed to read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }
}

export function loadConfig(cliArgs: CliArgs, locations: ConfigLocations = {}): AppConfig {
  const configPath = findConfigFile(cliArgs.config, locations);
  const fileConfig = configPath ? readConfigFile(configPath) : {};

  // CLI args override config file
  return {
    reading: {
      wpm: cliArgs.wpm ?? fileConfig.wpm ?? DEFAULT_WPM,
      chunkSize: cliArgs.chunkSize ?? fileConfig.chunkSize ?? DEFAULT_CHUNK_SIZE,
      skip: cliArgs.skip ?? 0,
    },
    source: cliArgs.source === undefined || cliArgs.source === '-' ? null : expandPath(cliArgs.source),
    debug: cliArgs.debug ?? fileConfig.debug ?? false,
  };
}
