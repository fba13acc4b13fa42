import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

const NAMESPACE = 'clfstats';

const LEVEL_ORDER: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

// Names accepted from --log-level and CLFSTATS_LOG_LEVEL besides the levels themselves
const LEVEL_ALIASES: ReadonlyMap<string, LogLevel> = new Map<string, LogLevel>([
  ['critical', 'error'],
  ['warning', 'warn'],
]);

type Channel = LogLevel | 'success';

const CHANNEL_NAMES: readonly Channel[] = ['trace', 'debug', 'info', 'success', 'warn', 'error'];

interface ChannelConfig {
  /** Lowest level at which the channel is written */
  minLevel: LogLevel;
  label: string;
  paint: (text: string) => string;
  write: debug.Debugger;
}

function channel(name: Channel, minLevel: LogLevel, paint: (text: string) => string): ChannelConfig {
  return { minLevel, label: `[${name.toUpperCase()}]`, paint, write: debug(`${NAMESPACE}:${name}`) };
}

const CHANNELS: Record<Channel, ChannelConfig> = {
  trace: channel('trace', 'trace', text => chalk.dim(text)),
  debug: channel('debug', 'debug', text => chalk.gray(text)),
  info: channel('info', 'info', text => chalk.blue(text)),
  success: channel('success', 'info', text => chalk.green(text)),
  warn: channel('warn', 'warn', text => chalk.yellow(text)),
  error: channel('error', 'error', text => chalk.red(text)),
};

function rank(level: LogLevel): number {
  return LEVEL_ORDER.indexOf(level);
}

// stdout is reserved for the report
debug.log = (...args: unknown[]) => console.error(...args);

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
    this.enableChannels();
  }

  /**
   * Reads a level name as given on the command line or in the environment.
   * Case and surrounding whitespace are ignored; `critical` and `warning`
   * are accepted as aliases. Returns undefined for anything else.
   */
  static parseLevel(input: string): LogLevel | undefined {
    const name = input.trim().toLowerCase();
    return LEVEL_ALIASES.get(name) ?? LEVEL_ORDER.find(level => level === name);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.enableChannels();
  }

  private isEnabled(name: Channel): boolean {
    return rank(CHANNELS[name].minLevel) >= rank(this.level);
  }

  private enableChannels(): void {
    const enabled = CHANNEL_NAMES.filter(name => this.isEnabled(name)).map(name => `${NAMESPACE}:${name}`);
    debug.enable(enabled.join(','));
  }

  private emit(name: Channel, message: string, args: unknown[]): void {
    if (!this.isEnabled(name)) {
      return;
    }
    const { label, paint, write } = CHANNELS[name];
    write(paint(`${label} ${message}`), ...args);
  }

  trace(message: string, ...args: unknown[]): void {
    this.emit('trace', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.emit('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.emit('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.emit('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.emit('error', message, args);
  }

  /** Completion messages, shown at info level */
  success(message: string, ...args: unknown[]): void {
    this.emit('success', message, args);
  }
}

export const logger = new Logger();
