/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind the effect interfaces:
 * - readline on stdin/stdout for the operator terminal
 * - console (stderr) for logging, filtered by level
 */
import {AppEffects, Logger, Terminal} from '../pure/effects';
import {CliConfig, LogLevel} from './types';
import {createInterface, Interface} from 'readline';
import {Just, Maybe, Nothing} from 'purify-ts';

const DEFAULT_STORE_NAME = 'Store Management System';
const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    storeName: env.STORE_NAME?.trim() || DEFAULT_STORE_NAME,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.keys(levelOrder).includes(value);
}

// ============================================================================
// Console Logger
// ============================================================================

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const levelIcons: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📋',
  warn: '⚠️',
  error: '❌',
};

// Everything goes to stderr so log lines never mix with the menu on stdout
class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string, cause?: unknown): void {
    this.write('error', message, cause);
  }

  private write(level: LogLevel, message: string, cause?: unknown): void {
    if (levelOrder[level] < levelOrder[this.level]) return;
    const line = `${levelIcons[level]} ${message}`;
    if (cause === undefined) {
      console.error(line);
    } else {
      console.error(line, cause);
    }
  }
}

export function createConsoleLogger(level: LogLevel): Logger {
  return new ConsoleLogger(level);
}

// ============================================================================
// Readline Terminal
// ============================================================================

// Lines that arrive before anyone asks (piped or pasted input) are queued
class ReadlineTerminal implements Terminal {
  private closed = false;
  private readonly buffered: string[] = [];
  private readonly waiting: ((answer: Maybe<string>) => void)[] = [];

  constructor(
    private readonly rl: Interface,
    private readonly output: NodeJS.WritableStream
  ) {
    rl.on('line', line => {
      const next = this.waiting.shift();
      if (next) {
        next(Just(line));
      } else {
        this.buffered.push(line);
      }
    });
    // Questions still waiting when input ends are answered with Nothing
    rl.on('close', () => {
      this.closed = true;
      this.waiting.splice(0).forEach(resolve => resolve(Nothing));
    });
    // Ctrl+C at the prompt ends input instead of pausing it
    rl.on('SIGINT', () => rl.close());
  }

  prompt(question: string): Promise<Maybe<string>> {
    this.output.write(question);
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(Just(line));
    if (this.closed) return Promise.resolve(Nothing);
    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  print(text: string): void {
    this.output.write(`${text}\n`);
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements AppEffects {
  private _terminal?: Terminal;
  private _logger?: Logger;

  constructor(
    private config: CliConfig,
    private input: NodeJS.ReadableStream,
    private output: NodeJS.WritableStream
  ) {}

  get terminal(): Terminal {
    if (!this._terminal) {
      const rl = createInterface({input: this.input, output: this.output});
      this._terminal = new ReadlineTerminal(rl, this.output);
    }
    return this._terminal;
  }

  get logger(): Logger {
    if (!this._logger) {
      this._logger = createConsoleLogger(this.config.logLevel);
    }
    return this._logger;
  }

  /**
   * Static factory method to create production effects
   */
  static make(
    config?: CliConfig,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ): AppEffects {
    return new EffectsFactory(config || loadConfigFromEnv(), input, output);
  }
}

// Export a factory function
export function makeAppEffects(
  config?: CliConfig,
  input?: NodeJS.ReadableStream,
  output?: NodeJS.WritableStream
): AppEffects {
  return EffectsFactory.make(config, input, output);
}
