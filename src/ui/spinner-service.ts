/**
 * Spinner Service
 * Shows progress for long waits with TTY and verbosity awareness
 */

import ora, { Ora } from 'ora';
import { ProgressTracker } from '../types/progress';

export interface SpinnerOptions {
  /** Text to display with the spinner */
  text: string;
  /** Whether to use a spinner (false = just log text) */
  useSpinner?: boolean;
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
  /** Symbol to use when not spinning */
  prefixSymbol?: string;
}

export interface Spinner {
  start(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  setText(text: string): void;
  stop(): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  /** Whether TTY output is available */
  isTTY: boolean;
  /** Whether to suppress all output (JSON output mode) */
  quiet: boolean;
  /** Output stream for the spinner */
  stream: NodeJS.WritableStream;
}

/**
 * A no-op spinner for quiet mode
 */
class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  setText(): void {
    // No-op
  }
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * Line-per-update spinner for non-TTY output (CI logs, pipes)
 */
class TextSpinner implements Spinner {
  private spinning = false;
  private text: string;

  constructor(
    text: string,
    private readonly stream: NodeJS.WritableStream,
    private readonly prefixSymbol: string = '>'
  ) {
    this.text = text;
  }

  start(): void {
    this.spinning = true;
    this.stream.write(`${this.prefixSymbol} ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.spinning = false;
    this.stream.write(`✅ ${text ?? this.text}\n`);
  }

  fail(text?: string): void {
    this.spinning = false;
    this.stream.write(`❌ ${text ?? this.text}\n`);
  }

  setText(text: string): void {
    this.text = text;
    if (this.spinning) {
      this.stream.write(`${this.prefixSymbol} ${text}\n`);
    }
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

class OraSpinner implements Spinner {
  private readonly oraInstance: Ora;

  constructor(text: string, color: SpinnerOptions['color'], stream: NodeJS.WritableStream) {
    this.oraInstance = ora({ text, color, stream });
  }

  start(): void {
    this.oraInstance.start();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  setText(text: string): void {
    this.oraInstance.text = text;
  }

  stop(): void {
    this.oraInstance.stop();
  }

  get isSpinning(): boolean {
    return this.oraInstance.isSpinning;
  }
}

/**
 * Centralized service for managing spinners.
 * Also serves as the ProgressTracker handed to the provisioner and deprovisioner.
 */
export class SpinnerService implements ProgressTracker {
  private readonly config: SpinnerServiceConfig;
  private activeSpinner: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stdout.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stdout,
    };
  }

  create(options: SpinnerOptions): Spinner {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }

    if (this.config.quiet) {
      return new NullSpinner();
    }

    const useSpinner = options.useSpinner ?? this.config.isTTY;

    let spinner: Spinner;
    if (useSpinner && this.config.isTTY) {
      spinner = new OraSpinner(options.text, options.color, this.config.stream);
    } else {
      spinner = new TextSpinner(options.text, this.config.stream, options.prefixSymbol ?? '>');
    }

    this.activeSpinner = spinner;
    return spinner;
  }

  start(text: string, color?: SpinnerOptions['color']): Spinner {
    const spinner = this.create({ text, color });
    spinner.start();
    return spinner;
  }

  /**
   * Show a spinner for the lifetime of a task. The spinner fails with the
   * task's text and the task's error is rethrown unchanged.
   */
  async track<T>(text: string, task: () => Promise<T>, successText?: string): Promise<T> {
    const spinner = this.start(text, 'cyan');
    try {
      const result = await task();
      spinner.succeed(successText);
      return result;
    } catch (error) {
      spinner.fail();
      throw error;
    } finally {
      if (this.activeSpinner === spinner) {
        this.activeSpinner = null;
      }
    }
  }

  getActive(): Spinner | null {
    return this.activeSpinner;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
