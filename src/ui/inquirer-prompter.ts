/**
 * Inquirer-based Prompter Implementation
 * Real implementation of Prompter interface using inquirer
 */

import inquirer from 'inquirer';
import {
  Prompter,
  ConfirmOptions,
  InputOptions,
  SelectOptions,
  MultiSelectOptions,
  PrompterError,
  createPrompterError,
} from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  /** Whether running in interactive mode */
  interactive: boolean;
  /** Whether stdin/stdout are attached to a terminal */
  isTTY: boolean;
}

/**
 * Inquirer-based implementation of the Prompter interface.
 * Outside interactive mode every prompt answers with its default,
 * or fails with NON_INTERACTIVE when it has none.
 */
export class InquirerPrompter implements Prompter {
  private config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      isTTY: config.isTTY ?? process.stdout.isTTY ?? false,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && this.config.isTTY;
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(nonInteractive(options.message));
    }

    try {
      const response = await inquirer.prompt<{ value: boolean }>([
        {
          type: 'confirm',
          name: 'value',
          message: options.message,
          default: options.default ?? true,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.toPrompterError(error, 'confirm'));
    }
  }

  async input(options: InputOptions): Promise<Result<string, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(nonInteractive(options.message));
    }

    try {
      const response = await inquirer.prompt<{ value: string }>([
        {
          type: 'input',
          name: 'value',
          message: options.message,
          default: options.default,
          validate: options.validate,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.toPrompterError(error, 'input'));
    }
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    if (!this.isInteractive()) {
      // Never fall back to the first choice: a guessed resource is worse than a failure
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(nonInteractive(options.message));
    }

    try {
      const response = await inquirer.prompt<{ value: T }>([
        {
          type: 'list',
          name: 'value',
          message: options.message,
          choices: options.choices.map((c) => ({
            name: c.description ? `${c.name} - ${c.description}` : c.name,
            value: c.value,
          })),
          default: options.default,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.toPrompterError(error, 'select'));
    }
  }

  async multiSelect<T = string>(options: MultiSelectOptions<T>): Promise<Result<T[], PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default && options.default.length > 0) {
        return ok(options.default);
      }
      return err(nonInteractive(options.message));
    }

    try {
      const response = await inquirer.prompt<{ value: T[] }>([
        {
          type: 'checkbox',
          name: 'value',
          message: options.message,
          choices: options.choices.map((c) => ({
            name: c.description ? `${c.name} - ${c.description}` : c.name,
            value: c.value,
            checked: options.default?.includes(c.value) ?? false,
          })),
        },
      ]);
      return ok(response.value);
    } catch (error) {
      return err(this.toPrompterError(error, 'multiSelect'));
    }
  }

  private toPrompterError(error: unknown, operation: string): PrompterError {
    if (isCancelledError(error)) {
      return createPrompterError('CANCELLED', 'User cancelled the prompt');
    }
    return createPrompterError(
      'IO_ERROR',
      `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

function nonInteractive(question: string): PrompterError {
  return createPrompterError('NON_INTERACTIVE', `Cannot ask "${question}" in non-interactive mode`);
}

function isCancelledError(error: unknown): boolean {
  // Ctrl+C
  if (error instanceof Error) {
    return (
      error.message.includes('User force closed') ||
      error.message.includes('cancelled') ||
      error.name === 'ExitPromptError'
    );
  }
  return false;
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
