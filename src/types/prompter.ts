/**
 * Prompter interface
 * Abstracts operator prompts for testability and non-interactive runs
 */

import { Result } from './result';

/**
 * Options for a single choice in a select prompt
 */
export interface SelectChoice<T = string> {
  /** Display name for the choice */
  name: string;
  /** Value returned when this choice is selected */
  value: T;
  /** Optional description shown next to the choice */
  description?: string;
}

export interface ConfirmOptions {
  /** The question to ask */
  message: string;
  /** Answer used when the operator just presses enter */
  default?: boolean;
}

export interface InputOptions {
  /** The question to ask */
  message: string;
  /** Answer used when the operator just presses enter */
  default?: string;
  /** Validation function (return true if valid, or an error message) */
  validate?: (input: string) => boolean | string;
}

export interface SelectOptions<T = string> {
  message: string;
  choices: SelectChoice<T>[];
  default?: T;
}

/**
 * Options for a multi-select prompt (checkbox)
 * Selection counts are validated by the caller, not by the prompt.
 */
export interface MultiSelectOptions<T = string> {
  message: string;
  choices: SelectChoice<T>[];
  /** Values checked when the prompt opens */
  default?: T[];
}

export type PrompterErrorCode =
  | 'CANCELLED'
  | 'NON_INTERACTIVE'
  | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Interface for operator prompts
 * Implementations can be real (inquirer) or scripted (for testing)
 */
export interface Prompter {
  /**
   * Ask for confirmation (yes/no)
   */
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  /**
   * Ask for free text
   */
  input(options: InputOptions): Promise<Result<string, PrompterError>>;

  /**
   * Ask the operator to pick one option
   */
  select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>>;

  /**
   * Ask the operator to pick any number of options
   */
  multiSelect<T = string>(options: MultiSelectOptions<T>): Promise<Result<T[], PrompterError>>;

  /**
   * Whether prompts reach a person (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
