/**
 * Scripted Prompter for tests
 *
 * Answers prompts from a script keyed by question text and records
 * every question asked. Select answers name a choice by its label or value.
 */

import {
  Prompter,
  ConfirmOptions,
  InputOptions,
  SelectOptions,
  MultiSelectOptions,
  PrompterError,
  SelectChoice,
  createPrompterError,
} from '../../src/types/prompter';
import { Result, ok, err } from '../../src/types/result';

export type ScriptedAnswer = string | boolean | string[] | { fail: PrompterError['code'] };

export interface ScriptEntry {
  question: string | RegExp;
  answer: ScriptedAnswer;
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly script: ScriptEntry[];

  constructor(script: ScriptEntry[] = [], private readonly interactive = true) {
    this.script = [...script];
  }

  /**
   * Add or replace the answer to a question
   */
  answer(question: string | RegExp, answer: ScriptedAnswer): this {
    this.script.unshift({ question, answer });
    return this;
  }

  isInteractive(): boolean {
    return this.interactive;
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    const answer = this.lookup(options.message);
    if (answer === undefined) {
      return options.default !== undefined ? ok(options.default) : err(unscripted(options.message));
    }
    if (typeof answer === 'boolean') return ok(answer);
    return err(toError(answer, options.message));
  }

  async input(options: InputOptions): Promise<Result<string, PrompterError>> {
    const answer = this.lookup(options.message);
    if (answer === undefined) {
      return options.default !== undefined ? ok(options.default) : err(unscripted(options.message));
    }
    if (typeof answer !== 'string') return err(toError(answer, options.message));
    if (options.validate) {
      const verdict = options.validate(answer);
      if (verdict !== true) {
        return err(createPrompterError('IO_ERROR', typeof verdict === 'string' ? verdict : 'Invalid input'));
      }
    }
    return ok(answer === '' && options.default !== undefined ? options.default : answer);
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    const answer = this.lookup(options.message);
    if (answer === undefined) {
      return options.default !== undefined ? ok(options.default) : err(unscripted(options.message));
    }
    if (typeof answer !== 'string') return err(toError(answer, options.message));
    const choice = findChoice(options.choices, answer);
    if (!choice) {
      return err(createPrompterError('IO_ERROR', `No choice "${answer}" for "${options.message}"`));
    }
    return ok(choice.value);
  }

  async multiSelect<T = string>(options: MultiSelectOptions<T>): Promise<Result<T[], PrompterError>> {
    const answer = this.lookup(options.message);
    if (answer === undefined) {
      return options.default !== undefined ? ok(options.default) : err(unscripted(options.message));
    }
    if (!Array.isArray(answer)) return err(toError(answer, options.message));
    const values: T[] = [];
    for (const label of answer) {
      const choice = findChoice(options.choices, label);
      if (!choice) {
        return err(createPrompterError('IO_ERROR', `No choice "${label}" for "${options.message}"`));
      }
      values.push(choice.value);
    }
    return ok(values);
  }

  private lookup(message: string): ScriptedAnswer | undefined {
    this.asked.push(message);
    const entry = this.script.find((e) =>
      typeof e.question === 'string' ? e.question === message : e.question.test(message)
    );
    return entry?.answer;
  }
}

function findChoice<T>(choices: SelectChoice<T>[], label: string): SelectChoice<T> | undefined {
  return choices.find((c) => c.name === label || String(c.value) === label);
}

function unscripted(message: string): PrompterError {
  return createPrompterError('NON_INTERACTIVE', `No scripted answer for "${message}"`);
}

function toError(answer: ScriptedAnswer, message: string): PrompterError {
  if (typeof answer === 'object' && !Array.isArray(answer)) {
    return createPrompterError(answer.fail);
  }
  return createPrompterError('IO_ERROR', `Scripted answer has the wrong type for "${message}"`);
}
