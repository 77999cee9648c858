/**
 * Dependencies shared by the sandbox commands
 */

import { CloudGateway } from '../types/cloud-gateway';
import { Clock } from '../types/clock';
import { EffectiveConfig } from '../types/effective-config';
import { Logger } from '../types/logger';
import { ProgressTracker } from '../types/progress';
import { Prompter, PrompterError } from '../types/prompter';
import { Result } from '../types/result';
import { fromPrompterError } from '../core/errors';

export const REGION_QUESTION = 'Enter the AWS region:';

export interface CommandContext {
  config: EffectiveConfig;
  /** Open the gateway for a region; called once the region is known */
  connect(region: string): CloudGateway;
  logger: Logger;
  clock: Clock;
  prompter: Prompter;
  progress: ProgressTracker;
}

/**
 * Ask one question and return the answer; an unanswered prompt ends the run
 */
export async function ask<T>(
  logger: Logger,
  question: string,
  prompt: () => Promise<Result<T, PrompterError>>
): Promise<T> {
  logger.event('prompt_shown', question);
  const result = await prompt();
  if (!result.ok) {
    throw fromPrompterError(result.error, question);
  }
  logger.event('prompt_answered', `${question} ${formatAnswer(result.value)}`);
  return result.value;
}

function formatAnswer(value: unknown): string {
  return Array.isArray(value) ? value.join(', ') : String(value);
}

/**
 * Ask for the region unless it was configured, then open the gateway for it
 */
export async function openGateway(ctx: CommandContext): Promise<CloudGateway> {
  const { config, logger, prompter } = ctx;
  const answer = isUnset(config, 'region')
    ? await ask(logger, REGION_QUESTION, () =>
        prompter.input({ message: REGION_QUESTION, default: config.aws.region, validate: validateRegion })
      )
    : config.aws.region;
  const region = answer.trim();
  logger.setContext({ region });
  return ctx.connect(region);
}

function validateRegion(input: string): boolean | string {
  return input.trim().length > 0 || 'Region cannot be empty';
}

/**
 * Whether a setting was left for the operator to decide
 */
export function isUnset(config: EffectiveConfig, key: string): boolean {
  return config.sources[key] === 'default';
}
