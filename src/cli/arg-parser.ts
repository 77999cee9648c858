/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';
import { Result, ok, err } from '../types/result';

type StringOption = 'region' | 'profile' | 'name' | 'cluster' | 'kubernetesVersion' | 'allowIngress';
type ToggleOption = 'autoMode' | 'addons' | 'reuseNetwork' | 'cascade' | 'wait';

/** Options that take a value */
const STRING_OPTIONS = new Map<string, StringOption>([
  ['--region', 'region'],
  ['--profile', 'profile'],
  ['--name', 'name'],
  ['--cluster', 'cluster'],
  ['--k8s-version', 'kubernetesVersion'],
  ['--allow-ingress', 'allowIngress'],
]);

/** Paired on/off switches */
const TOGGLE_OPTIONS = new Map<string, { key: ToggleOption; value: boolean }>([
  ['--auto-mode', { key: 'autoMode', value: true }],
  ['--no-auto-mode', { key: 'autoMode', value: false }],
  ['--addons', { key: 'addons', value: true }],
  ['--no-addons', { key: 'addons', value: false }],
  ['--reuse-network', { key: 'reuseNetwork', value: true }],
  ['--new-network', { key: 'reuseNetwork', value: false }],
  ['--cascade', { key: 'cascade', value: true }],
  ['--no-cascade', { key: 'cascade', value: false }],
  ['--no-wait', { key: 'wait', value: false }],
]);

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): Result<{ value: string; skip: number }, string> {
  const arg = args[index];

  // --arg=value
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return err(`${argName}= requires a value`);
    }
    return ok({ value, skip: 0 });
  }

  // --arg value
  const nextArg = args[index + 1];
  if (!nextArg || nextArg.startsWith('-')) {
    return err(`${argName} requires a value`);
  }
  return ok({ value: nextArg, skip: 1 });
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0];

    const stringOption = STRING_OPTIONS.get(argBase);
    if (stringOption) {
      const parsed = getArgValue(args, i, argBase);
      if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
      result[stringOption] = parsed.value.value;
      i += parsed.value.skip;
      continue;
    }

    const toggle = TOGGLE_OPTIONS.get(argBase);
    if (toggle) {
      result[toggle.key] = toggle.value;
      continue;
    }

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--numeric-versions': {
        result.numericVersions = true;
        break;
      }

      case '--dry-run': {
        result.dryRun = true;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        if (result.action !== null) {
          return { success: false, error: `Error: Unexpected argument: ${arg}` };
        }
        if (arg !== 'create' && arg !== 'delete') {
          return { success: false, error: `Error: Unknown action "${arg}". Expected create or delete` };
        }
        result.action = arg;
      }
    }
  }

  return { success: true, args: result };
}
