#!/usr/bin/env node

import { readFileSync } from 'fs';
import { join } from 'path';
import { parseArgs, printUsage, toCliFlags } from './cli';
import { resolveConfig, formatEffectiveConfigForDisplay } from './config';
import { getExitCodeForError } from './core/errors';
import { ExitCode, getExitCodeDescription } from './types/exit-codes';
import { EffectiveConfig } from './types/effective-config';
import { MemoryCloudGateway } from './gateway/memory-cloud-gateway';
import { createRealDependencies, runSandbox } from './orchestration';
import { formatRunSummary } from './logging/run-summary';

// Library surface
export { Provisioner, Deprovisioner, NetworkTeardown, TagGuard, resolveLatestVersion, SandboxError } from './core';
export type { ProvisionRequest, ProvisionResult, DeprovisionResult, TeardownDecisions, NetworkSelector } from './core';
export { AwsCloudGateway, MemoryCloudGateway } from './gateway';
export type { CloudGateway } from './types';
export { runSandbox, createRealDependencies, createMockDependencies } from './orchestration';
export { executeCreateCluster, executeDeleteCluster } from './commands';
export { RunSummaryBuilder, formatRunSummary } from './logging';
export { InquirerPrompter, SpinnerService } from './ui';
export { parseUserConfig } from './schemas';

function readVersion(): string {
  // package.json sits at the project root, one level above src/ and dist/src/
  for (const candidate of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        throw error;
      }
    }
  }
  return 'unknown';
}

// Main CLI entry point
async function main(): Promise<ExitCode> {
  const parsed = parseArgs(process.argv);
  if (!parsed.success || !parsed.args) {
    console.error(parsed.error ?? 'Error: Invalid arguments');
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    printUsage();
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(readVersion());
    return ExitCode.SUCCESS;
  }

  let config: EffectiveConfig;
  try {
    config = resolveConfig(toCliFlags(args));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    return getExitCodeForError(error);
  }

  if (config.verbosity.debug && !config.verbosity.jsonOutput) {
    console.error(formatEffectiveConfigForDisplay(config));
  }
  if (config.dryRun && !config.verbosity.jsonOutput) {
    console.error('🧪 Dry run: working against an in-memory account, nothing reaches AWS');
  }

  const deps = createRealDependencies(config);
  const report = await runSandbox(config, deps);

  if (config.verbosity.jsonOutput) {
    console.log(JSON.stringify(report.summary, null, 2));
  } else {
    console.log(formatRunSummary(report.summary));
    if (report.gateway instanceof MemoryCloudGateway) {
      console.log('');
      console.log('Calls issued:');
      for (const call of report.gateway.getCalls()) {
        console.log(`  ${call.operation}${call.target ? ` ${call.target}` : ''}`);
      }
    }
  }
  if (report.exitCode !== ExitCode.SUCCESS && !config.verbosity.jsonOutput) {
    console.error(`${getExitCodeDescription(report.exitCode)} (exit code ${report.exitCode})`);
  }
  return report.exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = ExitCode.UNEXPECTED_ERROR;
  }
);
