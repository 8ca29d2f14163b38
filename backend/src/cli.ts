#!/usr/bin/env node

/**
 * Command line front end.
 *
 * Exit codes: 0 success or dry run, 1 failure, 2 authorization denied,
 * 3 no device.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  configWarnings,
  ConfigValidationError,
  getConfigSummary,
  loadEnvironmentConfig,
  type EnvironmentConfig
} from './config';
import { applyLoggingSettings, createServiceLogger } from './services/logger';
import {
  AmbiguousDeviceError,
  createOrchestrator,
  DeviceNotFoundError,
  NoDeviceError,
  type Orchestrator
} from './services/orchestrator';
import { AuthorizationDeniedError, CatalogError, EngineError, UnknownMethodError } from './services/bypass/errors';
import { CommunicationError, errorMessage } from './services/communication/errors';
import { verifyAuditLog } from './services/audit/auditSink';
import { hex4, type DeviceSnapshot } from './types/device';
import type { BypassSession } from './types/session';
import type { PlannedCandidate } from './types/bypass';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  AUTHORIZATION_DENIED: 2,
  NO_DEVICE: 3
} as const;

export type CliOrchestrator = Pick<Orchestrator, 'detect' | 'info' | 'bypass' | 'methods' | 'shutdown'>;

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  orchestrator: () => CliOrchestrator;
  auditSecret: () => string;
  auditLogPath: () => string;
  io?: CliIO;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export function exitCodeFor(error: unknown): number {
  if (error instanceof AuthorizationDeniedError) return EXIT_CODES.AUTHORIZATION_DENIED;
  if (error instanceof NoDeviceError || error instanceof DeviceNotFoundError) return EXIT_CODES.NO_DEVICE;
  return EXIT_CODES.FAILURE;
}

export function exitCodeForSession(session: BypassSession): number {
  return session.finalStatus === 'Success' || session.finalStatus === 'DryRun' ? EXIT_CODES.OK : EXIT_CODES.FAILURE;
}

// ============================================================================
// Rendering
// ============================================================================

const STATUS_COLOURS: Record<string, (text: string) => string> = {
  Success: chalk.green,
  DryRun: chalk.cyan,
  ExhaustedAllMethods: chalk.yellow,
  Aborted: chalk.red,
  Failed: chalk.yellow,
  Error: chalk.red
};

const colourStatus = (status: string): string => (STATUS_COLOURS[status] ?? chalk.white)(status);

function deviceTable(devices: readonly DeviceSnapshot[]): string {
  const table = new Table({ head: ['Serial', 'USB id', 'Manufacturer', 'Mode', 'Model', 'Android', 'Lock'] });
  for (const device of devices) {
    table.push([
      device.serial,
      `${hex4(device.vendorId)}:${hex4(device.productId)}`,
      device.manufacturer,
      device.mode,
      device.model ?? '-',
      device.androidVersion ? `${device.androidVersion} (API ${device.apiLevel ?? '?'})` : '-',
      device.lockState
    ]);
  }
  return table.toString();
}

function planTable(plan: readonly PlannedCandidate[]): string {
  const table = new Table({ head: ['#', 'Method', 'Weight', 'Risk', 'Mode', 'Note'] });
  plan.forEach((candidate, index) => {
    table.push([
      String(index + 1),
      candidate.methodName,
      candidate.weight.toFixed(3),
      String(candidate.riskTier),
      candidate.requiresSwitchFrom ? `${candidate.requiresSwitchFrom} -> ${candidate.requiredMode}` : candidate.requiredMode,
      candidate.previewNote ?? (candidate.cacheHint ? 'cached success' : '')
    ]);
  });
  return table.toString();
}

function sessionReport(session: BypassSession): string[] {
  const lines = [
    `${chalk.bold('Session')} ${session.sessionId}`,
    `Device ${session.deviceSerial} (${session.modelName}, ${session.profileSource} profile)`,
    planTable(session.plan)
  ];

  if (session.attempts.length > 0) {
    const attempts = new Table({ head: ['Method', 'Try', 'Status', 'Steps', 'Duration', 'Detail'] });
    for (const attempt of session.attempts) {
      attempts.push([
        attempt.methodName,
        String(attempt.attemptNumber),
        colourStatus(attempt.status),
        String(attempt.completedSteps.length),
        `${attempt.executionDurationMs}ms`,
        attempt.errorMessage ?? ''
      ]);
    }
    lines.push(attempts.toString());
  }

  lines.push(`${colourStatus(session.finalStatus ?? 'Aborted')} ${session.summary ?? ''}`);
  return lines;
}

// ============================================================================
// Program
// ============================================================================

interface JsonOption {
  json?: boolean;
}

interface BypassOptions extends JsonOption {
  serial?: string;
  method?: string;
  dryRun?: boolean;
}

export function createProgram(deps: CliDependencies): { program: Command; exitCode: () => number } {
  const io = deps.io ?? consoleIO;
  let exitCode: number = EXIT_CODES.OK;

  const run = async (work: (orchestrator: CliOrchestrator) => Promise<number>): Promise<void> => {
    let orchestrator: CliOrchestrator | undefined;
    try {
      orchestrator = deps.orchestrator();
      exitCode = await work(orchestrator);
    } catch (error) {
      exitCode = exitCodeFor(error);
      reportError(io, error);
    } finally {
      await orchestrator?.shutdown();
    }
  };

  const program = new Command();
  program.name('frp-orchestrator').description('Android device detection and reset-protection workflow orchestration').version('1.0.0');

  program
    .command('detect')
    .description('List attached Android devices')
    .option('--json', 'Print JSON', false)
    .action((options: JsonOption) =>
      run(async orchestrator => {
        const devices = await orchestrator.detect();
        if (options.json) {
          io.out(JSON.stringify(devices, null, 2));
        } else if (devices.length > 0) {
          io.out(deviceTable(devices));
        } else {
          io.out(chalk.yellow('No supported devices attached.'));
        }
        return devices.length > 0 ? EXIT_CODES.OK : EXIT_CODES.NO_DEVICE;
      })
    );

  program
    .command('info')
    .description('Show one device, its profile and the ranked plan')
    .argument('<serial>', 'Device serial')
    .option('--json', 'Print JSON', false)
    .action((serial: string, options: JsonOption) =>
      run(async orchestrator => {
        const info = await orchestrator.info(serial);
        if (options.json) {
          io.out(
            JSON.stringify(
              {
                snapshot: info.snapshot,
                profile: {
                  source: info.resolved.source,
                  modelName: info.resolved.profile.modelName,
                  difficulty: info.resolved.profile.difficulty,
                  apiRange: info.resolved.profile.apiRange,
                  methods: Object.fromEntries(info.resolved.profile.declaredSuccessRate)
                },
                plan: info.plan,
                lastSession: info.lastSession?.summary
              },
              null,
              2
            )
          );
          return EXIT_CODES.OK;
        }

        io.out(deviceTable([info.snapshot]));
        io.out(
          `Profile: ${info.resolved.profile.modelName} (${info.resolved.source}, ${info.resolved.profile.difficulty})`
        );
        io.out(info.plan.length > 0 ? planTable(info.plan) : chalk.yellow('No applicable methods.'));
        return EXIT_CODES.OK;
      })
    );

  program
    .command('bypass')
    .description('Run the ranked methods against one device')
    .option('-s, --serial <serial>', 'Device serial; defaults to the only attached device')
    .option('-m, --method <name>', 'Run only this method')
    .option('--dry-run', 'Rank and report without sending any command', false)
    .option('--json', 'Print JSON', false)
    .action((options: BypassOptions) =>
      run(async orchestrator => {
        const session = await orchestrator.bypass({
          serial: options.serial,
          method: options.method,
          dryRun: options.dryRun
        });
        if (options.json) {
          io.out(JSON.stringify(session, null, 2));
        } else {
          sessionReport(session).forEach(line => io.out(line));
        }
        return exitCodeForSession(session);
      })
    );

  program
    .command('methods')
    .description('List registered method descriptors')
    .option('--json', 'Print JSON', false)
    .action((options: JsonOption) =>
      run(async orchestrator => {
        const methods = orchestrator.methods();
        if (options.json) {
          io.out(JSON.stringify(methods, null, 2));
          return EXIT_CODES.OK;
        }
        const table = new Table({ head: ['Method', 'Kind', 'Mode', 'Risk', 'Steps', 'Manufacturers'] });
        for (const method of methods) {
          table.push([
            method.name,
            method.kind,
            method.requiredMode,
            String(method.riskTier),
            String(method.steps.length),
            method.manufacturers?.join(', ') ?? 'any'
          ]);
        }
        io.out(table.toString());
        return EXIT_CODES.OK;
      })
    );

  program
    .command('audit-verify')
    .description('Check the HMAC chain of an audit log')
    .argument('[file]', 'Audit log path; defaults to the configured one')
    .action(async (file: string | undefined) => {
      try {
        const result = await verifyAuditLog(file ?? deps.auditLogPath(), deps.auditSecret());
        if (result.valid) {
          io.out(chalk.green(`Audit chain intact (${result.records} records)`));
          exitCode = EXIT_CODES.OK;
        } else {
          io.out(chalk.red(`Audit chain broken at line ${result.brokenAt}`));
          exitCode = EXIT_CODES.FAILURE;
        }
      } catch (error) {
        exitCode = exitCodeFor(error);
        reportError(io, error);
      }
    });

  return { program, exitCode: () => exitCode };
}

function reportError(io: CliIO, error: unknown): void {
  if (error instanceof ConfigValidationError) {
    io.err(chalk.red(`Configuration error: ${error.message}`));
    if (error.suggestion) io.err(chalk.gray(`  ${error.suggestion}`));
    return;
  }
  if (error instanceof AuthorizationDeniedError) {
    io.err(chalk.red(`Denied: ${error.message}`));
    return;
  }
  if (
    error instanceof NoDeviceError ||
    error instanceof DeviceNotFoundError ||
    error instanceof AmbiguousDeviceError ||
    error instanceof UnknownMethodError
  ) {
    io.err(chalk.yellow(error.message));
    return;
  }
  if (error instanceof EngineError || error instanceof CommunicationError || error instanceof CatalogError) {
    io.err(chalk.red(`${error.name}: ${error.message}`));
    return;
  }
  io.err(chalk.red(`Error: ${errorMessage(error)}`));
}

function loadConfigOrExit(): EnvironmentConfig {
  try {
    return loadEnvironmentConfig();
  } catch (error) {
    reportError(consoleIO, error);
    process.exit(EXIT_CODES.FAILURE);
  }
}

const main = async (): Promise<void> => {
  const config = loadConfigOrExit();
  applyLoggingSettings(config.logging);
  createServiceLogger('cli').debug('config_loaded', 'Configuration loaded', undefined, getConfigSummary(config));
  configWarnings(config).forEach(warning => consoleIO.err(chalk.yellow(`Warning: ${warning}`)));

  const { program, exitCode } = createProgram({
    orchestrator: () => createOrchestrator(config),
    auditSecret: () => config.security.auditHmacSecret,
    auditLogPath: () => config.storage.auditLogPath
  });

  await program.parseAsync(process.argv);
  process.exit(exitCode());
};

if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('Fatal:'), errorMessage(error));
    process.exit(EXIT_CODES.FAILURE);
  });
}
