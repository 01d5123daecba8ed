/**
 * Command-line tool for Retention PDP
 *
 *   pdp eval    --policy <file> --role <r> --purpose <p> --target <t> --location <l>
 *   pdp verify  --audit <file>
 *   pdp entries --audit <file> [--from <n>] [--to <n>] [--kind DECISION|DELETE] [--limit <n>]
 *   pdp lint    --policy <file> [--strict] [--json]
 *
 * `eval` exits 0 on Permit and 1 on Deny, so it can gate shell pipelines.
 */

import { createAuditLog } from '../src/audit/audit-log.js';
import type { AuditReadRange } from '../src/audit/audit-log.js';
import type { AuditKindValue } from '../src/audit/entry.js';
import { AuditKind } from '../src/audit/entry.js';
import { JsonLinesAuditStorage } from '../src/audit/storage.js';
import { loadConfig } from '../src/config/index.js';
import { describeError } from '../src/core/errors.js';
import type { Logger } from '../src/core/logging/logger.js';
import { createLogger } from '../src/core/logging/logger.js';
import { systemClock } from '../src/core/time/temporal.js';
import { createRequestContext } from '../src/policy/context.js';
import { toDecisionResponse } from '../src/policy/evaluator.js';
import { loadPolicyFile } from '../src/policy/loader.js';
import { Effect } from '../src/policy/schema.js';
import { PolicyStore, evaluateById } from '../src/policy/store.js';
import { createPolicyLinter } from './lint.js';

/**
 * CLI command definition
 */
export interface CLICommand {
  readonly name: string;
  readonly description: string;
  readonly options: readonly CLIOption[];
  readonly execute: (args: CLIArgs) => Promise<CLIResult>;
}

/**
 * CLI option definition
 */
export interface CLIOption {
  /** Option name (e.g., "--policy") */
  readonly name: string;
  /** Short alias (e.g., "-p") */
  readonly alias?: string;
  readonly description: string;
  readonly required?: boolean;
  readonly type: 'string' | 'number' | 'boolean';
}

export type CLIArgs = Readonly<Record<string, string | boolean>>;

/**
 * CLI execution result
 */
export interface CLIResult {
  readonly success: boolean;
  readonly exitCode: number;
  readonly message: string;
  /** Output data (if any) */
  readonly data?: unknown;
  /** Error (if failed) */
  readonly error?: string;
}

function stringArg(args: CLIArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

function integerArg(args: CLIArgs, key: string): number | undefined {
  const value = stringArg(args, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`--${key} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function isAuditKind(value: string): value is AuditKindValue {
  return value === AuditKind.DECISION || value === AuditKind.DELETE;
}

/**
 * Command registry for the pdp tool
 */
export class PdpCLI {
  private commands: Map<string, CLICommand> = new Map();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.registerCommands();
  }

  private registerCommands(): void {
    this.commands.set('eval', {
      name: 'eval',
      description: 'Evaluate a request against a policy file',
      options: [
        { name: '--policy', alias: '-p', description: 'Policy JSON file', type: 'string', required: true },
        { name: '--policy-id', description: 'Policy to evaluate (default: first in file)', type: 'string' },
        { name: '--role', description: 'Requesting role', type: 'string', required: true },
        { name: '--purpose', description: 'Processing purpose', type: 'string', required: true },
        { name: '--target', description: 'Data target', type: 'string', required: true },
        { name: '--location', description: 'Processing location', type: 'string', required: true },
        { name: '--timestamp', description: 'Request time (ISO 8601, default: now)', type: 'string' },
        { name: '--audit', alias: '-a', description: 'Append the decision to this audit log', type: 'string' },
      ],
      execute: async (args) => this.evaluate(args),
    });

    this.commands.set('verify', {
      name: 'verify',
      description: 'Verify the hash chain of an audit log',
      options: [
        { name: '--audit', alias: '-a', description: 'Audit log (JSON lines)', type: 'string', required: true },
      ],
      execute: async (args) => this.verify(args),
    });

    this.commands.set('entries', {
      name: 'entries',
      description: 'List audit log entries',
      options: [
        { name: '--audit', alias: '-a', description: 'Audit log (JSON lines)', type: 'string', required: true },
        { name: '--from', description: 'First sequence number (inclusive)', type: 'number' },
        { name: '--to', description: 'Last sequence number (exclusive)', type: 'number' },
        { name: '--kind', description: 'DECISION or DELETE', type: 'string' },
        { name: '--limit', alias: '-n', description: 'Maximum number of entries', type: 'number' },
      ],
      execute: async (args) => this.listEntries(args),
    });

    this.commands.set('lint', {
      name: 'lint',
      description: 'Lint a policy file',
      options: [
        { name: '--policy', alias: '-p', description: 'Policy JSON file', type: 'string', required: true },
        { name: '--strict', description: 'Treat warnings as errors', type: 'boolean' },
        { name: '--json', description: 'Print the result as JSON', type: 'boolean' },
        { name: '--verbose', alias: '-v', description: 'Show suggestions', type: 'boolean' },
      ],
      execute: async (args) => this.lint(args),
    });
  }

  getCommands(): readonly CLICommand[] {
    return Array.from(this.commands.values());
  }

  /**
   * Execute a command
   */
  async execute(commandName: string, args: CLIArgs): Promise<CLIResult> {
    const command = this.commands.get(commandName);

    if (!command) {
      return {
        success: false,
        exitCode: 1,
        message: `Unknown command: ${commandName}`,
        error: `Available commands: ${Array.from(this.commands.keys()).join(', ')}`,
      };
    }

    for (const option of command.options) {
      if (option.required && typeof args[option.name.replace('--', '')] !== 'string') {
        return {
          success: false,
          exitCode: 1,
          message: `Missing required option: ${option.name}`,
          error: option.description,
        };
      }
    }

    try {
      return await command.execute(args);
    } catch (error) {
      this.logger.debug('Command failed', { command: commandName, error: describeError(error) });
      return {
        success: false,
        exitCode: 1,
        message: 'Command execution failed',
        error: describeError(error),
      };
    }
  }

  /**
   * Parse command line arguments
   */
  parseArgs(argv: readonly string[]): { command: string; args: CLIArgs } {
    const args: Record<string, string | boolean> = {};
    let command = '';

    for (let i = 0; i < argv.length; i++) {
      const arg = argv[i];

      if (!arg) continue;

      if (!arg.startsWith('-') && !command) {
        command = arg;
        continue;
      }

      let key: string | undefined;
      if (arg.startsWith('--')) {
        key = arg.substring(2);
      } else if (arg.startsWith('-')) {
        const option = this.commands
          .get(command)
          ?.options.find((o) => o.alias === arg);
        key = option?.name.replace('--', '');
      }

      if (key === undefined) {
        continue;
      }

      const nextArg = argv[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith('-')) {
        args[key] = nextArg;
        i++;
      } else {
        args[key] = true;
      }
    }

    return { command, args };
  }

  /**
   * Generate help text
   */
  generateHelp(): string {
    const lines: string[] = ['Retention PDP', '', 'Usage: pdp <command> [options]', '', 'Commands:'];

    for (const command of this.commands.values()) {
      lines.push(`  ${command.name.padEnd(15)} ${command.description}`);
    }

    lines.push('', 'Run "pdp <command> --help" for command-specific options.');

    return lines.join('\n');
  }

  generateCommandHelp(commandName: string): string | null {
    const command = this.commands.get(commandName);
    if (!command) {
      return null;
    }

    const lines: string[] = [`pdp ${command.name} - ${command.description}`, '', 'Options:'];

    for (const option of command.options) {
      const aliasStr = option.alias ? `, ${option.alias}` : '';
      const requiredStr = option.required ? ' (required)' : '';
      lines.push(`  ${option.name}${aliasStr}${requiredStr}`, `      ${option.description}`, '');
    }

    return lines.join('\n');
  }

  // Command implementations

  private async evaluate(args: CLIArgs): Promise<CLIResult> {
    const definitions = await loadPolicyFile(String(args['policy']));
    const store = new PolicyStore({ logger: this.logger });
    const set = await store.load(definitions);

    const policyId = stringArg(args, 'policy-id') ?? set.policies[0]?.id;
    if (policyId === undefined) {
      return { success: false, exitCode: 1, message: 'Policy file contains no policies' };
    }

    const context = createRequestContext(
      {
        role: stringArg(args, 'role'),
        purpose: stringArg(args, 'purpose'),
        dataTarget: stringArg(args, 'target'),
        location: stringArg(args, 'location'),
        timestamp: stringArg(args, 'timestamp'),
      },
      systemClock
    );
    const decision = await evaluateById(store, policyId, context);

    const auditPath = stringArg(args, 'audit');
    if (auditPath !== undefined) {
      const auditLog = createAuditLog(new JsonLinesAuditStorage(auditPath), { logger: this.logger });
      await auditLog.append({ kind: AuditKind.DECISION, payload: { policyId, context, decision } });
    }

    const permitted = decision.effect === Effect.PERMIT;
    return {
      success: permitted,
      exitCode: permitted ? 0 : 1,
      message: decision.effect,
      data: toDecisionResponse(decision),
    };
  }

  private async verify(args: CLIArgs): Promise<CLIResult> {
    const auditLog = createAuditLog(new JsonLinesAuditStorage(String(args['audit'])), {
      logger: this.logger,
    });
    const result = await auditLog.verify();

    if (result.valid) {
      return {
        success: true,
        exitCode: 0,
        message: `Audit chain intact (${result.checked} entries)`,
        data: { valid: true, checked: result.checked },
      };
    }

    return {
      success: false,
      exitCode: 1,
      message: `Audit chain broken at entry ${result.firstBadIndex}`,
      data: { valid: false, firstBadIndex: result.firstBadIndex, checked: result.checked },
      error: result.reason,
    };
  }

  private async listEntries(args: CLIArgs): Promise<CLIResult> {
    const kind = stringArg(args, 'kind');
    if (kind !== undefined && !isAuditKind(kind)) {
      return {
        success: false,
        exitCode: 1,
        message: `Unknown entry kind: ${kind}`,
        error: `Expected ${AuditKind.DECISION} or ${AuditKind.DELETE}`,
      };
    }

    const fromSequence = integerArg(args, 'from');
    const toSequence = integerArg(args, 'to');
    const limit = integerArg(args, 'limit');
    const range: AuditReadRange = {
      ...(fromSequence !== undefined && { fromSequence }),
      ...(toSequence !== undefined && { toSequence }),
      ...(kind !== undefined && { kinds: [kind] }),
      ...(limit !== undefined && { limit }),
    };

    const auditLog = createAuditLog(new JsonLinesAuditStorage(String(args['audit'])), {
      logger: this.logger,
    });
    const entries = await auditLog.read(range);

    return {
      success: true,
      exitCode: 0,
      message: `Found ${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`,
      data: entries,
    };
  }

  private async lint(args: CLIArgs): Promise<CLIResult> {
    const definitions = await loadPolicyFile(String(args['policy']));
    const linter = createPolicyLinter({ rules: {}, warningsAsErrors: args['strict'] === true });
    const result = linter.lint(definitions);

    return {
      success: result.passed,
      exitCode: result.passed ? 0 : 1,
      message: result.summary,
      data:
        args['json'] === true
          ? linter.formatResultJSON(result)
          : linter.formatResult(result, args['verbose'] === true),
    };
  }
}

/**
 * Create a CLI instance logging to stderr
 */
export function createPdpCLI(logger?: Logger): PdpCLI {
  if (logger) {
    return new PdpCLI(logger);
  }

  const config = loadConfig();
  return new PdpCLI(
    createLogger({
      service: config.serviceName,
      level: config.logLevel,
      sink: (record) => console.error(JSON.stringify(record)),
    })
  );
}

/**
 * Main entry point for CLI
 */
export async function main(argv: readonly string[], cli: PdpCLI = createPdpCLI()): Promise<number> {
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    console.log(cli.generateHelp());
    return 0;
  }

  const { command, args } = cli.parseArgs(argv);

  if (args['help'] === true) {
    const help = cli.generateCommandHelp(command);
    if (help) {
      console.log(help);
      return 0;
    }
  }

  const result = await cli.execute(command, args);

  if (typeof result.data === 'string') {
    console.log(result.data);
  } else if (result.data !== undefined) {
    if (command === 'eval') {
      console.log(result.message);
    }
    console.log(JSON.stringify(result.data, null, 2));
  }

  if (!result.success && result.error !== undefined) {
    console.error(`Error: ${result.message}`);
    console.error(result.error);
  }

  return result.exitCode;
}
