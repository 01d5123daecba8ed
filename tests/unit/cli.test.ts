/**
 * Unit tests for the pdp command-line tool
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PdpCLI, createPdpCLI, main } from '../../cli/pdp.js';
import { silentLogger } from '../../src/core/logging/logger.js';
import { createPolicyBuilder } from '../../src/policy/schema.js';

const policy = createPolicyBuilder('analytics')
  .permit({ id: 'improve-service', role: 'analyst', purpose: 'service-improvement', retentionPeriod: '30d' })
  .deny({ id: 'no-marketing', purpose: 'marketing', dataTarget: 'customers' })
  .buildDefinition();

describe('PdpCLI', () => {
  let directory: string;
  let policyPath: string;
  let auditPath: string;
  let cli: PdpCLI;

  const request = (purpose: string) => [
    '--policy',
    policyPath,
    '--role',
    'analyst',
    '--purpose',
    purpose,
    '--target',
    'customers',
    '--location',
    'EU',
    '--timestamp',
    '2024-01-01T00:00:00Z',
  ];

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'pdp-cli-'));
    policyPath = join(directory, 'policies.json');
    auditPath = join(directory, 'audit.jsonl');
    await writeFile(policyPath, JSON.stringify([policy]));
    cli = createPdpCLI(silentLogger);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  describe('parseArgs', () => {
    it('should resolve aliases against the command', () => {
      expect(cli.parseArgs(['entries', '-a', 'log.jsonl', '--kind', 'DELETE', '-n', '5'])).toEqual({
        command: 'entries',
        args: { audit: 'log.jsonl', kind: 'DELETE', limit: '5' },
      });
    });

    it('should treat options without a value as flags', () => {
      expect(cli.parseArgs(['lint', '--policy', 'p.json', '--strict', '--json']).args).toEqual({
        policy: 'p.json',
        strict: true,
        json: true,
      });
    });
  });

  describe('execute', () => {
    it('should reject unknown commands', async () => {
      const result = await cli.execute('deploy', {});

      expect(result.exitCode).toBe(1);
      expect(result.message).toBe('Unknown command: deploy');
      expect(result.error).toBe('Available commands: eval, verify, entries, lint');
    });

    it('should reject missing required options', async () => {
      const result = await cli.execute('verify', {});
      expect(result.message).toBe('Missing required option: --audit');
    });

    it('should permit with obligations and exit 0', async () => {
      const { args } = cli.parseArgs(['eval', ...request('service-improvement')]);
      const result = await cli.execute('eval', args);

      expect(result).toEqual({
        success: true,
        exitCode: 0,
        message: 'Permit',
        data: { effect: 'Permit', obligations: [{ dataTarget: 'customers', retentionPeriod: '30d' }] },
      });
    });

    it('should deny and exit 1', async () => {
      const { args } = cli.parseArgs(['eval', ...request('marketing')]);
      const result = await cli.execute('eval', args);

      expect(result.exitCode).toBe(1);
      expect(result.message).toBe('Deny');
      expect(result.data).toEqual({ effect: 'Deny', obligations: [] });
    });

    it('should report invalid requests as failures', async () => {
      const { args } = cli.parseArgs(['eval', ...request('*')]);
      const result = await cli.execute('eval', args);

      expect(result.message).toBe('Command execution failed');
      expect(result.error).toBe('Invalid request context: purpose: must be a concrete value, not "*"');
    });

    it('should append decisions to an audit log and verify it', async () => {
      for (const purpose of ['service-improvement', 'marketing']) {
        const { args } = cli.parseArgs(['eval', ...request(purpose), '--audit', auditPath]);
        await cli.execute('eval', args);
      }

      const verified = await cli.execute('verify', { audit: auditPath });
      expect(verified.message).toBe('Audit chain intact (2 entries)');
      expect(verified.data).toEqual({ valid: true, checked: 2 });

      const listed = await cli.execute('entries', { audit: auditPath, from: '1' });
      expect(listed.message).toBe('Found 1 entry');
    });

    it('should report the first broken entry', async () => {
      const { args } = cli.parseArgs(['eval', ...request('service-improvement'), '--audit', auditPath]);
      await cli.execute('eval', args);
      const raw = await readFile(auditPath, 'utf8');
      await writeFile(auditPath, raw.replace('"role":"analyst"', '"role":"admin"'));

      const result = await cli.execute('verify', { audit: auditPath });

      expect(result.exitCode).toBe(1);
      expect(result.message).toBe('Audit chain broken at entry 0');
      expect(result.data).toEqual({ valid: false, firstBadIndex: 0, checked: 0 });
      expect(result.error).toBe('hash does not match entry contents');
    });

    it('should validate entry filters', async () => {
      expect((await cli.execute('entries', { audit: auditPath, kind: 'BOGUS' })).message).toBe(
        'Unknown entry kind: BOGUS'
      );

      const badRange = await cli.execute('entries', { audit: auditPath, from: 'abc' });
      expect(badRange.error).toBe('--from must be a non-negative integer, got "abc"');
    });

    it('should lint a policy file', async () => {
      const result = await cli.execute('lint', { policy: policyPath });

      expect(result.exitCode).toBe(0);
      expect(result.message).toBe('Linted 1 policies - no issues found');
    });
  });

  describe('main', () => {
    it('should print help without a command', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      expect(await main([], cli)).toBe(0);
      expect(log).toHaveBeenCalledWith(cli.generateHelp());
    });

    it('should print command help', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      expect(await main(['verify', '--help'], cli)).toBe(0);
      expect(log).toHaveBeenCalledWith(cli.generateCommandHelp('verify'));
    });

    it('should print the effect and response of eval', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      expect(await main(['eval', ...request('service-improvement')], cli)).toBe(0);
      expect(log.mock.calls).toEqual([
        ['Permit'],
        [JSON.stringify({ effect: 'Permit', obligations: [{ dataTarget: 'customers', retentionPeriod: '30d' }] }, null, 2)],
      ]);
    });

    it('should print errors to stderr', async () => {
      const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(await main(['verify'], cli)).toBe(1);
      expect(error.mock.calls).toEqual([['Error: Missing required option: --audit'], ['Audit log (JSON lines)']]);
    });
  });
});
