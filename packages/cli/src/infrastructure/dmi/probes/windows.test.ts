/**
 * Windows Probe Tests
 *
 * The PowerShell query is replaced by a fake CommandRunner.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CommandResult, CommandRunner } from '../command-runner.js';
import { CommandNotFoundError } from '../errors.js';
import { parseCimOutput, WindowsProbe } from './windows.js';

function runnerReturning(result: CommandResult): CommandRunner {
  return vi.fn(async () => result);
}

const CIM_OUTPUT = JSON.stringify({
  UUID: '4C4C4544-0042-4D10-8051-B7C04F564433',
  IdentifyingNumber: 'B7Q4VK3',
  Name: 'Latitude 7420',
  Vendor: 'Dell Inc.',
  BiosSerial: 'B7Q4VK3',
  BoardSerial: '/B7Q4VK3/CNWS20019E00AB/',
  ChassisSerial: null,
});

describe('WindowsProbe', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('maps CIM properties to fields', async () => {
    const runner = runnerReturning({ exitCode: 0, stdout: `${CIM_OUTPUT}\r\n`, stderr: '' });

    const report = await new WindowsProbe({ runner }).probe();

    expect(report).toEqual({
      system_uuid: { status: 'value', value: '4C4C4544-0042-4D10-8051-B7C04F564433' },
      product_serial: { status: 'value', value: 'B7Q4VK3' },
      board_serial: { status: 'value', value: '/B7Q4VK3/CNWS20019E00AB/' },
      chassis_serial: { status: 'unavailable', reason: 'ChassisSerial not reported' },
      bios_serial: { status: 'value', value: 'B7Q4VK3' },
      product_name: { status: 'value', value: 'Latitude 7420' },
      manufacturer: { status: 'value', value: 'Dell Inc.' },
    });
  });

  it('runs powershell without a profile and with the configured timeout', async () => {
    const runner = runnerReturning({ exitCode: 0, stdout: CIM_OUTPUT, stderr: '' });

    await new WindowsProbe({ runner, timeoutMs: 1234 }).probe();

    expect(runner).toHaveBeenCalledWith(
      'powershell.exe',
      expect.arrayContaining(['-NoProfile', '-NonInteractive', '-Command']),
      { timeoutMs: 1234 }
    );
  });

  it('completes within the timeout when the query never returns', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const runner: CommandRunner = () => new Promise<CommandResult>(() => {});
    const startedAt = Date.now();

    const report = await new WindowsProbe({ runner, timeoutMs: 100 }).probe();

    expect(Date.now() - startedAt).toBeLessThan(2000);
    expect(report.system_uuid).toEqual({
      status: 'unavailable',
      reason: 'CIM query timed out after 100ms',
    });
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('reports every field as unavailable when powershell is missing', async () => {
    const runner: CommandRunner = async () => {
      throw new CommandNotFoundError('powershell.exe');
    };

    const report = await new WindowsProbe({ runner }).probe();

    expect(Object.keys(report)).toHaveLength(7);
    expect(report.system_uuid).toEqual({
      status: 'unavailable',
      reason: 'Command not found: powershell.exe',
    });
  });

  it('reports every field as unavailable on a non-zero exit', async () => {
    const runner = runnerReturning({ exitCode: 1, stdout: '', stderr: 'Access denied' });

    const report = await new WindowsProbe({ runner }).probe();

    expect(report.bios_serial).toEqual({
      status: 'unavailable',
      reason: 'powershell exited with code 1',
    });
  });

  it('reports every field as unavailable on malformed output', async () => {
    const runner = runnerReturning({ exitCode: 0, stdout: 'not json', stderr: '' });

    const report = await new WindowsProbe({ runner }).probe();

    expect(report.system_uuid?.status).toBe('unavailable');
    expect(report.manufacturer?.status).toBe('unavailable');
  });
});

describe('parseCimOutput', () => {
  it('parses a compact JSON object', () => {
    expect(parseCimOutput('{"UUID":"abc"}\r\n')).toEqual({ UUID: 'abc' });
  });

  it('rejects empty output', () => {
    expect(() => parseCimOutput('  ')).toThrow('Could not parse CIM query output: empty output');
  });

  it('rejects JSON that is not an object', () => {
    expect(() => parseCimOutput('[1,2]')).toThrow('expected a JSON object');
  });
});
