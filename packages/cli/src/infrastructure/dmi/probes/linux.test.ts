/**
 * Linux Probe Tests
 *
 * Uses a temporary directory laid out like /sys/class/dmi/id.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LinuxProbe } from './linux.js';
import { outcomeFromFsError } from './outcomes.js';

describe('LinuxProbe', () => {
  let dmiDir: string;

  beforeEach(() => {
    dmiDir = mkdtempSync(join(tmpdir(), 'dmi-linux-'));
  });

  afterEach(() => {
    rmSync(dmiDir, { recursive: true, force: true });
  });

  it('reads each field from its sysfs file', async () => {
    writeFileSync(join(dmiDir, 'product_uuid'), '123e4567-e89b-12d3-a456-426614174000\n');
    writeFileSync(join(dmiDir, 'sys_vendor'), 'LENOVO\n');

    const report = await new LinuxProbe({ dmiDir }).probe();

    expect(report.system_uuid).toEqual({
      status: 'value',
      value: '123e4567-e89b-12d3-a456-426614174000\n',
    });
    expect(report.manufacturer).toEqual({ status: 'value', value: 'LENOVO\n' });
  });

  it('reports missing files as unavailable', async () => {
    const report = await new LinuxProbe({ dmiDir }).probe();

    expect(report.board_serial?.status).toBe('unavailable');
    expect(report.product_serial?.status).toBe('unavailable');
  });

  it('reports every field as unavailable when the directory does not exist', async () => {
    const report = await new LinuxProbe({ dmiDir: join(dmiDir, 'missing') }).probe();

    expect(Object.keys(report).sort()).toEqual([
      'board_serial',
      'chassis_serial',
      'manufacturer',
      'product_name',
      'product_serial',
      'system_uuid',
    ]);
    expect(Object.values(report).every((outcome) => outcome?.status === 'unavailable')).toBe(true);
  });

  it('reports an unreadable entry as unavailable without failing the others', async () => {
    // A directory where a file is expected fails with EISDIR
    mkdirSync(join(dmiDir, 'board_serial'));
    writeFileSync(join(dmiDir, 'product_name'), 'Precision 5570\n');

    const report = await new LinuxProbe({ dmiDir }).probe();

    expect(report.board_serial?.status).toBe('unavailable');
    expect(report.product_name).toEqual({ status: 'value', value: 'Precision 5570\n' });
  });

  it('never reports a BIOS serial, which sysfs does not expose', async () => {
    const report = await new LinuxProbe({ dmiDir }).probe();

    expect(report.bios_serial).toBeUndefined();
  });
});

describe('outcomeFromFsError', () => {
  function fsError(code: string): NodeJS.ErrnoException {
    const error: NodeJS.ErrnoException = new Error(`${code}: test`);
    error.code = code;
    return error;
  }

  it('maps permission errors to denied', () => {
    expect(outcomeFromFsError(fsError('EACCES'))).toEqual({ status: 'denied', reason: 'EACCES: test' });
    expect(outcomeFromFsError(fsError('EPERM'))).toEqual({ status: 'denied', reason: 'EPERM: test' });
  });

  it('maps missing files to unavailable', () => {
    expect(outcomeFromFsError(fsError('ENOENT'))).toEqual({
      status: 'unavailable',
      reason: 'ENOENT: test',
    });
  });

  it('accepts non-Error values', () => {
    expect(outcomeFromFsError('weird')).toEqual({ status: 'unavailable', reason: 'weird' });
  });
});
