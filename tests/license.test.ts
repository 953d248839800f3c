/**
 * pyvar — license option
 */

import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import { readLicense, registerLicenseOption } from '../src/license';

describe('registerLicenseOption', () => {
  it('reads the packaged license', () => {
    expect(readLicense().split('\n')[0]).toBe('BSD 3-Clause License');
  });

  it('prints the license without requiring <file>', async () => {
    const written: string[] = [];
    const program = new Command().exitOverride().argument('<file>');
    registerLicenseOption(program, text => { written.push(text); });

    await expect(program.parseAsync(['-l'], { from: 'user' })).rejects.toMatchObject({
      code:     'pyvar.license',
      exitCode: 0,
    });
    expect(written).toEqual([readLicense()]);
  });

  it('stays out of the way of a normal run', async () => {
    const written: string[] = [];
    let seen = '';
    const program = new Command()
      .exitOverride()
      .argument('<file>')
      .action((file: string) => { seen = file; });
    registerLicenseOption(program, text => { written.push(text); });

    await program.parseAsync(['hello.py'], { from: 'user' });
    expect(seen).toBe('hello.py');
    expect(written).toEqual([]);
  });
});
