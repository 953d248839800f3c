/**
 * pyvar — convert command
 *
 * Drives runConvert() against real files in a per-test temp directory.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { runConvert } from '../src/commands/convert';
import { createReporter } from '../src/output';
import { fieldText, parsePyVar, recordText } from '../src/index';

let dir: string;
const quiet = createReporter({ quiet: true });

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'pyvar-test-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('runConvert', () => {
  it('writes a .8xv beside a .py file', async () => {
    const input = join(dir, 'hello.py');
    await writeFile(input, 'print("hi")\n');

    const written = await runConvert(input, { varname: 'HELLO' }, quiet);

    expect(written).toBe(join(dir, 'hello.8xv'));
    const record = parsePyVar(new Uint8Array(await readFile(join(dir, 'hello.8xv'))));
    expect(recordText(record)).toBe('print("hi")\n');
    expect(fieldText(record.variableName)).toBe('HELLO');
  });

  it('round-trips back to source text', async () => {
    const input = join(dir, 'loop.py');
    await writeFile(input, 'for i in range(3):\n  print(i)\n');
    await runConvert(input, { filename: 'loop.py' }, quiet);

    const output = join(dir, 'restored.py');
    await runConvert(join(dir, 'loop.8xv'), { outfile: output }, quiet);

    expect(await readFile(output, 'utf8')).toBe('for i in range(3):\n  print(i)\n');
  });

  it('dumps fields to stdout instead of converting', async () => {
    const input = join(dir, 'x.py');
    await writeFile(input, 'x = 1');
    await runConvert(input, { varname: 'XVAR' }, quiet);

    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const written = await runConvert(join(dir, 'x.8xv'), { dump: true }, quiet);

    expect(written).toBeUndefined();
    expect(log).toHaveBeenCalledTimes(14);
    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines.some(line => line.endsWith(': "XVAR"'))).toBe(true);
    expect(lines.some(line => line.endsWith(': "x = 1"'))).toBe(true);
  });

  it('propagates codec errors for a corrupt container', async () => {
    const input = join(dir, 'broken.8xv');
    await writeFile(input, new Uint8Array(100));
    await expect(runConvert(input, {}, quiet)).rejects.toThrow('Not a Python AppVar container');
  });

  it('propagates read errors for a missing file', async () => {
    await expect(runConvert(join(dir, 'missing.py'), {}, quiet)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
