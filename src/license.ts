/**
 * pyvar — license text for `pyvar --license`
 *
 * LICENSE sits one directory above both src/license.ts and the bundled
 * dist/cli.js, so the same relative URL resolves in either.
 */

import { readFileSync } from 'node:fs';
import { CommanderError, type Command } from 'commander';

export const LICENSE_URL = new URL('../LICENSE', import.meta.url);

export function readLicense(url: URL = LICENSE_URL): string {
  return readFileSync(url, 'utf8');
}

/**
 * Add `-l, --license`. Like --version it prints and stops before <file> is
 * required, ending the parse with a CommanderError whose exit code is 0.
 */
export function registerLicenseOption(
  program: Command,
  write: (text: string) => void = text => { process.stdout.write(text); },
): void {
  program.option('-l, --license', 'print the license and exit');
  program.on('option:license', () => {
    write(readLicense());
    throw new CommanderError(0, 'pyvar.license', 'license printed');
  });
}
