import { Command, CommanderError } from 'commander';
import { registerConvertCommand } from './commands/convert';
import { registerLicenseOption } from './license';
import { createReporter } from './output';

const program = new Command();

program
  .name('pyvar')
  .description('Convert between Python source and TI-83 Premium CE / TI-84 Plus CE Python AppVars (.8xv)')
  .version('0.1.0', '-V, --version');

registerLicenseOption(program);

registerConvertCommand(program);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help, --version, --license and usage errors already printed their own output
      process.exitCode = error.exitCode;
      return;
    }
    const { verbose, quiet } = program.opts<{ verbose?: boolean; quiet?: boolean }>();
    createReporter({ verbose, quiet }).error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

void main();
