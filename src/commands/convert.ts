import { readFile, writeFile } from 'node:fs/promises';
import type { Command } from 'commander';
import { dumpPyVar, formatDump } from '../dump';
import { convertBytes, planConversion, type PlanOptions } from '../formats';
import { createReporter, type OutputReporter } from '../output';
import { fieldText } from '../record';
import { parsePyVar } from '../codec';

export interface ConvertOptions extends PlanOptions {
  dump?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/** Writing to this output path sends the result to stdout. */
export const STDOUT_PATH = '-';

/**
 * Read `file`, then either dump its fields or convert it and write the
 * result. Returns the path written, or undefined for a dump.
 */
export async function runConvert(
  file: string,
  options: ConvertOptions,
  reporter: OutputReporter,
): Promise<string | undefined> {
  const input = new Uint8Array(await readFile(file));
  reporter.debug(`read ${input.length} bytes from ${file}`);

  if (options.dump) {
    reporter.dump(formatDump(dumpPyVar(input), text => reporter.label(text)));
    return undefined;
  }

  const plan = planConversion(file, options, input);
  reporter.debug(`converting ${plan.inputFormat} → ${plan.outputFormat}`);

  const output = convertBytes(input, plan);

  if (plan.inputFormat === 'pyvar' && reporter.isVerbose) {
    const record = parsePyVar(input);
    reporter.debug(`variable name: ${JSON.stringify(fieldText(record.variableName))}`);
    if (record.longFilename !== undefined) {
      reporter.debug(`long filename: ${JSON.stringify(fieldText(record.longFilename))}`);
    }
  }

  if (plan.outputPath === STDOUT_PATH) {
    process.stdout.write(output);
  } else {
    await writeFile(plan.outputPath, output);
  }
  reporter.success(`wrote ${output.length} bytes to ${plan.outputPath === STDOUT_PATH ? 'stdout' : plan.outputPath}`);
  return plan.outputPath;
}

export function registerConvertCommand(program: Command): void {
  program
    .argument('<file>', 'file to convert (.py/.txt source or .8xv container)')
    .option('-o, --outfile <path>', `output path ('${STDOUT_PATH}' for stdout); inferred from <file> when omitted`)
    .option('-f, --format <format>', 'format of <file>: 8xv|py|txt (default: from the extension)')
    .option('-t, --target-format <format>', 'format to convert to (default: the other one)')
    .option('-N, --varname <name>', 'variable name on the calculator, up to 8 bytes (text → 8xv only)')
    .option('-F, --filename <name>', 'long file name on the calculator, up to 255 bytes (text → 8xv only)')
    .option('-I, --info <text>', 'header comment, up to 42 bytes (text → 8xv only)')
    .option('-d, --dump', 'print every field of a .8xv container instead of converting')
    .option('-v, --verbose', 'verbose output')
    .option('-q, --quiet', 'only report errors')
    .action(async (file: string, opts: ConvertOptions) => {
      await runConvert(file, opts, createReporter(opts));
    });
}
