import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { showHeader } from '../utils/cli-ui.js';
import { readCommandLine, registerRunOptions, runRelaunch, type ParsedCommandLine } from './commands/run-cmd.js';

const PackageJsonSchema = z.object({ version: z.string() });

export function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson = PackageJsonSchema.parse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf8')));
  return packageJson.version;
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('relaunch')
    .description('Run a program and restart it when its source files change')
    .version(version, '-v, --version')
    .exitOverride();

  return registerRunOptions(program);
}

/**
 * Parse user arguments (without the node and script entries of process.argv)
 */
export function parseCliOptions(args: readonly string[], version = '0.0.0'): ParsedCommandLine {
  const program = createProgram(version);
  program.parse([...args], { from: 'user' });
  return readCommandLine(program);
}

export async function runCli(argv: readonly string[] = process.argv): Promise<number> {
  const version = readPackageVersion();

  let parsed: ParsedCommandLine;
  try {
    parsed = parseCliOptions(argv.slice(2), version);
  } catch (error) {
    // Help and --version end parsing through exitOverride as well
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  if (!parsed.flags.dump && !parsed.flags.quiet) {
    showHeader(version);
  }

  return runRelaunch(parsed);
}
