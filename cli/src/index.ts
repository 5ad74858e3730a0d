#!/usr/bin/env node
/**
 * bird-typefill CLI entry point.
 *
 * Usage:
 *   bird-typefill <file.conf>            Print the file with return types added
 *   bird-typefill -i <file.conf>         Add return types in place
 *   bird-typefill <dir>                  Every *.conf file under <dir>
 *   bird-typefill --check <dir>          Exit 3 if any function needs a return type
 */

import chalk from 'chalk';
import { CliArgs, parseArgs } from './args';
import { loadConfigFile, MigrateOptions, resolveOptions } from './config';
import { ExitCode, exitCodeFor, processPath } from './driver';
import { ConfigError, PathNotFoundError, UsageError, errorMessage } from './errors';
import { detectLang, messagesFor } from './messages';
import { renderOutput, renderReport, renderUsage } from './report';

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const fallbackMessages = messagesFor(detectLang(process.env));

  if (args.length === 0) {
    console.log(renderUsage(fallbackMessages, false));
    return ExitCode.Success;
  }

  let cli: CliArgs;
  let options: MigrateOptions;
  try {
    cli = parseArgs(args);
    options = resolveOptions(cli.overrides, cli.configPath ? loadConfigFile(cli.configPath) : {});
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(chalk.red(`Error: ${e.message}`));
      console.error(renderUsage(fallbackMessages, false));
      return ExitCode.Failure;
    }
    if (e instanceof ConfigError) {
      console.error(chalk.red(fallbackMessages.processingError(e.message)));
      return ExitCode.Failure;
    }
    throw e;
  }

  const messages = messagesFor(options.lang);

  if (cli.help) {
    console.log(renderUsage(messages, true));
    return ExitCode.Success;
  }

  if (!cli.path) {
    console.error(chalk.red(messages.missingArgs));
    console.error(renderUsage(messages, false));
    return ExitCode.Failure;
  }

  // Ctrl-C stops new files from starting; files already in flight finish.
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    const batch = await processPath(cli.path, options, controller.signal);

    if (!options.inPlace && !options.check) {
      process.stdout.write(renderOutput(batch));
    }
    for (const line of renderReport(batch, options, messages)) {
      console.error(line);
    }

    return exitCodeFor(batch, options);
  } catch (e) {
    if (e instanceof PathNotFoundError) {
      console.error(chalk.red(messages.pathNotFound(e.path)));
      return ExitCode.Failure;
    }
    throw e;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

main().then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(chalk.red(messagesFor(detectLang(process.env)).processingError(errorMessage(e))));
    process.exitCode = ExitCode.Failure;
  },
);
