#!/usr/bin/env node
// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

/**
 * Script to convert an xcodebuild log into a compilation database.
 */

import * as fs from 'fs';
import * as commander from 'commander';
import {type Logger, StderrLogger, VerboseLogger} from '../logs';
import {
  type CliOptions,
  type ConverterConfig,
  DEFAULT_OUTPUT,
  STDOUT,
  configFromOptions,
} from '../features/compdb/config';
import {type ConversionResult, convert} from '../features/compdb/converter';
import {readLog} from '../features/compdb/log_input';

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Reads the log, converts it and writes the compilation database.
 *
 * The output file is created only once the input has been read, and is
 * removed again if the conversion fails.
 *
 * @throws CompdbError if the input does not exist or cannot be converted.
 */
export async function run(
  config: ConverterConfig,
  logger: Logger
): Promise<ConversionResult> {
  const lines = await readLog(config.input);
  const options = {
    excludeDirectory: config.excludeDirectory,
    excludeFile: config.excludeFile,
    logger: new VerboseLogger(logger, config.verbose),
  };
  if (config.output === STDOUT) {
    return convert(lines, process.stdout, options);
  }

  const fd = fs.openSync(config.output, 'w');
  const sink = {write: (chunk: string) => fs.writeSync(fd, chunk)};
  let result: ConversionResult;
  try {
    result = convert(lines, sink, options);
  } catch (e) {
    fs.closeSync(fd);
    await fs.promises.rm(config.output, {force: true});
    throw e;
  }
  fs.closeSync(fd);
  return result;
}

export function createProgram(logger: Logger): commander.Command {
  return commander
    .createCommand('xcbuild-compdb')
    .description('converts an xcodebuild log into a compilation database')
    .argument('<input>', "build log, JSON-lines log (.jsonl, .json) or '-'")
    .option(
      '-o, --output <file>',
      "compilation database to write, '-' for stdout",
      DEFAULT_OUTPUT
    )
    .option(
      '--exclude-directory <regex>',
      'skip build steps run in matching directories; repeatable',
      collect,
      []
    )
    .option(
      '--exclude-file <regex>',
      'skip entries compiling matching files; repeatable',
      collect,
      []
    )
    .option('-v, --verbose', 'log skipped build steps to stderr', false)
    .action(async (input: string, options: CliOptions) => {
      const config = configFromOptions(input, options);
      const result = await run(config, logger);
      logger.append(
        `Wrote ${result.entries} entries to ${config.output} ` +
          `(${result.pchMappings} precompiled headers)\n`
      );
    });
}

async function main() {
  await createProgram(new StderrLogger()).parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(e => {
    console.error(e instanceof Error ? e.message : e);
    // eslint-disable-next-line no-process-exit
    process.exit(1);
  });
}
