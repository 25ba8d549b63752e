// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import type {Exclusion} from './section_scanner';

export const DEFAULT_OUTPUT = 'compile_commands.json';

/** Output name that writes the database to stdout. */
export const STDOUT = '-';

/**
 * Options as parsed from the command line.
 */
export interface CliOptions {
  output?: string;
  excludeDirectory?: string[];
  excludeFile?: string[];
  verbose?: boolean;
}

export interface ConverterConfig {
  input: string;
  output: string;
  excludeDirectory: Exclusion;
  excludeFile: Exclusion;
  verbose: boolean;
}

/**
 * Thrown for command line options that cannot be used.
 */
export class UsageError extends Error {}

/**
 * Builds a predicate matching values against any of the regular expressions.
 * An empty list matches no value.
 *
 * @throws UsageError if a pattern is not a valid regular expression.
 */
export function exclusionPredicate(patterns: readonly string[]): Exclusion {
  const regexps = patterns.map(pattern => {
    try {
      return new RegExp(pattern);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new UsageError(`invalid exclusion pattern ${pattern}: ${reason}`);
    }
  });
  return value => regexps.some(re => re.test(value));
}

export function configFromOptions(
  input: string,
  options: CliOptions
): ConverterConfig {
  return {
    input,
    output: options.output ?? DEFAULT_OUTPUT,
    excludeDirectory: exclusionPredicate(options.excludeDirectory ?? []),
    excludeFile: exclusionPredicate(options.excludeFile ?? []),
    verbose: options.verbose ?? false,
  };
}
