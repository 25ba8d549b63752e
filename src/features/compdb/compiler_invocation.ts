// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as path from 'path';
import * as shutil from '../../common/shutil';

/**
 * Compiler drivers whose invocations are turned into compilation database
 * entries.
 */
export const SUPPORTED_COMPILERS: ReadonlySet<string> = new Set([
  'clang',
  'clang++',
  'llvm-gcc',
  'llvm-g++',
  'llvm-gcc-4.2',
  'llvm-g++-4.2',
  'gcc',
  'g++',
  'gcc-4.2',
  'g++-4.2',
  'c++',
  'cc',
]);

export type SectionKind = 'compile' | 'precompile';

const COMPILE_MARKER_RE = /^CompileC\s/;
const PRECOMPILE_MARKER_RE = /^ProcessPCH(\+\+)?\s/;

/**
 * Returns the kind of build step a log line starts, if any.
 */
export function sectionKindOf(line: string): SectionKind | undefined {
  if (COMPILE_MARKER_RE.test(line)) {
    return 'compile';
  }
  if (PRECOMPILE_MARKER_RE.test(line)) {
    return 'precompile';
  }
  return undefined;
}

/**
 * Splits a line, returning undefined instead of throwing on invalid shell
 * syntax. Log lines are free-form, so such lines are simply not commands.
 */
function trySplit(line: string): string[] | undefined {
  try {
    return shutil.split(line);
  } catch (e) {
    if (e instanceof shutil.ShellSyntaxError) {
      return undefined;
    }
    throw e;
  }
}

/**
 * Parses the `cd <dir>` statement that follows a section marker. Returns ''
 * when the line is anything else.
 */
export function parseDirectoryLine(line: string): string {
  const args = trySplit(line);
  if (!args || args.length < 2 || args[0] !== 'cd') {
    return '';
  }
  return args[1];
}

/**
 * Returns whether the line runs a supported compiler with `-c` and then `-o`,
 * in that order. Other tools sharing those flags are not matched.
 */
export function isCompilerInvocation(line: string): boolean {
  const args = trySplit(line);
  if (!args) {
    return false;
  }
  const compiler = args.findIndex(arg =>
    SUPPORTED_COMPILERS.has(path.posix.basename(arg))
  );
  if (compiler < 0) {
    return false;
  }
  const compile = args.indexOf('-c', compiler + 1);
  if (compile < 0) {
    return false;
  }
  return args.indexOf('-o', compile + 1) >= 0;
}
