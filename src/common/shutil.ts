// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

/**
 * safeRE matches an argument that can be literally included in a shell
 * command line without requiring escaping.
 *
 * The character class \w is equivalent to [0-9A-Za-z_]. Leading equals sign is unsafe in zsh,
 * see http://zsh.sourceforge.net/Doc/Release/Expansion.html#g_t_0060_003d_0027-expansion.
 */
const safeRE = /^[-\w@%+:,./][-\w@%+:,./=]*$/;

/**
 * Escape escapes a string so it can be safely included as an argument in a shell command line.
 * The string is not modified if it can already be safely included.
 */
export function escape(arg: string): string {
  if (safeRE.test(arg)) {
    return arg;
  }
  return "'" + arg.replace(/'/g, "'\"'\"'") + "'";
}

/**
 * Characters that compilation database consumers split or unescape on.
 */
const compdbUnsafeRE = /[ "\\]/;

/**
 * Quotes an argument for the `command` field of a compilation database.
 *
 * Only space, double quote and backslash are protected, which is what
 * compilation database readers such as clang's JSONCompilationDatabase
 * understand. Backslashes are doubled before quotes are escaped so that the
 * inserted escapes are not escaped again.
 */
export function quote(arg: string): string {
  if (arg === '') {
    return '""';
  }
  if (!compdbUnsafeRE.test(arg)) {
    return arg;
  }
  return '"' + arg.replace(/\\/g, '\\\\').replace(/"/g, '\\"') + '"';
}

/**
 * Thrown by split on a command line that is not valid shell syntax.
 */
export class ShellSyntaxError extends Error {
  constructor(readonly command: string, reason: string) {
    super(`${reason}: ${command}`);
  }
}

const shellMetaRE = /['"\\]/;

// Characters a backslash escapes inside double quotes.
const doubleQuoteEscapable = new Set(['\\', '"', '$', '`', '\n']);

function isShellSpace(c: string): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r';
}

/**
 * Splits a command line into arguments.
 *
 * Lines without quotes or backslashes take a fast path that splits on single
 * spaces and trims each piece, so consecutive spaces yield empty arguments.
 * Other lines are tokenized with POSIX shell rules.
 *
 * @throws ShellSyntaxError on an unterminated quote or a trailing backslash.
 */
export function split(command: string): string[] {
  if (!shellMetaRE.test(command)) {
    return command
      .trim()
      .split(' ')
      .map(arg => arg.trim());
  }
  return splitShell(command);
}

type QuoteState = 'none' | 'single' | 'double';

/**
 * Splits a command line into arguments with POSIX shell rules.
 *
 * @throws ShellSyntaxError on an unterminated quote or a trailing backslash.
 */
export function splitShell(command: string): string[] {
  const args: string[] = [];
  let current = '';
  // True once the current word has started, even if it is still empty ('').
  let inWord = false;
  let state: QuoteState = 'none';

  for (let i = 0; i < command.length; i++) {
    const c = command[i];
    switch (state) {
      case 'single':
        if (c === "'") {
          state = 'none';
        } else {
          current += c;
        }
        break;
      case 'double':
        if (c === '"') {
          state = 'none';
        } else if (c === '\\' && i + 1 < command.length) {
          const next = command[i + 1];
          if (doubleQuoteEscapable.has(next)) {
            current += next;
            i++;
          } else {
            current += c;
          }
        } else {
          current += c;
        }
        break;
      case 'none':
        if (isShellSpace(c)) {
          if (inWord) {
            args.push(current);
            current = '';
            inWord = false;
          }
        } else if (c === "'") {
          state = 'single';
          inWord = true;
        } else if (c === '"') {
          state = 'double';
          inWord = true;
        } else if (c === '\\') {
          if (i + 1 >= command.length) {
            throw new ShellSyntaxError(command, 'no escaped character');
          }
          current += command[i + 1];
          i++;
          inWord = true;
        } else {
          current += c;
          inWord = true;
        }
        break;
    }
  }

  if (state !== 'none') {
    throw new ShellSyntaxError(command, 'no closing quotation');
  }
  if (inWord) {
    args.push(current);
  }
  return args;
}
