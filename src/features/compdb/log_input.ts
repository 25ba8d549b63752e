// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as fs from 'fs';
import * as path from 'path';
import {CompdbError, CompdbErrorKind} from './error';

export type InputFormat = 'log' | 'jsonl';

/** Input name that reads the log from stdin. */
export const STDIN = '-';

const JSON_LINES_EXTENSIONS = new Set(['.jsonl', '.ndjson', '.json']);

/**
 * Selects the input format from the file extension.
 */
export function inputFormatOf(filename: string): InputFormat {
  if (filename === STDIN) {
    return 'log';
  }
  return JSON_LINES_EXTENSIONS.has(path.extname(filename).toLowerCase())
    ? 'jsonl'
    : 'log';
}

/**
 * Yields the lines of a plain build log. A trailing line break does not
 * produce an extra empty line.
 */
export function* plainLogLines(
  text: string
): Generator<string, void, undefined> {
  const re = /\r\n|\r|\n/g;
  let start = 0;
  for (;;) {
    const match = re.exec(text);
    if (!match) {
      break;
    }
    yield text.substring(start, match.index);
    start = match.index + match[0].length;
  }
  if (start < text.length) {
    yield text.substring(start);
  }
}

/**
 * Yields pseudo log lines from JSON-lines input. Each record's `command`
 * string is split into lines, and the lines of all records form one log.
 * Blank input lines and records without a string `command` are skipped.
 *
 * @throws CompdbError if a line is not valid JSON.
 */
export function* jsonLinesLogLines(
  text: string
): Generator<string, void, undefined> {
  let lineNumber = 0;
  for (const line of plainLogLines(text)) {
    lineNumber++;
    if (!line.trim()) {
      continue;
    }
    const command = commandOf(parseRecord(line, lineNumber));
    if (command !== undefined) {
      yield* plainLogLines(command);
    }
  }
}

function parseRecord(line: string, lineNumber: number): unknown {
  try {
    return JSON.parse(line);
  } catch (e) {
    throw new CompdbError({
      kind: CompdbErrorKind.InvalidJsonLine,
      line: lineNumber,
      reason: e instanceof Error ? e.message : String(e),
    });
  }
}

function commandOf(record: unknown): string | undefined {
  if (typeof record !== 'object' || record === null || !('command' in record)) {
    return undefined;
  }
  return typeof record.command === 'string' ? record.command : undefined;
}

/**
 * Reads a build log and returns its lines according to the input format.
 *
 * @throws CompdbError if the input file does not exist.
 */
export async function readLog(filename: string): Promise<Iterable<string>> {
  if (filename !== STDIN && !fs.existsSync(filename)) {
    throw new CompdbError({
      kind: CompdbErrorKind.InputNotFound,
      input: filename,
    });
  }
  const text = await fs.promises.readFile(
    filename === STDIN ? '/dev/stdin' : filename,
    'utf8'
  );
  return inputFormatOf(filename) === 'jsonl'
    ? jsonLinesLogLines(text)
    : plainLogLines(text);
}
