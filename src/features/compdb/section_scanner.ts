// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as shutil from '../../common/shutil';
import {type Logger, VoidLogger} from '../../logs';
import {
  type FileExists,
  processClangCommand,
  registerSourceForPchFile,
} from './command_processor';
import type {CompilationDatabaseEntry} from './compilation_database_type';
import {
  type SectionKind,
  isCompilerInvocation,
  parseDirectoryLine,
  sectionKindOf,
} from './compiler_invocation';
import type {PchTable} from './pch_table';

export type Exclusion = (value: string) => boolean;

export interface ScanOptions {
  table: PchTable;
  excludeDirectory?: Exclusion;
  excludeFile?: Exclusion;
  fileExists?: FileExists;
  logger?: Logger;
}

const never: Exclusion = () => false;

/**
 * Pull-based reader over log lines. next() returns undefined once the log is
 * exhausted.
 */
class LineReader {
  private readonly iterator: Iterator<string>;

  constructor(lines: Iterable<string>) {
    this.iterator = lines[Symbol.iterator]();
  }

  next(): string | undefined {
    const result = this.iterator.next();
    return result.done ? undefined : result.value;
  }
}

/**
 * Scans build log lines for compile and precompiled header sections and
 * yields a compilation database entry for every compile section.
 *
 * Precompile sections only add to `options.table`, so an entry can use a
 * precompiled header defined earlier in the log. Lines are consumed lazily and
 * the returned generator can be iterated once.
 *
 * @throws CompdbError from the command processor; see processClangCommand.
 */
export function* scanSections(
  lines: Iterable<string>,
  options: ScanOptions
): Generator<CompilationDatabaseEntry, void, undefined> {
  const reader = new LineReader(lines);
  const excludeDirectory = options.excludeDirectory ?? never;
  const excludeFile = options.excludeFile ?? never;
  const logger = options.logger ?? new VoidLogger();

  for (;;) {
    const line = reader.next();
    if (line === undefined) {
      return;
    }
    const kind = sectionKindOf(line);
    if (!kind) {
      continue;
    }

    const directoryLine = reader.next();
    if (directoryLine === undefined) {
      return;
    }
    const directory = parseDirectoryLine(directoryLine);
    if (excludeDirectory(directory)) {
      logger.append(
        `Skipping ${kind} section in excluded ${shutil.escape(directory)}\n`
      );
      continue;
    }

    const command = findInvocation(reader);
    if (command === undefined) {
      logger.append(
        `Log ended before the compiler invocation of the ${kind} section ` +
          `in ${shutil.escape(directory)}\n`
      );
      return;
    }

    const entry = processSection(kind, command, directory, options, logger);
    if (!entry) {
      continue;
    }
    if (excludeFile(entry.file)) {
      logger.append(`Skipping excluded file ${shutil.escape(entry.file)}\n`);
      continue;
    }
    yield entry;
  }
}

function findInvocation(reader: LineReader): string | undefined {
  for (;;) {
    const line = reader.next();
    if (line === undefined || isCompilerInvocation(line)) {
      return line;
    }
  }
}

function processSection(
  kind: SectionKind,
  command: string,
  directory: string,
  options: ScanOptions,
  logger: Logger
): CompilationDatabaseEntry | undefined {
  switch (kind) {
    case 'compile':
      return processClangCommand(command, directory, {
        table: options.table,
        fileExists: options.fileExists,
      });
    case 'precompile': {
      const mapping = registerSourceForPchFile(
        command,
        directory,
        options.table
      );
      if (mapping) {
        logger.append(
          `Precompiled header ${shutil.escape(mapping.artifact)} ` +
            `is built from ${shutil.escape(mapping.source)}\n`
        );
      }
      return undefined;
    }
  }
}
