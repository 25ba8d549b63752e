// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as fs from 'fs';
import * as path from 'path';
import * as shutil from '../../common/shutil';
import type {CompilationDatabaseEntry} from './compilation_database_type';
import {CompdbError, CompdbErrorKind} from './error';
import type {PchTable} from './pch_table';

const PCH_ARTIFACT_RE = /\.(pch\.pth|pch\.pch|h\.pch)$/;

export type FileExists = (filePath: string) => boolean;

export interface ProcessOptions {
  table: PchTable;
  /** Defaults to fs.existsSync. */
  fileExists?: FileExists;
}

export interface PchMapping {
  artifact: string;
  source: string;
}

/**
 * Records in the table which header a precompile command builds its artifact
 * from. Returns the recorded mapping, or undefined unless the command has both
 * a `-c` source and an `-o` precompiled header output.
 */
export function registerSourceForPchFile(
  line: string,
  _directory: string,
  table: PchTable
): PchMapping | undefined {
  const args = shutil.split(line);
  let source: string | undefined;
  let artifact: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-c' && i + 1 < args.length) {
      source = args[++i];
    } else if (arg === '-o' && i + 1 < args.length) {
      const output = args[++i];
      if (PCH_ARTIFACT_RE.test(output)) {
        artifact = output;
      }
    }
  }
  if (source === undefined || artifact === undefined) {
    return undefined;
  }
  table.set(artifact, source);
  return {artifact, source};
}

/**
 * Turns a compiler invocation into a compilation database entry.
 *
 * Every argument is re-quoted for the `command` field. An `-include` of a
 * precompiled header that is not on disk is replaced with the header it was
 * built from.
 *
 * @throws CompdbError if a precompiled header cannot be traced back to its
 * header, or if the command compiles no file.
 */
export function processClangCommand(
  line: string,
  directory: string,
  options: ProcessOptions
): CompilationDatabaseEntry {
  const fileExists = options.fileExists ?? fs.existsSync;
  const args = shutil.split(line);
  const output: string[] = [];
  let file: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    output.push(shutil.quote(arg));
    if (i + 1 >= args.length) {
      continue;
    }
    if (arg === '-include') {
      const include = args[++i];
      const resolved = resolveInclude(include, line, fileExists, options.table);
      output.push(shutil.quote(resolved));
    } else if (arg === '-c') {
      file = args[++i];
      output.push(shutil.quote(file));
    }
  }

  if (file === undefined) {
    throw new CompdbError({
      kind: CompdbErrorKind.MissingSourceFile,
      command: line,
    });
  }
  return {
    directory,
    command: output.join(' '),
    file: path.posix.normalize(file),
  };
}

function resolveInclude(
  include: string,
  line: string,
  fileExists: FileExists,
  table: PchTable
): string {
  if (fileExists(include)) {
    return include;
  }
  const source = table.resolve(include);
  if (source === undefined) {
    throw new CompdbError({
      kind: CompdbErrorKind.UnresolvedPch,
      include,
      command: line,
    });
  }
  return source;
}
