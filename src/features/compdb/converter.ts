// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import type {Logger} from '../../logs';
import type {FileExists} from './command_processor';
import {CompdbWriter, type TextSink} from './compdb_writer';
import {PchTable} from './pch_table';
import {type Exclusion, scanSections} from './section_scanner';

export interface ConvertOptions {
  excludeDirectory?: Exclusion;
  excludeFile?: Exclusion;
  fileExists?: FileExists;
  logger?: Logger;
}

export interface ConversionResult {
  entries: number;
  pchMappings: number;
}

/**
 * Converts build log lines into a compilation database written to sink.
 *
 * Each call uses its own precompiled header table, so runs do not see each
 * other's headers. On a CompdbError the entries written so far stay in the
 * sink unterminated, and the caller has to discard them.
 */
export function convert(
  lines: Iterable<string>,
  sink: TextSink,
  options: ConvertOptions = {}
): ConversionResult {
  const table = new PchTable();
  const writer = new CompdbWriter(sink);
  writer.open();
  for (const entry of scanSections(lines, {...options, table})) {
    writer.add(entry);
  }
  writer.close();
  return {entries: writer.entries, pchMappings: table.size};
}
