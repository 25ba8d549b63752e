// Copyright 2022 The Chromium OS Authors. All rights reserved.
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

export type {
  CompilationDatabase,
  CompilationDatabaseEntry,
} from './compilation_database_type';
export {
  processClangCommand,
  registerSourceForPchFile,
} from './command_processor';
export {CompdbWriter} from './compdb_writer';
export {convert} from './converter';
export type {ConversionResult} from './converter';
export {CompdbError, CompdbErrorKind} from './error';
export {readLog} from './log_input';
export {PchTable} from './pch_table';
export {scanSections} from './section_scanner';
