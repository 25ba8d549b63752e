// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import type {CompilationDatabaseEntry} from './compilation_database_type';

/**
 * Anything chunks of text can be written to, e.g. a fs.WriteStream.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Writes a compilation database as a JSON array, one entry at a time, so that
 * entries reach the sink as soon as they are produced.
 */
export class CompdbWriter {
  private count = 0;
  private opened = false;
  private closed = false;

  constructor(private readonly sink: TextSink) {}

  get entries(): number {
    return this.count;
  }

  open(): void {
    if (this.opened) {
      throw new Error('compilation database already opened');
    }
    this.opened = true;
    this.sink.write('[');
  }

  add(entry: CompilationDatabaseEntry): void {
    if (!this.opened || this.closed) {
      throw new Error('compilation database is not open');
    }
    this.sink.write(
      (this.count === 0 ? '\n' : ',\n') + JSON.stringify(entry, null, 2)
    );
    this.count++;
  }

  close(): void {
    if (!this.opened || this.closed) {
      throw new Error('compilation database is not open');
    }
    this.closed = true;
    this.sink.write('\n]\n');
  }
}
