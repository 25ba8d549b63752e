// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

/**
 * Destination of diagnostic output. Only append() is required so that any
 * writable sink can serve as a logger. Callers end each message with a
 * newline.
 */
export interface Logger {
  append(value: string): void;
}

/**
 * A Logger that writes to stderr, keeping stdout free for the compilation
 * database.
 */
export class StderrLogger implements Logger {
  append(value: string): void {
    process.stderr.write(value);
  }
}

/**
 * A Logger that discards logs.
 */
export class VoidLogger implements Logger {
  append(): void {}
}

/**
 * A Logger that only forwards messages when verbose output was requested.
 */
export class VerboseLogger implements Logger {
  constructor(
    private readonly inner: Logger,
    private readonly verbose: boolean
  ) {}

  append(value: string): void {
    if (this.verbose) {
      this.inner.append(value);
    }
  }
}
