// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import type {Logger} from '../../../logs';

/**
 * A Logger that keeps every message for inspection.
 */
export class RecordingLogger implements Logger {
  readonly messages: string[] = [];

  append(value: string): void {
    this.messages.push(value);
  }
}

/**
 * A sink collecting everything written to it.
 */
export class StringSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get content(): string {
    return this.chunks.join('');
  }
}
