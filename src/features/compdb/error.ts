// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

/**
 * A fatal conversion error. The compilation database written so far must not
 * be used once this is thrown.
 */
export class CompdbError extends Error {
  constructor(readonly details: CompdbErrorDetails) {
    super(details.kind + ': ' + describe(details));
  }
}

export type CompdbErrorDetails =
  | {
      kind: CompdbErrorKind.UnresolvedPch;
      include: string;
      command: string;
    }
  | {
      kind: CompdbErrorKind.MissingSourceFile;
      command: string;
    }
  | {
      kind: CompdbErrorKind.InvalidJsonLine;
      line: number;
      reason: string;
    }
  | {
      kind: CompdbErrorKind.InputNotFound;
      input: string;
    };

export enum CompdbErrorKind {
  UnresolvedPch = 'original header of precompiled header not found',
  MissingSourceFile = 'compiler invocation has no -c source file',
  InvalidJsonLine = 'invalid JSON-lines record',
  InputNotFound = 'input file not found',
}

function describe(details: CompdbErrorDetails): string {
  switch (details.kind) {
    case CompdbErrorKind.UnresolvedPch:
      return `-include ${details.include} in: ${details.command}`;
    case CompdbErrorKind.MissingSourceFile:
      return details.command;
    case CompdbErrorKind.InvalidJsonLine:
      return `line ${details.line}: ${details.reason}`;
    case CompdbErrorKind.InputNotFound:
      return details.input;
  }
}
