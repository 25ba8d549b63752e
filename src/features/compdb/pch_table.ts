// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

/**
 * Suffixes tried, in order, when an -include path names a precompiled header
 * by the path of the header it replaces. The empty suffix covers an -include
 * of the artifact itself.
 */
const INCLUDE_ARTIFACT_SUFFIXES = ['.pth', '.pch', ''];

/**
 * Maps precompiled header artifacts (e.g. `Prefix.pch.pch`) to the header
 * source they were built from.
 *
 * One table belongs to one conversion run. It is filled by precompile sections
 * and read by later compile sections, so a section can only resolve artifacts
 * defined above it in the log.
 */
export class PchTable {
  private readonly sources = new Map<string, string>();

  /** Records the source of an artifact. The last writer wins. */
  set(artifact: string, source: string): void {
    this.sources.set(artifact, source);
  }

  get(artifact: string): string | undefined {
    return this.sources.get(artifact);
  }

  /**
   * Returns the header source for an -include path that is not on disk,
   * trying the `.pth` artifact, then the `.pch` artifact, then the path as
   * given.
   */
  resolve(includePath: string): string | undefined {
    for (const suffix of INCLUDE_ARTIFACT_SUFFIXES) {
      const source = this.sources.get(includePath + suffix);
      if (source !== undefined) {
        return source;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.sources.size;
  }
}
