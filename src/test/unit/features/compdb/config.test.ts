// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as config from '../../../../features/compdb/config';

describe('Converter config', () => {
  it('applies defaults', () => {
    const result = config.configFromOptions('build.log', {});

    expect(result.input).toEqual('build.log');
    expect(result.output).toEqual('compile_commands.json');
    expect(result.verbose).toBeFalse();
    expect(result.excludeDirectory('/anything')).toBeFalse();
    expect(result.excludeFile('')).toBeFalse();
  });

  it('builds exclusion predicates from patterns', () => {
    const result = config.configFromOptions('build.log', {
      output: '-',
      excludeDirectory: ['^/excluded', '/Pods/'],
      excludeFile: ['\\.pb\\.cc$'],
      verbose: true,
    });

    expect(result.output).toEqual('-');
    expect(result.verbose).toBeTrue();
    expect(result.excludeDirectory('/excluded/lib')).toBeTrue();
    expect(result.excludeDirectory('/app/Pods/AFNetworking')).toBeTrue();
    expect(result.excludeDirectory('/project')).toBeFalse();
    expect(result.excludeFile('/p/gen/a.pb.cc')).toBeTrue();
    expect(result.excludeFile('/p/a.cc')).toBeFalse();
  });

  it('rejects invalid patterns', () => {
    expect(() => config.exclusionPredicate(['('])).toThrowMatching(
      e =>
        e instanceof config.UsageError &&
        e.message.startsWith('invalid exclusion pattern (: ')
    );
  });
});
