// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

import * as path from 'path';
import {CompdbError, CompdbErrorKind} from '../../../../features/compdb/error';
import * as logInput from '../../../../features/compdb/log_input';
import * as testing from '../../../testing';

describe('Log input', () => {
  describe('inputFormatOf', () => {
    it('selects JSON-lines by extension', () => {
      expect(logInput.inputFormatOf('build.jsonl')).toEqual('jsonl');
      expect(logInput.inputFormatOf('/logs/build.ndjson')).toEqual('jsonl');
      expect(logInput.inputFormatOf('build.JSON')).toEqual('jsonl');
    });

    it('treats everything else as a plain log', () => {
      expect(logInput.inputFormatOf('build.log')).toEqual('log');
      expect(logInput.inputFormatOf('xcodebuild.txt')).toEqual('log');
      expect(logInput.inputFormatOf('build')).toEqual('log');
      expect(logInput.inputFormatOf('-')).toEqual('log');
    });
  });

  describe('plainLogLines', () => {
    it('splits on any line break', () => {
      expect([...logInput.plainLogLines('a\nb\r\nc\rd')]).toEqual([
        'a',
        'b',
        'c',
        'd',
      ]);
    });

    it('keeps empty lines but not a final line break', () => {
      expect([...logInput.plainLogLines('a\n\nb\n')]).toEqual(['a', '', 'b']);
      expect([...logInput.plainLogLines('')]).toEqual([]);
    });
  });

  describe('jsonLinesLogLines', () => {
    it('joins the command lines of all records', () => {
      const text = [
        JSON.stringify({command: 'CompileC a.o a.c\n    cd /p'}),
        '',
        JSON.stringify({title: 'no command'}),
        JSON.stringify({command: '    clang -c /p/a.c -o a.o'}),
        JSON.stringify({command: 42}),
        'null',
      ].join('\n');

      expect([...logInput.jsonLinesLogLines(text)]).toEqual([
        'CompileC a.o a.c',
        '    cd /p',
        '    clang -c /p/a.c -o a.o',
      ]);
    });

    it('fails on invalid JSON with the line number', () => {
      const text = '{"command": "a"}\n{"command": ';

      expect(() => [...logInput.jsonLinesLogLines(text)]).toThrowMatching(
        e =>
          e instanceof CompdbError &&
          e.details.kind === CompdbErrorKind.InvalidJsonLine &&
          e.details.line === 2
      );
    });
  });

  describe('readLog', () => {
    const tempDir = testing.tempDir();

    it('reads plain logs', async () => {
      await testing.putFiles(tempDir.path, {'build.log': 'a\nb\n'});

      const lines = await logInput.readLog(path.join(tempDir.path, 'build.log'));

      expect([...lines]).toEqual(['a', 'b']);
    });

    it('reads JSON-lines logs', async () => {
      await testing.putFiles(tempDir.path, {
        'build.jsonl': '{"command": "a\\nb"}\n{"command": "c"}\n',
      });

      const lines = await logInput.readLog(
        path.join(tempDir.path, 'build.jsonl')
      );

      expect([...lines]).toEqual(['a', 'b', 'c']);
    });

    it('fails on missing input', async () => {
      const input = path.join(tempDir.path, 'missing.log');

      await expectAsync(logInput.readLog(input)).toBeRejectedWith(
        new CompdbError({kind: CompdbErrorKind.InputNotFound, input})
      );
    });
  });
});
