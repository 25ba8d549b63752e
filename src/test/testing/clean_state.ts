// Copyright 2022 The ChromiumOS Authors
// Use of this source code is governed by a BSD-style license that can be
// found in the LICENSE file.

type StateInitializer<T> = (() => Promise<T>) | (() => T);

/**
 * Returns an object whose properties are re-initialized before every test
 * case, so that no test sees state left over by another.
 *
 * Usage:
 *
 * describe('PchTable', () => {
 *   const state = cleanState(() => ({table: new PchTable()}));
 *
 *   it('starts empty', () => {
 *     expect(state.table.size).toEqual(0);
 *   });
 * })
 *
 * Class methods are not copied to the returned object, so write
 * `cleanState(() => ({foo: new Foo()}))` rather than `cleanState(() => new Foo())`.
 */
export function cleanState<NewState extends {}>(
  init: StateInitializer<NewState>
): NewState {
  const state = {} as NewState;
  beforeEach(async () => {
    for (const prop of Object.getOwnPropertyNames(state)) {
      delete (state as {[k: string]: unknown})[prop];
    }
    Object.assign(state, await init());
  });
  return state;
}
