import { describe, expect, it, vi } from 'vitest';

import { consoleTracer, formatBuildEvent } from '../src/logging/console-tracer.js';

describe('consoleTracer', () => {
  it('formats events as single lines', () => {
    expect(formatBuildEvent({ path: 'optimizer', kind: 'callable', detail: 'calling Adam' })).toBe(
      'instantiating "optimizer" calling Adam'
    );
  });

  it('writes through console.info with a prefix', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    consoleTracer()({ path: 'second', kind: 'list', detail: 'as a list' });
    consoleTracer('[exp]')({ path: 'a', kind: 'scalar', detail: 'as a simple object, 1' });

    expect(info.mock.calls).toEqual([
      ['[Kiln] instantiating "second" as a list'],
      ['[exp] instantiating "a" as a simple object, 1'],
    ]);
  });
});
