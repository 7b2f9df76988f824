import { stableStringify } from '../deterministicJson';

describe('stableStringify', () => {
  test('sorts keys recursively and keeps array order', () => {
    const out = stableStringify({ b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } });
    expect(out).toBe(
      ['{', '  "a": {', '    "c": null,', '    "d": [', '      3,', '      {', '        "y": 2,', '        "z": 1', '      }', '    ]', '  },', '  "b": 1', '}', ''].join('\n'),
    );
  });

  test('honours the indentation argument', () => {
    expect(stableStringify({ b: [1], a: 'x' }, 0)).toBe('{"a":"x","b":[1]}\n');
  });
});
