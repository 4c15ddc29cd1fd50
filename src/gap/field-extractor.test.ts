import { describe, it, expect } from 'vitest';
import { extractField } from './field-extractor.js';

describe('extractField', () => {
  it('selects the 1-based field', () => {
    expect(extractField('1,1924,X', ',', 2)).toEqual({ ok: true, field: '1924' });
    expect(extractField('1,1924,X', ',', 3)).toEqual({ ok: true, field: 'X' });
  });

  it('splits on multi-character delimiters literally', () => {
    expect(extractField('a::b::c', '::', 3)).toEqual({ ok: true, field: 'c' });
    expect(extractField('"a,b",c', ',', 2)).toEqual({ ok: true, field: 'b"' });
  });

  it('uses the whole line when the delimiter is empty', () => {
    expect(extractField('2024-01-01T00:00:00Z', '', 1)).toEqual({ ok: true, field: '2024-01-01T00:00:00Z' });
  });

  it('reports an index past the last field', () => {
    expect(extractField('1,2', ',', 3)).toEqual({
      ok: false,
      kind: 'IndexOutOfRange',
      detail: 'no field at index 3 (line has 2)',
    });
    expect(extractField('whole line', '', 2)).toMatchObject({ ok: false, kind: 'IndexOutOfRange' });
  });

  it('reports an empty selected field', () => {
    expect(extractField('1,,3', ',', 2)).toEqual({
      ok: false,
      kind: 'EmptyField',
      detail: 'empty field at index 2',
    });
    expect(extractField('1,2,', ',', 3)).toMatchObject({ ok: false, kind: 'EmptyField' });
  });
});
