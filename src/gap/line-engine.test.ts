import { describe, it, expect } from 'vitest';
import { stepLine, scanLines, readRecord, INITIAL_STATE } from './line-engine.js';
import { prepareScan } from './run.js';
import { MemorySink } from '../io/output-sink.js';
import type { PreparedScan, RawLine, ScanConfig } from '../types/gap.js';

function makeConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  return {
    delimiter: ',',
    index: 1,
    format: 'uint',
    relation: 'gt',
    gap: '1',
    comment: '#',
    allowEmpty: false,
    allowNegativeGap: false,
    mode: { kind: 'diff', delimiter: ',' },
    verbose: false,
    ...overrides,
  };
}

function makeScan(overrides: Partial<ScanConfig> = {}): PreparedScan {
  return prepareScan(makeConfig(overrides));
}

function toLines(texts: string[]): RawLine[] {
  return texts.map((text, i) => ({ lineNumber: i + 1, text }));
}

const GAMES = [
  '1,1924,X',
  '2,1928,Y',
  '3,1932,Z',
  '4,1936,W',
  'N/A,Cancelled',
  'N/A,Cancelled',
  '5,1948,V',
];

describe('readRecord', () => {
  it('builds a record from the configured field', () => {
    const result = readRecord({ lineNumber: 3, text: '3,1932,Z' }, makeConfig({ index: 2 }));
    expect(result).toEqual({
      ok: true,
      record: { lineNumber: 3, value: { kind: 'uint', value: 1932n }, field: '1932', line: '3,1932,Z' },
    });
  });

  it('wraps extraction failures in a LineError', () => {
    const result = readRecord({ lineNumber: 9, text: 'only' }, makeConfig({ index: 2 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.lineNumber).toBe(9);
      expect(result.error.kind).toBe('IndexOutOfRange');
      expect(result.error.message).toBe('line 9: IndexOutOfRange: no field at index 2 (line has 1)');
      expect(result.error.field).toBeUndefined();
    }
  });

  it('carries the offending field text on parse and empty-field failures', () => {
    const bad = readRecord({ lineNumber: 4, text: '4,soon,Q' }, makeConfig({ index: 2 }));
    expect(bad.ok).toBe(false);
    if (!bad.ok) {
      expect(bad.error.kind).toBe('FormatError');
      expect(bad.error.field).toBe('soon');
    }

    const empty = readRecord({ lineNumber: 5, text: '5,,Q' }, makeConfig({ index: 2 }));
    expect(empty.ok).toBe(false);
    if (!empty.ok) {
      expect(empty.error.kind).toBe('EmptyField');
      expect(empty.error.field).toBe('');
    }
  });
});

describe('stepLine', () => {
  const scan = makeScan({ index: 2, gap: '4' });

  it('stores the first valid record without comparing', () => {
    const step = stepLine(INITIAL_STATE, { lineNumber: 1, text: '1,1924,X' }, scan);
    expect(step).toMatchObject({ action: 'record', event: null, state: { phase: 'have-valid' } });
  });

  it('replaces the previous record whether or not a gap matched', () => {
    const first = stepLine(INITIAL_STATE, { lineNumber: 1, text: '1,1924,X' }, scan);
    if (first.action !== 'record') throw new Error('expected a record');
    const second = stepLine(first.state, { lineNumber: 2, text: '2,1928,Y' }, scan);
    expect(second.action).toBe('record');
    if (second.action === 'record') {
      expect(second.event).toBeNull();
      expect(second.state).toMatchObject({ phase: 'have-valid', previous: { lineNumber: 2, field: '1928' } });
    }
  });

  it('skips comments without touching the state', () => {
    const step = stepLine(INITIAL_STATE, { lineNumber: 1, text: '# note' }, scan);
    expect(step).toEqual({ action: 'skip', reason: 'comment', state: INITIAL_STATE });
  });

  it('halts on an empty line unless allowed', () => {
    const strict = stepLine(INITIAL_STATE, { lineNumber: 4, text: '' }, scan);
    expect(strict.action).toBe('halt');
    if (strict.action === 'halt') {
      expect(strict.error.kind).toBe('EmptyLine');
      expect(strict.error.message).toBe('line 4: EmptyLine: line is empty');
    }

    const lenient = makeScan({ index: 2, allowEmpty: true });
    expect(stepLine(INITIAL_STATE, { lineNumber: 4, text: '' }, lenient)).toMatchObject({
      action: 'skip',
      reason: 'empty',
    });
  });
});

describe('scanLines', () => {
  it('reports the gap across skipped comment lines', async () => {
    const sink = new MemorySink();
    const outcome = await scanLines(makeScan({ index: 2, gap: '4', comment: 'N/A' }), toLines(GAMES), sink);

    expect(sink.text).toBe('1936,1948\n');
    expect(outcome).toEqual({
      status: 'completed',
      stats: { lines: 7, records: 5, skipped: 2, events: 1 },
    });
  });

  it('halts at the first unparsable line without a matching comment marker', async () => {
    const sink = new MemorySink();
    const outcome = await scanLines(makeScan({ index: 2, gap: '4' }), toLines(GAMES), sink);

    expect(outcome.status).toBe('halted');
    if (outcome.status === 'halted') {
      expect(outcome.error.lineNumber).toBe(5);
      expect(outcome.error.kind).toBe('FormatError');
      expect(outcome.error.message).toBe("line 5: FormatError: field 'Cancelled' is not a valid uint value");
    }
    expect(sink.text).toBe('');
  });

  it('retains the previous record across skipped invalid lines in allow mode', async () => {
    const sink = new MemorySink();
    const lines = toLines(['10', 'oops', '', ',', '30']);
    const outcome = await scanLines(makeScan({ gap: '15', allowEmpty: true }), lines, sink);

    expect(sink.text).toBe('10,30\n');
    expect(outcome.stats).toEqual({ lines: 5, records: 2, skipped: 3, events: 1 });
  });

  it('produces no output for input made only of comments', async () => {
    const sink = new MemorySink();
    const outcome = await scanLines(makeScan(), toLines(['# a', '# b', '#']), sink);
    expect(outcome.status).toBe('completed');
    expect(sink.text).toBe('');
  });

  it('emits as many diff lines as filter pairs', async () => {
    const lines = toLines(['1', '5', '6', '20', '21', '40']);
    const diff = new MemorySink();
    const filter = new MemorySink();
    await scanLines(makeScan({ gap: '3' }), lines, diff);
    await scanLines(makeScan({ gap: '3', mode: { kind: 'filter' } }), lines, filter);

    expect(diff.text).toBe('1,5\n6,20\n21,40\n');
    expect(filter.text).toBe('1\n5\n\n6\n20\n\n21\n40\n');
    expect(diff.chunks).toHaveLength(filter.chunks.length);
  });

  it('produces identical output on repeated runs', async () => {
    const first = new MemorySink();
    const second = new MemorySink();
    const scan = makeScan({ index: 2, gap: '4', comment: 'N/A' });
    await scanLines(scan, toLines(GAMES), first);
    await scanLines(scan, toLines(GAMES), second);
    expect(second.text).toBe(first.text);
  });

  it('computes negative deltas instead of rejecting them', async () => {
    const lines = toLines(['20', '10', '14']);
    const below = new MemorySink();
    const above = new MemorySink();
    await scanLines(makeScan({ format: 'int', relation: 'lt', gap: '4' }), lines, below);
    await scanLines(makeScan({ format: 'int', relation: 'gt', gap: '4' }), lines, above);

    expect(below.text).toBe('20,10\n');
    expect(above.text).toBe('');
  });

  it('applies 12h thresholds to rfc-3339 timestamps exactly', async () => {
    const lines = toLines([
      '2024-05-01T00:00:00Z',
      '2024-05-01T12:00:00Z',
      '2024-05-02T00:00:00+00:00',
      '2024-05-02T11:59:59Z',
    ]);
    const ge = new MemorySink();
    const gt = new MemorySink();
    await scanLines(makeScan({ format: 'rfc-3339', relation: 'ge', gap: '12h', delimiter: '' }), lines, ge);
    await scanLines(makeScan({ format: 'rfc-3339', relation: 'gt', gap: '12h', delimiter: '' }), lines, gt);

    expect(ge.text).toBe(
      '2024-05-01T00:00:00Z,2024-05-01T12:00:00Z\n2024-05-01T12:00:00Z,2024-05-02T00:00:00+00:00\n',
    );
    expect(gt.text).toBe('');
  });

  it('stops when the sink reports a closed consumer', async () => {
    const sink = new MemorySink(1);
    const outcome = await scanLines(makeScan({ gap: '0' }), toLines(['1', '2', '3', '4']), sink);

    expect(outcome).toEqual({ status: 'closed', stats: { lines: 2, records: 2, skipped: 0, events: 1 } });
    expect(sink.text).toBe('1,2\n');
  });

  it('reads asynchronous sources', async () => {
    async function* source(): AsyncGenerator<RawLine> {
      yield { lineNumber: 1, text: '1700000000' };
      yield { lineNumber: 2, text: '1700007200' };
    }
    const sink = new MemorySink();
    await scanLines(makeScan({ format: 'unix', gap: '1h' }), source(), sink);
    expect(sink.text).toBe('1700000000,1700007200\n');
  });
});
