import { describe, it, expect } from 'vitest';
import { SseLineBuffer } from '../../../src/services/sse-line-buffer.js';

describe('SseLineBuffer', () => {
  it('returns only complete lines and keeps the partial tail', () => {
    const buffer = new SseLineBuffer();

    expect(buffer.push('data: {"a"')).toEqual([]);
    expect(buffer.pending).toBe('data: {"a"');
    expect(buffer.push(':1}\n\nda')).toEqual(['data: {"a":1}', '']);
    expect(buffer.pending).toBe('da');
  });

  it('strips carriage returns from CRLF lines', () => {
    const buffer = new SseLineBuffer();
    expect(buffer.push('event: done\r\ndata: x\r\n')).toEqual(['event: done', 'data: x']);
  });

  it('flushes the remaining partial line once', () => {
    const buffer = new SseLineBuffer();
    buffer.push('data: last');

    expect(buffer.flush()).toEqual(['data: last']);
    expect(buffer.flush()).toEqual([]);
  });
});
