import { describe, it, expect } from 'vitest';
import { deflate } from 'pako';
import { parseFrame, isSnapshotFrame, isEntityFrame, isSubscribedFrame, isErrorFrame, frameView } from './frame';
import { ValidationError } from './types';

function gzipWrap(frame: object): string {
  const compressed = deflate(new TextEncoder().encode(JSON.stringify(frame)));
  return JSON.stringify({
    compressed: 'gzip',
    data: btoa(String.fromCharCode(...compressed)),
  });
}

describe('Frame parsing', () => {
  it('should parse uncompressed entity frames', () => {
    const frame = {
      mode: 'list',
      entity: 'test/list',
      op: 'upsert',
      key: '1',
      data: { id: 1 },
    };
    const result = parseFrame(JSON.stringify(frame));
    expect(result.op).toBe('upsert');
    expect(isEntityFrame(result)).toBe(true);
    expect(isSnapshotFrame(result)).toBe(false);
    expect(frameView(result)).toBe('test/list');
  });

  it('should parse frames delivered as bytes', () => {
    const frame = { mode: 'state', entity: 'test/state', op: 'delete', key: '7' };
    const result = parseFrame(new TextEncoder().encode(JSON.stringify(frame)));
    expect(result).toEqual(frame);
  });

  it('should parse uncompressed snapshot frames', () => {
    const frame = {
      mode: 'list',
      entity: 'test/list',
      op: 'snapshot',
      data: [{ key: '1', data: { id: 1 } }],
    };
    const result = parseFrame(JSON.stringify(frame));
    expect(result.op).toBe('snapshot');
    expect(isSnapshotFrame(result)).toBe(true);
    if (isSnapshotFrame(result)) {
      expect(result.entity).toBe('test/list');
      expect(result.data).toHaveLength(1);
      expect(result.data[0]?.key).toBe('1');
    }
  });

  it('should decompress gzip-compressed snapshot frames', () => {
    const originalFrame = {
      mode: 'list',
      entity: 'test/list',
      op: 'snapshot',
      data: [
        { key: '1', data: { id: 1, name: 'Test Entity' } },
        { key: '2', data: { id: 2, name: 'Another Entity' } },
      ],
    };

    const result = parseFrame(gzipWrap(originalFrame));
    expect(result.op).toBe('snapshot');
    expect(isSnapshotFrame(result)).toBe(true);
    if (isSnapshotFrame(result)) {
      expect(result.data).toHaveLength(2);
      expect(result.data[0]?.key).toBe('1');
      expect(result.data[0]?.data).toEqual({ id: 1, name: 'Test Entity' });
      expect(result.data[1]?.key).toBe('2');
    }
  });

  it('should parse subscription acknowledgements and errors', () => {
    const subscribed = parseFrame(
      JSON.stringify({ op: 'subscribed', view: 'test/list', mode: 'list', sort: { field: ['score'], order: 'desc' } })
    );
    const error = parseFrame(JSON.stringify({ op: 'error', view: 'test/state', key: '1', message: 'unknown view' }));

    expect(isSubscribedFrame(subscribed)).toBe(true);
    expect(isErrorFrame(error)).toBe(true);
    expect(frameView(subscribed)).toBe('test/list');
    expect(frameView(error)).toBe('test/state');
  });

  it('should reject frames that do not match any frame shape', () => {
    expect(() => parseFrame(JSON.stringify({ mode: 'list', entity: 'test/list', op: 'upsert' }))).toThrow(
      ValidationError
    );
    expect(() => parseFrame(JSON.stringify({ mode: 'tree', entity: 'test/list', op: 'delete', key: '1' }))).toThrow(
      'Malformed frame'
    );
  });

  it('should throw on invalid JSON', () => {
    expect(() => parseFrame('{')).toThrow(SyntaxError);
  });
});
