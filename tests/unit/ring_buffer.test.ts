import { describe, it, expect } from 'vitest';
import { RingBuffer } from '@/scanner/ring_buffer';

describe('RingBuffer', () => {
  it('keeps insertion order until full', () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);
    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.size).toBe(2);
    expect(buffer.latest()).toBe(2);
  });

  it('evicts the oldest entry on overflow', () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);
    expect(buffer.push(4)).toBe(1);
    expect(buffer.push(5)).toBe(2);
    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.size).toBe(3);
    expect(buffer.latest()).toBe(5);
  });

  it('never grows past capacity', () => {
    const buffer = new RingBuffer<number>(4);
    for (let i = 0; i < 100; i++) buffer.push(i);
    expect(buffer.size).toBe(4);
    expect(buffer.toArray()).toEqual([96, 97, 98, 99]);
  });

  it('clears all entries', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');
    buffer.push('b');
    buffer.clear();
    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
    expect(buffer.latest()).toBeUndefined();
  });

  it('rejects a non-positive or fractional capacity', () => {
    expect(() => new RingBuffer<number>(0)).toThrow(RangeError);
    expect(() => new RingBuffer<number>(1.5)).toThrow(RangeError);
  });
});
