import { LeakStore } from '../../service/leak-store';

describe('LeakStore', () => {
  it('starts empty', () => {
    expect(new LeakStore(16).size()).toEqual({ chunks: 0, retainedBytes: 0 });
  });

  it('grows by one chunk per retain', () => {
    const store = new LeakStore(16);

    expect(store.retain()).toEqual({ chunks: 1, retainedBytes: 16 });
    expect(store.retain()).toEqual({ chunks: 2, retainedBytes: 32 });
    expect(store.size()).toEqual({ chunks: 2, retainedBytes: 32 });
  });

  it('never shrinks across successive calls', () => {
    const store = new LeakStore(8);
    let previous = store.size().retainedBytes;

    for (let i = 0; i < 20; i += 1) {
      const { retainedBytes } = store.retain();
      expect(retainedBytes).toBeGreaterThanOrEqual(previous);
      previous = retainedBytes;
    }
    expect(previous).toBe(160);
  });

  it('rejects invalid chunk sizes', () => {
    expect(() => new LeakStore(0)).toThrow('Chunk size must be a positive integer');
    expect(() => new LeakStore(1.5)).toThrow('Chunk size must be a positive integer');
  });
});
