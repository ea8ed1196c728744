import { describe, it, expect } from 'vitest';
import { MemoryFingerprintStore } from '../../../src/analyzer/storage/memory.js';

describe('MemoryFingerprintStore', () => {
  it('should return an empty record for an unknown module', () => {
    expect(new MemoryFingerprintStore().load('mod.py')).toEqual({});
  });

  it('should store copies', () => {
    const store = new MemoryFingerprintStore();
    const record = { def_f: 'aa' };
    store.save('mod.py', record);
    record.def_f = 'changed';

    const loaded = store.load('mod.py');
    loaded.def_g = 'bb';

    expect(store.load('mod.py')).toEqual({ def_f: 'aa' });
  });
});
