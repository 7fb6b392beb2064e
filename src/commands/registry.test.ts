import { describe, it, expect } from 'vitest';
import { recordJson, recordRow } from './registry.js';
import type { DatabaseRecord } from '../registry/types.js';

const record: DatabaseRecord = {
  name: 'sales',
  digest: '0123456789abcdef'.repeat(4),
  file: 'sales.db',
  tables: { notes: 2, sales: 3 },
};

describe('record display', () => {
  it('should summarise a record as one table row', () => {
    expect(recordRow(record)).toEqual(['sales', '0123456', 'sales.db', '2', '5']);
  });

  it('should keep the full digest in json output', () => {
    expect(recordJson(record)).toEqual({
      name: 'sales',
      hash: '0123456789abcdef'.repeat(4),
      file: 'sales.db',
      tables: { notes: 2, sales: 3 },
    });
  });
});
