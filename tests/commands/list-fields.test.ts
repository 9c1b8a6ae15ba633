import { describe, it, expect } from 'vitest';
import { formatFieldLines } from '../../src/commands/list-fields.js';

describe('List Fields Command', () => {
  it('should pad api_name to 30 columns', () => {
    expect(formatFieldLines([{ api_name: 'id', data_type: 'bigint' }])).toEqual([
      `id${' '.repeat(28)} - bigint`,
    ]);
  });

  it('should show - for a missing data_type', () => {
    expect(formatFieldLines([{ api_name: 'Subject' }])).toEqual([`Subject${' '.repeat(23)} - -`]);
  });

  it('should keep names longer than 30 columns intact', () => {
    const name = 'A_Very_Long_Custom_Field_Name_Here';
    expect(formatFieldLines([{ api_name: name, data_type: 'text' }])).toEqual([`${name} - text`]);
  });
});
