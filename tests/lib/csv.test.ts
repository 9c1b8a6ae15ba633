import { describe, it, expect } from 'vitest';
import { parseCsv, parseCsvRecords } from '../../src/lib/csv.js';

describe('parseCsvRecords', () => {
  it('should split simple rows', () => {
    expect(parseCsvRecords('a,b\n1,2\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('should handle quoted fields with commas and escaped quotes', () => {
    expect(parseCsvRecords('Id,Subject\n1,"Call, then ""email"""\n')).toEqual([
      ['Id', 'Subject'],
      ['1', 'Call, then "email"'],
    ]);
  });

  it('should handle CRLF line endings and missing trailing newline', () => {
    expect(parseCsvRecords('Id,Name\r\n10,x\r\n20,y')).toEqual([
      ['Id', 'Name'],
      ['10', 'x'],
      ['20', 'y'],
    ]);
  });

  it('should keep newlines inside quoted fields', () => {
    expect(parseCsvRecords('Id,Note\n1,"line1\nline2"\n')).toEqual([
      ['Id', 'Note'],
      ['1', 'line1\nline2'],
    ]);
  });

  it('should skip blank lines', () => {
    expect(parseCsvRecords('Id\n1\n\n2\n\n')).toEqual([['Id'], ['1'], ['2']]);
  });
});

describe('parseCsv', () => {
  it('should map rows by header', () => {
    const table = parseCsv('Id,Subject\n1,Follow up\n2,Call\n');
    expect(table.headers).toEqual(['Id', 'Subject']);
    expect(table.rows).toEqual([
      { Id: '1', Subject: 'Follow up' },
      { Id: '2', Subject: 'Call' },
    ]);
  });

  it('should strip a UTF-8 BOM from the header', () => {
    const table = parseCsv('\uFEFFId\n42\n');
    expect(table.headers).toEqual(['Id']);
    expect(table.rows).toEqual([{ Id: '42' }]);
  });

  it('should fill missing trailing values with empty strings', () => {
    const table = parseCsv('Id,Subject\n7\n');
    expect(table.rows).toEqual([{ Id: '7', Subject: '' }]);
  });

  it('should return empty table for empty input', () => {
    expect(parseCsv('')).toEqual({ headers: [], rows: [] });
  });
});
