import { describe, it, expect } from 'vitest';
import {
  decodeReport,
  detectDelimiter,
  locateHeader,
  parseFields,
  readDelimited,
  readReport,
  splitRecords,
} from './csv-parser';
import { getColumn } from '../reports/frame';
import { EmptyInputError, HeaderNotFoundError } from '../reports/errors';

const UNIFIED_REPORT = [
  '"Includes Amazon Marketplace, Fulfillment by Amazon (FBA), and Amazon Webstore transactions"',
  '"All amounts in USD, unless specified"',
  '"date/time","settlement id","type","order id","description","fulfillment","product sales","total"',
  '"Nov 1, 2024 12:01:02 AM PDT","100","Order","111-1","Widget","Amazon","1,234.50","1,000.00"',
  '"Nov 2, 2024 3:15:00 PM PDT","100","Service Fee","","Cost of Advertising","","0","-25.00"',
].join('\r\n');

// =============================================================================
// decodeReport
// =============================================================================

describe('decodeReport', () => {
  it('strips a UTF-8 byte-order mark from bytes', () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x61, 0x2c, 0x62]);
    expect(decodeReport(bytes)).toBe('a,b');
  });

  it('normalizes Windows and old Mac line endings', () => {
    expect(decodeReport('a\r\nb\rc')).toBe('a\nb\nc');
  });
});

// =============================================================================
// detectDelimiter / parseFields / splitRecords
// =============================================================================

describe('detectDelimiter', () => {
  it('detects tab-delimited fulfillment logs', () => {
    expect(detectDelimiter(['amazon-order-id\tmerchant-order-id\tpurchase-date', 'a\tb\tc'])).toBe('\t');
  });

  it('ignores commas inside quoted fields', () => {
    expect(detectDelimiter(['"1,234.50"\t"x"', '"2,000"\t"y"'])).toBe('\t');
  });

  it('falls back to comma when no candidate appears', () => {
    expect(detectDelimiter(['single'])).toBe(',');
  });
});

describe('parseFields', () => {
  it('keeps delimiters and escaped quotes inside quoted fields', () => {
    expect(parseFields('"a,b","say ""hi""",c', ',')).toEqual(['a,b', 'say "hi"', 'c']);
  });

  it('returns empty strings for empty fields', () => {
    expect(parseFields('a,,c,', ',')).toEqual(['a', '', 'c', '']);
  });
});

describe('splitRecords', () => {
  it('does not split on newlines inside quotes and drops blank lines', () => {
    expect(splitRecords('a,"line1\nline2"\n\nb,c\n')).toEqual(['a,"line1\nline2"', 'b,c']);
  });
});

// =============================================================================
// locateHeader / readReport
// =============================================================================

describe('locateHeader', () => {
  it('finds the first line containing the marker, ignoring case', () => {
    expect(locateHeader(['foo', 'bar Date/Time baz', '1,2,3'], 'date/time')).toBe(1);
  });

  it('returns -1 when no line matches', () => {
    expect(locateHeader(['foo', 'bar'], 'date/time')).toBe(-1);
  });
});

describe('readReport', () => {
  it('skips the preamble and parses rows against the header positions', () => {
    const frame = readReport(UNIFIED_REPORT, { name: 'unified' });

    expect(frame.name).toBe('unified');
    expect(frame.columns).toEqual([
      'date/time',
      'settlement id',
      'type',
      'order id',
      'description',
      'fulfillment',
      'product sales',
      'total',
    ]);
    expect(frame.rowCount).toBe(2);
    expect(getColumn(frame, 'product sales')).toEqual(['1,234.50', '0']);
    expect(getColumn(frame, 'order id')).toEqual(['111-1', null]);
    expect(getColumn(frame, 'fulfillment')).toEqual(['Amazon', null]);
  });

  it('pads short rows with null', () => {
    const frame = readReport('date/time,type,total\n11/01/2024,Order');
    expect(getColumn(frame, 'total')).toEqual([null]);
  });

  it('throws HeaderNotFoundError when the marker is absent', () => {
    expect(() => readReport('a,b\n1,2', { name: 'standard orders' })).toThrow(HeaderNotFoundError);
    expect(() => readReport('a,b\n1,2', { name: 'standard orders' })).toThrow(
      'Header row not found in standard orders: no line contains "date/time"',
    );
  });

  it('throws EmptyInputError when only the header is present', () => {
    expect(() => readReport('preamble\ndate/time,type\n')).toThrow(EmptyInputError);
  });

  it('parses from the first line containing the marker, ignoring case', () => {
    const frame = readReport(['foo', 'bar Date/Time baz', '1,2,3'].join('\n'), { name: 'scan' });

    expect(frame.columns).toEqual(['bar Date/Time baz']);
    expect(frame.rowCount).toBe(1);
    expect(getColumn(frame, 'bar Date/Time baz')).toEqual(['1']);
  });

  it('accepts a custom marker', () => {
    const frame = readReport('junk\nposted date,amount\n2024-11-01,5', { marker: 'POSTED DATE' });
    expect(frame.columns).toEqual(['posted date', 'amount']);
  });
});

// =============================================================================
// readDelimited
// =============================================================================

describe('readDelimited', () => {
  it('reads a tab-delimited fulfillment log with the header on the first line', () => {
    const text = [
      'amazon-order-id\tmerchant-order-id\tpurchase-date',
      '111\tM-1\t2024-11-01',
      '222\tM-2\t2024-11-02',
    ].join('\n');

    const frame = readDelimited(Buffer.from(text), { name: 'fulfillment' });

    expect(frame.columns).toEqual(['amazon-order-id', 'merchant-order-id', 'purchase-date']);
    expect(getColumn(frame, 'amazon-order-id')).toEqual(['111', '222']);
    expect(getColumn(frame, 'purchase-date')).toEqual(['2024-11-01', '2024-11-02']);
  });

  it('suffixes duplicate header names', () => {
    const frame = readDelimited('fee,fee,total\n1,2,3');
    expect(frame.columns).toEqual(['fee', 'fee.1', 'total']);
  });

  it('throws EmptyInputError for an empty file', () => {
    expect(() => readDelimited('', { name: 'fulfillment' })).toThrow(EmptyInputError);
  });

  it('splits on an explicit single-character delimiter outside the detected set', () => {
    const frame = readDelimited('order^total\n111^10', { delimiter: '^' });
    expect(frame.columns).toEqual(['order', 'total']);
    expect(getColumn(frame, 'total')).toEqual(['10']);
  });

  it('rejects a delimiter longer than one character', () => {
    expect(() => readDelimited('a::b\n1::2', { delimiter: '::' })).toThrow(RangeError);
  });
});
