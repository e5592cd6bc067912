import { describe, it, expect } from 'vitest';
import { SourceParseError } from '@bureau-insights/types';
import { normalize, parseXmlDocument, toPlainValue } from '@bureau-insights/report-parser';
import { reportXml } from '../fixtures/reports.js';

describe('parseXmlDocument', () => {
  it('should return the root element with its children in order', () => {
    const root = parseXmlDocument(reportXml([]));

    expect(root.tag).toBe('INDV-REPORT-FILE');
    expect(root.children.map((child) => child.tag)).toEqual(['INDV-REPORTS']);

    const report = root.children[0]?.children[0];
    expect(report?.children.map((child) => child.tag)).toEqual([
      'HEADER',
      'SCORES',
      'ACCOUNTS-SUMMARY',
      'RESPONSES',
    ]);
  });

  it('should keep values as strings', () => {
    const root = parseXmlDocument('<SCORE><SCORE-VALUE>0742</SCORE-VALUE><FLAG>true</FLAG></SCORE>');
    expect(toPlainValue(normalize(root))).toEqual({ 'SCORE-VALUE': '0742', FLAG: 'true' });
  });

  it('should read attributes without a prefix', () => {
    const root = parseXmlDocument('<SCORE-VALUE source="bureau" rank="1">742</SCORE-VALUE>');
    expect(root.attributes).toEqual({ source: 'bureau', rank: '1' });
    expect(root.text).toBe('742');
  });

  it('should keep only the text before the first child', () => {
    const root = parseXmlDocument('<NOTE>lead<B>x</B>tail</NOTE>');
    expect(root.text).toBe('lead');
    expect(root.children).toHaveLength(1);
    expect(root.children[0]?.text).toBe('x');
  });

  it('should decode entities', () => {
    const root = parseXmlDocument('<ACCT-TYPE>Auto &amp; Two-Wheeler</ACCT-TYPE>');
    expect(root.text).toBe('Auto & Two-Wheeler');
  });

  it('should decode decimal and hex character references', () => {
    const root = parseXmlDocument('<LOAN><AMT>&#8377;1,000</AMT><CODE>&#x41;&#x42;</CODE></LOAN>');
    expect(toPlainValue(normalize(root))).toEqual({ AMT: '₹1,000', CODE: 'AB' });
  });

  it('should decode bytes in the declared encoding', () => {
    const bytes = Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?><A>caf\xe9</A>', 'latin1');
    expect(parseXmlDocument(bytes).text).toBe('café');
  });

  it('should decode UTF-16 bytes with a byte-order mark', () => {
    const bytes = Buffer.from('\ufeff<A>café</A>', 'utf16le');
    expect(parseXmlDocument(bytes).text).toBe('café');
  });

  it('should reject an unsupported declared encoding', () => {
    const bytes = Buffer.from('<?xml version="1.0" encoding="x-unknown"?><A>1</A>', 'latin1');
    expect(() => parseXmlDocument(bytes)).toThrow(SourceParseError);
    expect(() => parseXmlDocument(bytes)).toThrow('Unsupported document encoding "x-unknown"');
  });

  it('should accept a buffer', () => {
    const root = parseXmlDocument(Buffer.from('<A><B>1</B></A>', 'utf-8'));
    expect(toPlainValue(normalize(root))).toEqual({ B: '1' });
  });

  it('should reject an empty document', () => {
    expect(() => parseXmlDocument('  \n')).toThrow('Report document is empty');
  });

  it('should reject malformed XML with a parse failure code', () => {
    let caught: unknown;
    try {
      parseXmlDocument('<A><B></A>');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SourceParseError);
    expect(caught).toMatchObject({ code: 'SOURCE_PARSE_FAILURE' });
  });

  it('should reject more than one root element', () => {
    expect(() => parseXmlDocument('<A>1</A><B>2</B>')).toThrow(SourceParseError);
  });
});
