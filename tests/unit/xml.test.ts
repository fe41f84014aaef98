/**
 * Tests for the XML helpers
 */

import { describe, it, expect } from 'vitest';
import { escapeXmlComment, xmlSyntaxError } from '../../src/utils/xml.js';

describe('xmlSyntaxError', () => {
  it('accepts a well-formed document', () => {
    expect(xmlSyntaxError('<?xml version="1.0"?>\n<Wix><Fragment Id="a"/></Wix>')).toBeUndefined();
  });

  it('accepts a leading byte order mark', () => {
    expect(xmlSyntaxError('\uFEFF<Wix/>')).toBeUndefined();
  });

  it('describes a truncated document', () => {
    expect(xmlSyntaxError('<Wix><Component Id="A" Guid="A-GU')).toEqual(expect.any(String));
  });

  it('describes mismatched tags', () => {
    expect(xmlSyntaxError('<Wix><Component></Wix>')).toEqual(expect.any(String));
  });

  it('rejects an empty document', () => {
    expect(xmlSyntaxError('')).toEqual(expect.any(String));
  });
});

describe('escapeXmlComment', () => {
  it('splits double hyphens', () => {
    expect(escapeXmlComment('a--b')).toBe('a- -b');
  });

  it('leaves no double hyphen in longer runs', () => {
    expect(escapeXmlComment('---')).toBe('- - -');
    expect(escapeXmlComment('----')).toBe('- - - -');
  });

  it('leaves other text alone', () => {
    expect(escapeXmlComment('C:\\a-b\\c.dll')).toBe('C:\\a-b\\c.dll');
  });
});
