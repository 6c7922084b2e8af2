import { describe, it, expect } from 'vitest';
import { normalizeDomain, normalizeTarget, toFqdn, toRecordType } from '../src/domain.js';
import { InvalidInputError } from '../src/errors.js';

describe('normalizeDomain', () => {
  it('lowercases domain', () => {
    expect(normalizeDomain('EXAMPLE.COM')).toBe('example.com');
  });

  it('removes trailing dot (FQDN)', () => {
    expect(normalizeDomain('example.com.')).toBe('example.com');
  });

  it('trims whitespace', () => {
    expect(normalizeDomain('  example.com  ')).toBe('example.com');
  });

  it('keeps www and other subdomains', () => {
    expect(normalizeDomain('www.Example.com')).toBe('www.example.com');
  });
});

describe('toFqdn', () => {
  it('returns the bare domain for an empty subdomain', () => {
    expect(toFqdn('', 'example.com')).toBe('example.com');
  });

  it('joins and case-folds subdomain and domain', () => {
    expect(toFqdn('www', 'Example.com')).toBe('www.example.com');
  });

  it('does not produce a double dot', () => {
    expect(toFqdn('home.', 'example.com')).toBe('home.example.com');
  });

  it('handles multi-label subdomains', () => {
    expect(toFqdn('_acme-challenge.WWW', 'example.com')).toBe(
      '_acme-challenge.www.example.com'
    );
  });
});

describe('toRecordType', () => {
  it('uppercases a known type', () => {
    expect(toRecordType(' aaaa ')).toBe('AAAA');
    expect(toRecordType('Https')).toBe('HTTPS');
  });

  it('rejects a type the registrar does not support', () => {
    expect(() => toRecordType('SPF')).toThrow(InvalidInputError);
    expect(() => toRecordType('')).toThrow('Porkbun: unsupported record type ""');
  });
});

describe('normalizeTarget', () => {
  it('lowercases domain and name, uppercases type and derives the FQDN', () => {
    expect(
      normalizeTarget({
        domain: 'Example.COM',
        name: 'WWW',
        type: 'txt',
        content: 'Hello',
      })
    ).toEqual({
      domain: 'example.com',
      name: 'www',
      type: 'TXT',
      content: 'Hello',
      fqdn: 'www.example.com',
    });
  });

  it('leaves content untouched', () => {
    const target = normalizeTarget({
      domain: 'example.com',
      name: '',
      type: 'TXT',
      content: 'MixedCase Token',
      ttl: '120',
    });
    expect(target.content).toBe('MixedCase Token');
    expect(target.fqdn).toBe('example.com');
    expect(target.ttl).toBe('120');
  });
});
