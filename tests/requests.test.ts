import { describe, it, expect } from 'vitest';
import { buildCreatePayload, requests } from '../src/requests.js';

describe('buildCreatePayload', () => {
  it('omits unset optionals', () => {
    const payload = buildCreatePayload({ name: 'www', type: 'A', content: '192.0.2.1' });

    expect(payload).toEqual({ name: 'www', type: 'A', content: '192.0.2.1' });
    expect(JSON.stringify(payload)).toBe('{"name":"www","type":"A","content":"192.0.2.1"}');
  });

  it('sends priority as prio', () => {
    expect(
      buildCreatePayload({
        name: '',
        type: 'MX',
        content: 'mail.example.com',
        ttl: '600',
        priority: '10',
      })
    ).toEqual({ name: '', type: 'MX', content: 'mail.example.com', ttl: '600', prio: '10' });
  });

  it('returns a fresh object every call', () => {
    const input = { name: 'a', type: 'TXT', content: 'x' };
    expect(buildCreatePayload(input)).not.toBe(buildCreatePayload(input));
  });
});

describe('requests', () => {
  it('builds operation paths', () => {
    expect(requests.ping().path).toBe('/ping/');
    expect(requests.retrieveRecords('example.com').path).toBe('/dns/retrieve/example.com');
    expect(requests.retrieveRecord('example.com', '42').path).toBe(
      '/dns/retrieve/example.com/42'
    );
    expect(requests.deleteRecord('example.com', '42').path).toBe('/dns/delete/example.com/42');
    expect(requests.retrieveSsl('example.com').path).toBe('/ssl/retrieve/example.com');
  });

  it('puts the create payload on the create request', () => {
    expect(
      requests.createRecord('example.com', { name: 'www', type: 'A', content: '192.0.2.1' })
    ).toEqual({
      path: '/dns/create/example.com',
      payload: { name: 'www', type: 'A', content: '192.0.2.1' },
    });
  });
});
