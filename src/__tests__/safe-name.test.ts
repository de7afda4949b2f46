import { describe, it, expect } from 'vitest';
import { safeName, generateSourceName, proxyPathFor } from '../safe-name';

describe('safeName', () => {
  it('replaces unsafe characters and lower-cases', () => {
    expect(safeName('My Service! 2.0')).toBe('my_service_2_0');
  });

  it('returns an empty string when nothing usable remains', () => {
    expect(safeName('___')).toBe('');
    expect(safeName('')).toBe('');
    expect(safeName('!!!')).toBe('');
  });

  it('keeps hyphens and digits', () => {
    expect(safeName('billing-api-v2')).toBe('billing-api-v2');
  });

  it('trims underscores produced at the edges', () => {
    expect(safeName('  users  ')).toBe('users');
  });

  it('is stable across repeated calls', () => {
    expect(safeName('A.B')).toBe('a_b');
    expect(safeName('A.B')).toBe('a_b');
  });
});

describe('generateSourceName', () => {
  it('returns 10 characters of a UUID', () => {
    const name = generateSourceName();
    expect(name).toHaveLength(10);
    expect(name).toMatch(/^[0-9a-f]{8}-[0-9a-f]$/);
  });

  it('differs between calls', () => {
    expect(generateSourceName()).not.toBe(generateSourceName());
  });
});

describe('proxyPathFor', () => {
  it('builds /proxy/<safe-name>', () => {
    expect(proxyPathFor('Order Service')).toBe('/proxy/order_service');
  });

  it('falls back to a generated name for unusable names', () => {
    expect(proxyPathFor('***')).toMatch(/^\/proxy\/[0-9a-f]{8}-[0-9a-f]$/);
  });
});
