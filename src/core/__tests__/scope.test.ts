import { describe, expect, it } from 'vitest';
import { inScope } from '../scope';

describe('inScope', () => {
  it('accepts everything without filters', () => {
    expect(inScope('alice@contoso.com')).toBe(true);
    expect(inScope('alice@contoso.com', {})).toBe(true);
  });

  it('requires an include match when includes are given', () => {
    const filters = { include: ['*@contoso.com'] };

    expect(inScope('alice@contoso.com', filters)).toBe(true);
    expect(inScope('alice@fabrikam.com', filters)).toBe(false);
  });

  it('lets an exclude win over an include', () => {
    expect(inScope('svc-backup@contoso.com', { include: ['*@contoso.com'], exclude: ['svc-*'] })).toBe(false);
  });

  it('ignores case', () => {
    expect(inScope('Alice@Contoso.com', { include: ['alice@CONTOSO.COM'] })).toBe(true);
  });
});
