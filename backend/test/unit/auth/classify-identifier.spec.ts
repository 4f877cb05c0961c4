import { describe, it, expect } from 'vitest';
import { classifyIdentifier } from '../../../src/modules/auth/helpers/classify-identifier';

describe('classifyIdentifier', () => {
  it('treats email-shaped identifiers as emails', () => {
    expect(classifyIdentifier('a@b.com')).toBe('email');
    expect(classifyIdentifier('first.last+tag@mail.example.org')).toBe('email');
  });

  it('treats everything else as a user name', () => {
    expect(classifyIdentifier('alice')).toBe('name');
    expect(classifyIdentifier('alice@localhost')).toBe('name');
    expect(classifyIdentifier('alice smith@x.com')).toBe('name');
    expect(classifyIdentifier('')).toBe('name');
  });
});
