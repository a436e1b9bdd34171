/**
 * mermaid-utils.test.ts
 */

import { escapeLabel, sanitizeId } from '../mermaid-utils.js';

describe('sanitizeId', () => {
  it('replaces punctuation with underscores', () => {
    expect(sanitizeId('web1.example.com')).toBe('web1_example_com');
    expect(sanitizeId('handler_Restart nginx')).toBe('handler_Restart_nginx');
  });

  it('keeps letters, digits, underscores and hyphens', () => {
    expect(sanitizeId('role_my-role_2')).toBe('role_my-role_2');
    expect(sanitizeId('café')).toBe('café');
  });

  it('collapses runs of underscores', () => {
    expect(sanitizeId('a..b')).toBe('a_b');
    expect(sanitizeId('a__b')).toBe('a_b');
    expect(sanitizeId('x / y')).toBe('x_y');
  });

  it('trims surrounding whitespace first', () => {
    expect(sanitizeId('  spaced name  ')).toBe('spaced_name');
  });

  it('prefixes ids that start with a digit', () => {
    expect(sanitizeId('1.2.3.4')).toBe('id_1_2_3_4');
    expect(sanitizeId('10-web')).toBe('id_10-web');
  });

  it('is deterministic', () => {
    const name = 'db-01.internal:5432';
    expect(sanitizeId(name)).toBe(sanitizeId(name));
    expect(sanitizeId(name)).toBe('db-01_internal_5432');
  });
});

describe('escapeLabel', () => {
  it('swaps double quotes for single quotes', () => {
    expect(escapeLabel('say "hi"')).toBe("say 'hi'");
  });

  it('leaves other text alone', () => {
    expect(escapeLabel('Install <nginx> & co')).toBe('Install <nginx> & co');
  });
});
