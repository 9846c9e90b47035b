import { describe, it, expect } from 'vitest';
import { buildContentPreview } from './preview.js';

describe('buildContentPreview', () => {
  it('returns short content unchanged', () => {
    expect(buildContentPreview('Groceries: milk, eggs')).toBe('Groceries: milk, eggs');
  });

  it('keeps content of exactly the preview length', () => {
    const content = 'a'.repeat(100);
    expect(buildContentPreview(content)).toBe(content);
  });

  it('truncates longer content to 100 characters plus an ellipsis', () => {
    const content = `${'b'.repeat(100)}tail`;
    const preview = buildContentPreview(content);
    expect(preview).toBe(`${'b'.repeat(100)}...`);
    expect(preview).toHaveLength(103);
  });

  it('honours a custom length', () => {
    expect(buildContentPreview('abcdef', 3)).toBe('abc...');
  });
});
