import { describe, it, expect } from 'vitest';
import { numberedPageInfo, offsetPageInfo } from './pagination.js';

describe('offsetPageInfo', () => {
  it('derives the page from skip and limit', () => {
    expect(offsetPageInfo(0, 10, 25)).toEqual({ page: 1, per_page: 10, has_next: true, has_prev: false });
    expect(offsetPageInfo(20, 10, 25)).toEqual({ page: 3, per_page: 10, has_next: false, has_prev: true });
  });

  it('treats an unaligned skip as part of the page it falls in', () => {
    expect(offsetPageInfo(15, 10, 25)).toEqual({ page: 2, per_page: 10, has_next: false, has_prev: true });
  });
});

describe('numberedPageInfo', () => {
  it('compares page * per_page with the total', () => {
    expect(numberedPageInfo(1, 2, 3)).toEqual({ page: 1, per_page: 2, has_next: true, has_prev: false });
    expect(numberedPageInfo(2, 2, 4)).toEqual({ page: 2, per_page: 2, has_next: false, has_prev: true });
  });
});
