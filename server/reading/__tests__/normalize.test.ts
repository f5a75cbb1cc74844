import { describe, expect, it } from 'vitest';
import { normalizeTitle } from '../normalize';

describe('normalizeTitle', () => {
  it('drops the subtitle after a colon or dash', () => {
    expect(normalizeTitle('Dune: Deluxe Edition')).toBe('dune');
    expect(normalizeTitle('Children of Time - Book 1')).toBe('children of time');
    expect(normalizeTitle('Dune—Messiah')).toBe('dune');
  });

  it('drops punctuation and collapses whitespace', () => {
    expect(normalizeTitle('The Hobbit, or There and Back Again')).toBe('the hobbit or there and back again');
    expect(normalizeTitle('  Project   Hail Mary!  ')).toBe('project hail mary');
  });

  it('returns an empty key for empty input', () => {
    expect(normalizeTitle('')).toBe('');
    expect(normalizeTitle(null)).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Dune: Deluxe Edition',
      "Ender's Game (Ender's Saga, #1)",
      '  Project   Hail Mary!  ',
      'Cien años de soledad',
      '1984',
      'A -- B',
      '',
    ];
    for (const sample of samples) {
      const once = normalizeTitle(sample);
      expect(normalizeTitle(once)).toBe(once);
    }
  });

  it('lets differently subtitled editions share a key', () => {
    expect(normalizeTitle('Dune: 50th Anniversary')).toBe(normalizeTitle('Dune - Movie Tie-In'));
  });
});
