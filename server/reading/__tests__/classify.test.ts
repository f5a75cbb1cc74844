import { describe, expect, it } from 'vitest';
import { classifyEntry, detectActivityKind, parsePublished } from '../classify';

describe('classifyEntry', () => {
  it('records a started entry with zero progress', () => {
    const record = classifyEntry({ title: "started reading 'Project Hail Mary'" });
    expect(record).toMatchObject({
      rawTitle: 'Project Hail Mary',
      normalizedTitle: 'project hail mary',
      kind: 'started',
      progressPercent: 0,
    });
    expect(record?.timestamp).toBeUndefined();
  });

  it('computes progress for a page update', () => {
    const record = classifyEntry({ title: "Jane is on page 150 of 300 of 'Dune'" });
    expect(record?.kind).toBe('progress_update');
    expect(record?.rawTitle).toBe('Dune');
    expect(record?.progressPercent).toBe(50);
  });

  it('falls back to the text after the progress verb when the title is not quoted', () => {
    const record = classifyEntry({ title: 'Jane is 45% done with Dune by Frank Herbert' });
    expect(record?.kind).toBe('progress_update');
    expect(record?.rawTitle).toBe('Dune');
    expect(record?.progressPercent).toBe(45);
  });

  it('does not cut an unquoted title at a "by" inside a word', () => {
    const record = classifyEntry({ title: 'Jane is 45% done with Moby Dick by Herman Melville' });
    expect(record?.rawTitle).toBe('Moby Dick');
    expect(record?.normalizedTitle).toBe('moby dick');
    expect(record?.progressPercent).toBe(45);
  });

  it('keeps "started reading" ahead of the progress phrases', () => {
    const record = classifyEntry({ title: "Jane started reading 'Dune' and is on page 10 of 400" });
    expect(record?.kind).toBe('started');
    expect(record?.progressPercent).toBe(0);
  });

  it('defaults progress to zero for a currently-reading shelf entry', () => {
    const record = classifyEntry({ title: "Jane added 'Dune' to her currently reading shelf" });
    expect(record?.kind).toBe('currently_reading');
    expect(record?.progressPercent).toBe(0);
  });

  it('reads the timestamp from the published field', () => {
    const record = classifyEntry({
      title: "Jane started reading 'Dune'",
      published: 'Tue, 02 Jan 2024 10:00:00 +0000',
    });
    expect(record?.timestamp?.toISOString()).toBe('2024-01-02T10:00:00.000Z');
  });

  it('skips entries that are not reading events', () => {
    expect(classifyEntry({ title: "Jane rated 'Dune' 5 stars" })).toBeNull();
  });

  it('skips reading events that name no book', () => {
    expect(classifyEntry({ title: 'Jane started reading' })).toBeNull();
  });
});

describe('detectActivityKind', () => {
  it('matches trigger phrases case-insensitively', () => {
    expect(detectActivityKind("Jane STARTED READING 'Dune'")).toBe('started');
    expect(detectActivityKind("Jane is currently reading 'Dune'")).toBe('progress_update');
    expect(detectActivityKind("Jane updated her progress on 'Dune'")).toBe('progress_update');
    expect(detectActivityKind('Jane wants to read Dune')).toBe('unknown');
  });
});

describe('parsePublished', () => {
  it('returns undefined for missing or unreadable dates', () => {
    expect(parsePublished(undefined)).toBeUndefined();
    expect(parsePublished('not a date')).toBeUndefined();
  });
});
