import { describe, expect, it } from 'vitest';
import type { ActivityKind, ActivityRecord, BookGroups, FeedEntry } from '../types';
import { collectBookGroups } from '../collect';
import { buildCurrentBook, fuseBookGroup, selectCurrentGroup, sortNewestFirst } from '../fusion';

const record = (
  rawTitle: string,
  kind: ActivityKind,
  progressPercent: number,
  timestamp?: string,
  entry: Partial<FeedEntry> = {},
): ActivityRecord => ({
  rawTitle,
  normalizedTitle: rawTitle.toLowerCase(),
  kind,
  progressPercent,
  timestamp: timestamp ? new Date(timestamp) : undefined,
  entry: { title: `${kind} ${rawTitle}`, ...entry },
});

const groupsOf = (...entries: Array<[string, ActivityRecord[]]>): BookGroups => new Map(entries);

describe('sortNewestFirst', () => {
  it('puts records without a timestamp last and keeps their order', () => {
    const a = record('A', 'started', 0);
    const b = record('B', 'started', 0, '2024-01-01T00:00:00Z');
    const c = record('C', 'started', 0);
    const d = record('D', 'started', 0, '2024-02-01T00:00:00Z');
    expect(sortNewestFirst([a, b, c, d]).map((r) => r.rawTitle)).toEqual(['D', 'B', 'A', 'C']);
  });
});

describe('selectCurrentGroup', () => {
  it('picks the group with the newest activity', () => {
    const selected = selectCurrentGroup(
      groupsOf(
        ['dune', [record('Dune', 'started', 0, '2024-01-03T00:00:00Z')]],
        ['hyperion', [record('Hyperion', 'started', 0, '2024-01-05T00:00:00Z')]],
      ),
    );
    expect(selected?.normalizedTitle).toBe('hyperion');
  });

  it('keeps the first group on a tie', () => {
    const selected = selectCurrentGroup(
      groupsOf(
        ['dune', [record('Dune', 'started', 0, '2024-01-05T00:00:00Z')]],
        ['hyperion', [record('Hyperion', 'started', 0, '2024-01-05T00:00:00Z')]],
      ),
    );
    expect(selected?.normalizedTitle).toBe('dune');
  });

  it('keeps the first group when nothing is timestamped', () => {
    const selected = selectCurrentGroup(
      groupsOf(['dune', [record('Dune', 'started', 0)]], ['hyperion', [record('Hyperion', 'started', 0)]]),
    );
    expect(selected?.normalizedTitle).toBe('dune');
  });

  it('treats an untimestamped group as older than any timestamped one', () => {
    expect(
      selectCurrentGroup(
        groupsOf(
          ['dune', [record('Dune', 'started', 0)]],
          ['hyperion', [record('Hyperion', 'started', 0, '2020-01-01T00:00:00Z')]],
        ),
      )?.normalizedTitle,
    ).toBe('hyperion');
    expect(
      selectCurrentGroup(
        groupsOf(
          ['dune', [record('Dune', 'started', 0, '2020-01-01T00:00:00Z')]],
          ['hyperion', [record('Hyperion', 'started', 0)]],
        ),
      )?.normalizedTitle,
    ).toBe('dune');
  });

  it('returns null for no groups', () => {
    expect(selectCurrentGroup(new Map())).toBeNull();
  });
});

describe('fuseBookGroup', () => {
  it('trusts later progress over the zero of a started entry', () => {
    const started = record('Dune', 'started', 0, '2024-01-01T00:00:00Z');
    const update = record('Dune', 'progress_update', 40, '2024-01-10T00:00:00Z');
    const selected = selectCurrentGroup(groupsOf(['dune', [started, update]]));
    const book = selected ? fuseBookGroup(selected.records) : null;

    expect(book?.progressPercent).toBe(40);
    expect(book?.startDate?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(book?.updateDate?.toISOString()).toBe('2024-01-10T00:00:00.000Z');
    expect(book?.entriesCount).toBe(2);
    expect(book?.entryKinds).toEqual(['progress_update', 'started']);
    expect(book?.selectedProgressEntry).toBe('progress_update Dune');
  });

  it('keeps the highest progress seen', () => {
    const book = fuseBookGroup([
      record('Dune', 'progress_update', 30, '2024-01-12T00:00:00Z'),
      record('Dune', 'progress_update', 55, '2024-01-10T00:00:00Z'),
      record('Dune', 'progress_update', 20, '2024-01-08T00:00:00Z'),
    ]);
    expect(book?.progressPercent).toBe(55);
    expect(book?.updateDate?.toISOString()).toBe('2024-01-10T00:00:00.000Z');
  });

  it('anchors metadata on the first record when no entry is a start', () => {
    const book = fuseBookGroup([
      record('Dune', 'progress_update', 10, '2024-01-12T00:00:00Z'),
      record('Dune', 'currently_reading', 0, '2024-01-02T00:00:00Z'),
    ]);
    expect(book?.startDate?.toISOString()).toBe('2024-01-12T00:00:00.000Z');
  });

  it('uses the first record when every progress value is zero', () => {
    const book = fuseBookGroup([record('Dune', 'currently_reading', 0), record('Dune', 'started', 0)]);
    expect(book?.progressPercent).toBe(0);
    expect(book?.selectedProgressEntry).toBe('currently_reading Dune');
  });

  it('prefers the longest title and the longest author name', () => {
    const book = fuseBookGroup([
      record('Dune', 'progress_update', 10, undefined, {
        description: '<a href="/author/show/58">F. Herbert</a>',
      }),
      record('Dune: Deluxe Edition', 'started', 0, undefined, {
        description: '<a href="/author/show/58">Frank Herbert</a>',
      }),
    ]);
    expect(book?.title).toBe('Dune: Deluxe Edition');
    expect(book?.author).toBe('Frank Herbert');
  });

  it('falls back to Unknown Author', () => {
    expect(fuseBookGroup([record('Dune', 'started', 0)])?.author).toBe('Unknown Author');
  });

  it('takes the first cover image it finds', () => {
    const book = fuseBookGroup([
      record('Dune', 'progress_update', 10),
      record('Dune', 'progress_update', 5, undefined, { description: '<img src="https://img.example.com/a.jpg">' }),
      record('Dune', 'started', 0, undefined, { description: '<img src="https://img.example.com/b.jpg">' }),
    ]);
    expect(book?.coverUrl).toBe('https://img.example.com/a.jpg');
  });

  it('returns null for an empty group', () => {
    expect(fuseBookGroup([])).toBeNull();
  });
});

describe('buildCurrentBook', () => {
  const feed: FeedEntry[] = [
    { title: "Jane is on page 120 of 300 of 'Dune'", published: 'Wed, 10 Jan 2024 08:00:00 GMT' },
    { title: "Jane started reading 'Hyperion'", published: 'Fri, 05 Jan 2024 08:00:00 GMT' },
    { title: "Jane started reading 'Dune'", published: 'Mon, 01 Jan 2024 08:00:00 GMT' },
  ];

  it('fuses the most recently active book from a feed', () => {
    const book = buildCurrentBook(collectBookGroups(feed));
    expect(book).toMatchObject({
      title: 'Dune',
      author: 'Unknown Author',
      progressPercent: 40,
      entriesCount: 2,
    });
    expect(book?.startDate?.toISOString()).toBe('2024-01-01T08:00:00.000Z');
    expect(book?.updateDate?.toISOString()).toBe('2024-01-10T08:00:00.000Z');
  });

  it('gives the same answer on every run', () => {
    expect(buildCurrentBook(collectBookGroups(feed))).toEqual(buildCurrentBook(collectBookGroups(feed)));
  });

  it('returns null when nothing was collected', () => {
    expect(buildCurrentBook(new Map())).toBeNull();
  });
});
