// Archive ids are UTC timestamps (YYYYMMDDTHHmmssSSSZ) with an optional -NN suffix
// so that ids handed out by one archive directory are strictly increasing.

export const ARCHIVE_ID_PATTERN = /^(\d{8}T\d{9}Z)(?:-(\d{2,}))?$/;

type ParsedArchiveId = {
  stamp: string;
  sequence: number;
};

export function formatArchiveStamp(now: Date): string {
  return now.toISOString().replace(/[-:.]/g, "");
}

export function isArchiveId(value: string): boolean {
  return ARCHIVE_ID_PATTERN.test(value);
}

export function compareArchiveIds(a: string, b: string): number {
  const left = parseArchiveId(a);
  const right = parseArchiveId(b);
  if (!left || !right) return a < b ? -1 : a > b ? 1 : 0;
  if (left.stamp !== right.stamp) return left.stamp < right.stamp ? -1 : 1;
  return left.sequence - right.sequence;
}

export function nextArchiveId(now: Date, existing: readonly string[]): string {
  const stamp = formatArchiveStamp(now);
  const newest = existing
    .filter(isArchiveId)
    .sort(compareArchiveIds)
    .at(-1);

  const parsedNewest = newest ? parseArchiveId(newest) : null;
  if (!parsedNewest || parsedNewest.stamp < stamp) {
    return stamp;
  }

  // Same millisecond, or the clock moved backwards: continue after the newest id.
  return `${parsedNewest.stamp}-${String(parsedNewest.sequence + 1).padStart(2, "0")}`;
}

function parseArchiveId(value: string): ParsedArchiveId | null {
  const match = ARCHIVE_ID_PATTERN.exec(value);
  if (!match) return null;
  return { stamp: match[1], sequence: match[2] ? Number.parseInt(match[2], 10) : 0 };
}
