export interface CollectionRow {
  name: string;
  count: number;
}

/**
 * Parses a collection export (Moxfield style) with `Count` and `Name` columns.
 * Header matching is case-insensitive; quoted fields may contain commas and
 * doubled quotes. Rows without a name are skipped, a missing count reads as 1.
 */
export function parseCollectionCsv(input: string): CollectionRow[] {
  const lines = input
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    return [];
  }

  const headers = splitCsvLine(lines[0]).map((header) => header.trim().toLowerCase());
  const nameIdx = headers.findIndex((header) => header === 'name' || header === 'card name');
  const countIdx = headers.findIndex(
    (header) => header === 'count' || header === 'quantity' || header === 'qty',
  );
  if (nameIdx === -1) {
    return [];
  }

  const rows: CollectionRow[] = [];
  for (const line of lines.slice(1)) {
    const cols = splitCsvLine(line);
    const name = cols[nameIdx]?.trim();
    if (!name) {
      continue;
    }

    const rawCount = countIdx >= 0 ? cols[countIdx]?.trim() : undefined;
    const count = rawCount === undefined || rawCount === '' ? 1 : Number(rawCount);
    rows.push({ name, count: Number.isFinite(count) ? count : 0 });
  }

  return rows;
}

/** Unique names of rows with a positive count, in first-seen order. */
export function ownedCardNames(rows: CollectionRow[]): string[] {
  const names = new Set<string>();
  for (const row of rows) {
    if (row.count > 0) {
      names.add(row.name);
    }
  }
  return Array.from(names);
}

function splitCsvLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current);

  return result;
}
