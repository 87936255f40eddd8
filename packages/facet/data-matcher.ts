/**
 * Region Data Matcher
 *
 * Partitions input rows by region once per geofacet() call and answers
 * per-cell lookups without rescanning. Region codes in data are matched
 * to grid codes case-insensitively; the caller's rows are never copied
 * or mutated, groups hold references to them.
 */

/** One input record, keyed by column name */
export type DataRow = Readonly<Record<string, unknown>>;

/** Rows per region value, in first-seen order */
export type GroupedData<Row extends DataRow = DataRow> = ReadonlyMap<string, readonly Row[]>;

/**
 * Group rows by the string form of `row[regionColumn]`.
 * Rows with a null or undefined region are left out.
 */
export function prepareGroupedData<Row extends DataRow>(
  rows: readonly Row[],
  regionColumn: string
): GroupedData<Row> {
  const groups = new Map<string, Row[]>();

  for (const row of rows) {
    const value = row[regionColumn];
    if (value === null || value === undefined) continue;

    const key = String(value);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }

  return groups;
}

/** Upper-cased region keys present in the data */
export function getAvailableRegions(grouped: GroupedData<DataRow>): Set<string> {
  return new Set([...grouped.keys()].map(key => key.toUpperCase()));
}

export function hasRegionData(available: ReadonlySet<string>, region: string): boolean {
  return available.has(region.toUpperCase());
}

/**
 * Rows for a region: exact key first, then the first key (in first-seen
 * order) equal to it ignoring case. Null when the region has no rows.
 */
export function getRegionData<Row extends DataRow>(
  grouped: GroupedData<Row>,
  region: string
): readonly Row[] | null {
  const exact = grouped.get(region);
  if (exact) return exact;

  const wanted = region.toUpperCase();
  for (const [key, rows] of grouped) {
    if (key.toUpperCase() === wanted) return rows;
  }
  return null;
}
