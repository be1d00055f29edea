import type { LastItemResult, RevenueFilters, RevenueSummary, SearchFilters, SheetRow } from './records.types.js';

export const DEFAULT_SEARCH_LIMIT = 50;
export const MAX_SEARCH_LIMIT = 500;

const normalizeKey = (value: string) => value.trim().toLowerCase();

const matchesLocation = (row: SheetRow, location: string | undefined) =>
  location === undefined || normalizeKey(row.location) === normalizeKey(location);

// A row without a readable date only passes when no bound is given
const withinDates = (row: SheetRow, sinceTs: number | undefined, untilTs: number | undefined) => {
  if (sinceTs === undefined && untilTs === undefined) {
    return true;
  }
  if (row.timestampEpoch === null) {
    return false;
  }
  if (sinceTs !== undefined && row.timestampEpoch < sinceTs) {
    return false;
  }
  if (untilTs !== undefined && row.timestampEpoch > untilTs) {
    return false;
  }
  return true;
};

const containsItem = (row: SheetRow, item: string | undefined) => {
  if (item === undefined) {
    return true;
  }
  const needle = normalizeKey(item);
  return row.itemTokens.some((token) => token.toLowerCase() === needle);
};

export const searchRows = (rows: SheetRow[], filters: SearchFilters): SheetRow[] => {
  const matches: SheetRow[] = [];
  for (const row of rows) {
    if (
      matchesLocation(row, filters.location) &&
      containsItem(row, filters.item) &&
      withinDates(row, filters.sinceTs, filters.untilTs)
    ) {
      matches.push(row);
      if (matches.length >= filters.limit) {
        break;
      }
    }
  }
  return matches;
};

/**
 * Picks the row with the latest date for a location; equal dates go to the
 * physically later row. When no candidate has a readable date the last
 * matching row wins.
 */
export const findLatestForLocation = (rows: SheetRow[], location: string): LastItemResult | null => {
  let latestDated: SheetRow | null = null;
  let lastSeen: SheetRow | null = null;

  for (const row of rows) {
    if (!matchesLocation(row, location)) {
      continue;
    }
    lastSeen = row;
    if (row.timestampEpoch === null) {
      continue;
    }
    if (
      latestDated === null ||
      latestDated.timestampEpoch === null ||
      row.timestampEpoch >= latestDated.timestampEpoch
    ) {
      latestDated = row;
    }
  }

  const selected = latestDated ?? lastSeen;
  if (!selected) {
    return null;
  }
  const tokens = selected.itemTokens;
  return { row: selected, lastItem: tokens.length ? tokens[tokens.length - 1] : '' };
};

/**
 * Totals loosely parsed revenue over the matching rows. A blank revenue cell
 * records no figure and is left out of the count; unreadable text still
 * counts as a row worth 0.
 */
export const sumRevenue = (rows: SheetRow[], filters: RevenueFilters): RevenueSummary =>
  rows.reduce<RevenueSummary>(
    (summary, row) => {
      if (
        !row.revenue ||
        !matchesLocation(row, filters.location) ||
        !withinDates(row, filters.sinceTs, filters.untilTs)
      ) {
        return summary;
      }
      return { total: summary.total + row.revenueValue, rows: summary.rows + 1 };
    },
    { total: 0, rows: 0 }
  );
