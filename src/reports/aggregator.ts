/**
 * Aggregator - group transactions by (type, description, fulfillment) and
 * sum the monetary columns.
 */

import { createLogger } from '../utils/logger';
import { DEFAULT_CONVENTION, ITEMS_DESCRIPTION, MISSING_KEY } from './convention';
import type { ColumnConvention } from './convention';
import { cellText, createFrame, filterRows, getColumn, hasColumn } from './frame';
import type { CellValue, TabularFrame } from './frame';
import { parseMoney } from './normalizer';

const logger = createLogger('aggregator');

export interface GroupOptions {
  /** Rows of these types are dropped before grouping */
  excludeTypes?: Iterable<string>;
  convention?: ColumnConvention;
}

/**
 * Copy of `frame` without rows whose type is in `types`.
 */
export function excludeTypes(
  frame: TabularFrame,
  types: Iterable<string>,
  typeColumn: string = DEFAULT_CONVENTION.typeColumn,
): TabularFrame {
  const excluded = new Set(types);
  if (excluded.size === 0) return filterRows(frame, () => true);

  const values = getColumn(frame, typeColumn);
  return filterRows(frame, (_row, index) => {
    const type = cellText(values[index] ?? null);
    return type === null || !excluded.has(type);
  });
}

function keyValue(value: CellValue): string {
  const text = cellText(value);
  return text === null || text.trim().length === 0 ? MISSING_KEY : text;
}

function compareKeys(a: string[], b: string[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] < b[i]) return -1;
    if (a[i] > b[i]) return 1;
  }
  return 0;
}

/**
 * Group rows by the ordered key tuple and sum each of `sumColumns`.
 *
 * - Descriptions of item-bearing types (Order, Refund, Liquidations...) are
 *   replaced by "(items)" so per-SKU descriptions collapse into one bucket.
 * - Null or blank key values become "none"; every row lands in exactly one group.
 * - Sum cells are coerced (commas stripped); null counts as 0. A sum column
 *   the frame lacks is summed as 0.
 * - Output rows are ordered by key tuple.
 * - Without `groupKeys`, the convention's group keys are used.
 *
 * @throws MissingColumnError when a group-key column is absent
 */
export function groupAndSum(
  frame: TabularFrame,
  sumColumns: readonly string[],
  groupKeys?: readonly string[],
  options: GroupOptions = {},
): TabularFrame {
  const convention = options.convention ?? DEFAULT_CONVENTION;
  const keys = groupKeys ?? convention.groupKeys;
  const source = options.excludeTypes
    ? excludeTypes(frame, options.excludeTypes, convention.typeColumn)
    : frame;

  const keyColumns = keys.map((key) => getColumn(source, key));
  const itemTypes = new Set(convention.itemTypes);
  const typeKeyIndex = keys.indexOf(convention.typeColumn);
  const descriptionKeyIndex = keys.indexOf(convention.descriptionColumn);

  const missing = sumColumns.filter((column) => !hasColumn(source, column));
  if (missing.length > 0) {
    logger.warn({ report: source.name, columns: missing }, 'Sum columns missing; treated as 0');
  }
  const sumValues = sumColumns.map((column) =>
    hasColumn(source, column) ? getColumn(source, column) : null,
  );

  const groups = new Map<string, { key: string[]; sums: number[] }>();

  for (let i = 0; i < source.rowCount; i++) {
    const key = keyColumns.map((values) => keyValue(values[i] ?? null));
    if (typeKeyIndex >= 0 && descriptionKeyIndex >= 0 && itemTypes.has(key[typeKeyIndex])) {
      key[descriptionKeyIndex] = ITEMS_DESCRIPTION;
    }

    const id = JSON.stringify(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, sums: sumColumns.map(() => 0) };
      groups.set(id, group);
    }

    for (let c = 0; c < sumValues.length; c++) {
      const values = sumValues[c];
      if (values) group.sums[c] += parseMoney(values[i] ?? null) ?? 0;
    }
  }

  const ordered = [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
  const rows: CellValue[][] = ordered.map((group) => [...group.key, ...group.sums]);

  logger.debug(
    { report: source.name, rows: source.rowCount, groups: rows.length },
    'Grouped transactions',
  );

  return createFrame([...keys, ...sumColumns], rows, `${frame.name} (grouped)`);
}
