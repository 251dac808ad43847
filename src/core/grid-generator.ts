// core/grid-generator.ts
// Pure functions producing table and calendar rows with placeholder tokens

import type {
  GridCell,
  GridLayout,
  GridLayoutConfig,
  GridRow,
  GridSpec,
  GeneratedGrid,
} from '../types/index.js';
import { InvalidGridSpecError } from '../types/index.js';
import { formatToken } from './tokens.js';

/** Physical month columns in a calendar grid, whatever the month count */
export const CALENDAR_COLUMNS = 12;

export const SUPPORTED_MONTH_COUNTS: readonly number[] = [12, 24];

export function rowToken(index: number): string {
  return `table_row${index}`;
}

export function validateRowCount(rowCount: number): void {
  if (!Number.isInteger(rowCount) || rowCount < 1) {
    throw new InvalidGridSpecError(
      `Invalid row count: ${rowCount}`,
      'row_count must be an integer >= 1'
    );
  }
}

export function validateMonthCount(monthCount: number): void {
  if (!SUPPORTED_MONTH_COUNTS.includes(monthCount)) {
    throw new InvalidGridSpecError(
      `Invalid month count: ${monthCount}`,
      `month_count must be one of ${SUPPORTED_MONTH_COUNTS.join(', ')}`
    );
  }
}

/**
 * Header label multiplier: 24 months are shown as 2, 4, ..., 24
 * in the same 12 columns.
 */
export function monthMultiplier(monthCount: number): number {
  validateMonthCount(monthCount);
  return monthCount / CALENDAR_COLUMNS;
}

/**
 * Generate body rows for a layout.
 *
 * Table layouts put every shared column on row 1 only, spanning all rows;
 * calendar rows always carry exactly 12 month cells.
 */
export function generateRows(rowCount: number, layout: GridLayout): GridRow[] {
  validateRowCount(rowCount);

  const rows: GridRow[] = [];

  for (let i = 1; i <= rowCount; i++) {
    const cells: GridCell[] = [{ text: formatToken(rowToken(i)) }];

    if (layout.kind === 'calendar') {
      cells.push(...emptyCells(CALENDAR_COLUMNS));
    } else {
      cells.push(...emptyCells(layout.dataCells ?? 0));
      if (i === 1) {
        for (const text of layout.sharedColumns ?? []) {
          cells.push({ text, rowSpan: rowCount });
        }
      }
    }

    rows.push({ index: i, cells });
  }

  return rows;
}

export function generateCalendarHeader(monthCount = 12): GridCell[] {
  const multiplier = monthMultiplier(monthCount);
  const cells: GridCell[] = [];
  for (let k = 0; k < CALENDAR_COLUMNS; k++) {
    cells.push({ text: String((k + 1) * multiplier) });
  }
  return cells;
}

/**
 * Validate a grid spec and produce header and body for the layout
 */
export function generateGrid(spec: GridSpec, layout: GridLayout): GeneratedGrid {
  validateRowCount(spec.rowCount);

  if (layout.kind === 'calendar') {
    const header = generateCalendarHeader(spec.monthCount ?? 12);
    return { header, rows: generateRows(spec.rowCount, layout) };
  }

  if (spec.monthCount !== undefined) {
    validateMonthCount(spec.monthCount);
  }

  return { header: [], rows: generateRows(spec.rowCount, layout) };
}

/**
 * Map a template descriptor layout onto the generator's layout
 */
export function toGridLayout(config: GridLayoutConfig): GridLayout {
  if (config.kind === 'calendar') {
    return { kind: 'calendar' };
  }
  return {
    kind: 'table',
    dataCells: config.data_cells ?? 0,
    sharedColumns: (config.shared_columns ?? []).map(c => c.text),
  };
}

function emptyCells(count: number): GridCell[] {
  return Array.from({ length: count }, () => ({ text: '' }));
}
