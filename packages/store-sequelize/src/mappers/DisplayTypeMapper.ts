import type { ColumnKind } from '@tableimport/core';

/** Display type codes of the application dictionary (`AD_Reference_ID`). */
export const DisplayType = {
  Integer: 11,
  Amount: 12,
  ID: 13,
  Date: 15,
  DateTime: 16,
  Table: 18,
  TableDir: 19,
  YesNo: 20,
  Number: 22,
  Time: 24,
  Quantity: 29,
  Search: 30,
  CostPrice: 37,
} as const;

const KINDS: ReadonlyMap<number, ColumnKind> = new Map<number, ColumnKind>([
  [DisplayType.ID, 'integer'],
  [DisplayType.Table, 'integer'],
  [DisplayType.TableDir, 'integer'],
  [DisplayType.Search, 'integer'],
  [DisplayType.Integer, 'integer'],
  [DisplayType.Amount, 'decimal'],
  [DisplayType.Number, 'decimal'],
  [DisplayType.CostPrice, 'decimal'],
  [DisplayType.Quantity, 'decimal'],
  [DisplayType.Date, 'temporal'],
  [DisplayType.DateTime, 'temporal'],
  [DisplayType.Time, 'temporal'],
  [DisplayType.YesNo, 'boolean'],
]);

/** Map a display type to its column kind. Every code not listed is text. */
export function toColumnKind(displayType: number | null): ColumnKind {
  return displayType === null ? 'text' : (KINDS.get(displayType) ?? 'text');
}
