// engine/analyzeConsistency.ts
//
// Per-Name dominant Data Type, row flags and the deviation summary.
// Pure computation over an already validated table.

import { cellKey, isMissing } from './cellValues';
import { DEFAULT_REPORT_CONFIG, type ReportColumnsConfig } from './config';
import type {
  AnalysisResult,
  AnalyzedRecord,
  CellValue,
  DeviationRow,
  KeyProfile,
  SheetTable
} from './types';

interface ValueTally {
  value: CellValue;
  count: number;
}

/**
 * Mode of a list of values. Ties go to the value seen first: the Map keeps
 * insertion order and only a strictly greater count replaces the leader.
 */
export function dominantValue(values: CellValue[]): CellValue | undefined {
  const tallies = new Map<string, ValueTally>();
  for (const value of values) {
    const key = cellKey(value);
    const tally = tallies.get(key);
    if (tally) tally.count += 1;
    else tallies.set(key, { value, count: 1 });
  }

  let best: ValueTally | undefined;
  for (const tally of tallies.values()) {
    if (!best || tally.count > best.count) best = tally;
  }
  return best?.value;
}

export function analyzeConsistency(
  table: SheetTable,
  columns: ReportColumnsConfig = DEFAULT_REPORT_CONFIG.columns
): AnalysisResult {
  const nameIndex = table.headers.indexOf(columns.key);
  const typeIndex = table.headers.indexOf(columns.category);

  // 1) Drop rows without a Name or a Data Type
  const kept: Array<{ rowNumber: number; cells: CellValue[]; name: CellValue; dataType: CellValue }> = [];
  let droppedCount = 0;
  for (const record of table.records) {
    const name = nameIndex >= 0 ? record.cells[nameIndex] : undefined;
    const dataType = typeIndex >= 0 ? record.cells[typeIndex] : undefined;
    if (!name || !dataType || isMissing(name) || isMissing(dataType)) {
      droppedCount += 1;
      continue;
    }
    kept.push({ rowNumber: record.rowNumber, cells: record.cells, name, dataType });
  }

  // 2) Group by Name, dominant Data Type per group
  const groups = new Map<string, { name: CellValue; types: CellValue[] }>();
  for (const record of kept) {
    const key = cellKey(record.name);
    const group = groups.get(key);
    if (group) group.types.push(record.dataType);
    else groups.set(key, { name: record.name, types: [record.dataType] });
  }

  const dominantByName = new Map<string, string | undefined>();
  const profiles = new Map<string, KeyProfile>();
  for (const [key, group] of groups) {
    const dominant = dominantValue(group.types);
    dominantByName.set(key, dominant ? cellKey(dominant) : undefined);
    profiles.set(key, {
      name: group.name,
      dominant: dominant ?? { kind: 'empty' },
      total: group.types.length,
      flagged: 0
    });
  }

  // 3) Flag rows that differ from their group's dominant value
  const records: AnalyzedRecord[] = kept.map((record) => {
    const nameKey = cellKey(record.name);
    const flagged = cellKey(record.dataType) !== dominantByName.get(nameKey);
    const profile = profiles.get(nameKey);
    if (flagged && profile) profile.flagged += 1;
    return { ...record, flagged };
  });

  // 4) Names with at least one flagged row
  const inconsistentNames = new Set<string>();
  for (const record of records) {
    if (record.flagged) inconsistentNames.add(cellKey(record.name));
  }

  // 5) Every (Name, Data Type) pair of those Names, first-appearance order
  const summaryGroups = new Map<string, DeviationRow>();
  for (const record of records) {
    const nameKey = cellKey(record.name);
    if (!inconsistentNames.has(nameKey)) continue;
    const pairKey = `${nameKey}\u0000${cellKey(record.dataType)}`;
    const row = summaryGroups.get(pairKey);
    if (row) row.count += 1;
    else summaryGroups.set(pairKey, { name: record.name, dataType: record.dataType, count: 1 });
  }

  return {
    records,
    keyProfiles: [...profiles.values()],
    summary: [...summaryGroups.values()],
    droppedCount,
    flaggedCount: records.filter((record) => record.flagged).length,
    inconsistentKeyCount: inconsistentNames.size
  };
}
