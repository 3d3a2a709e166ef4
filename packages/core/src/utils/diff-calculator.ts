/**
 * Diff calculation utilities for change tracking
 *
 * @module diff-calculator
 *
 * @remarks
 * Compares before/after states of a row and identifies field-level changes.
 * Only the fields the calculator was created with are ever looked at.
 *
 * @example
 * ```typescript
 * const calculateDiff = createDiffCalculator(['Budget Spent', 'Progress']);
 *
 * const changes = calculateDiff(
 *   { Activity: 'A1', 'Budget Spent': 100, Progress: 'Started' },
 *   { Activity: 'A1', 'Budget Spent': 250, Progress: 'Started' }
 * );
 * // => { 'Budget Spent': { before: 100, after: 250 } }
 * ```
 */

import type { FieldChange } from '../domain/change-types.js';
import type { CellValue, Row } from '../domain/table.js';
import { toDisplayString } from './display.js';

/**
 * Result of diff calculation
 *
 * Returns field-level changes or null if no changes detected
 */
export type DiffResult = Record<string, FieldChange> | null;

/**
 * Function type for calculating diffs between two states of the same row
 */
export type DiffCalculator = (before: Row, after: Row) => DiffResult;

/**
 * Compares two values by their display representation
 *
 * @remarks
 * No type-aware equality: a number and the string spelling it the same way are equal.
 */
export const areValuesEqual = (oldValue: CellValue | undefined, newValue: CellValue | undefined): boolean => {
  return toDisplayString(oldValue) === toDisplayString(newValue);
};

/**
 * Creates a diff calculator restricted to the given fields
 *
 * @param comparedFields - Field names to compare, in the order changes should be reported
 * @returns Diff calculator function
 */
export const createDiffCalculator = (comparedFields: readonly string[]): DiffCalculator => {
  return (before: Row, after: Row): DiffResult => {
    const changes: Record<string, FieldChange> = {};

    for (const fieldName of comparedFields) {
      const oldValue = before[fieldName] ?? null;
      const newValue = after[fieldName] ?? null;

      if (!areValuesEqual(oldValue, newValue)) {
        changes[fieldName] = { before: oldValue, after: newValue };
      }
    }

    return Object.keys(changes).length > 0 ? changes : null;
  };
};
