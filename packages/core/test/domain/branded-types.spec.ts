/**
 * Branded Types Tests
 */

import { describe, expect, it } from 'vitest';
import { createRowId, IdValidationError, isRowId, rowIdFromIndex, unwrapId } from '../../src/index.js';

describe('Branded Types', () => {
  describe('createRowId', () => {
    it('should create a RowId from a non-empty string', () => {
      const rowId = createRowId('12');
      expect(unwrapId(rowId)).toBe('12');
    });

    it('should reject empty and whitespace-only ids', () => {
      expect(() => createRowId('')).toThrow(IdValidationError);
      expect(() => createRowId('   ')).toThrow('[RowId] RowId cannot be empty or whitespace-only: received "   "');
    });
  });

  describe('rowIdFromIndex', () => {
    it('should use the position as the id', () => {
      expect(rowIdFromIndex(0)).toBe('0');
      expect(rowIdFromIndex(41)).toBe('41');
    });

    it('should reject negative and fractional positions', () => {
      expect(() => rowIdFromIndex(-1)).toThrow(IdValidationError);
      expect(() => rowIdFromIndex(1.5)).toThrow('[RowId] RowId index must be a non-negative integer: received "1.5"');
    });
  });

  describe('isRowId', () => {
    it('should accept non-empty strings only', () => {
      expect(isRowId('3')).toBe(true);
      expect(isRowId('')).toBe(false);
      expect(isRowId(3)).toBe(false);
      expect(isRowId(null)).toBe(false);
    });
  });

  describe('IdValidationError', () => {
    it('should carry the id type and value', () => {
      const error = new IdValidationError('RowId', 'x', 'bad id');

      expect(error.name).toBe('IdValidationError');
      expect(error.idType).toBe('RowId');
      expect(error.value).toBe('x');
      expect(error.message).toBe('[RowId] bad id: received "x"');
    });
  });
});
