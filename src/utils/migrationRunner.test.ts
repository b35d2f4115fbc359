/**
 * Unit tests for the migration runner utility.
 *
 * Tests migration file discovery and ordering without
 * requiring a live database connection.
 */

import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { DEFAULT_MIGRATIONS_DIR, getMigrationFiles } from './migrationRunner.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const MIGRATIONS_DIR = path.resolve(__dirname, '..', 'migrations');

describe('migrationRunner', () => {
  describe('getMigrationFiles', () => {
    it('should find the RBAC schema migration', () => {
      const files = getMigrationFiles(MIGRATIONS_DIR);

      expect(files).toEqual(['001_create_rbac_tables.sql']);
    });

    it('should default to the migrations directory beside the sources', () => {
      expect(DEFAULT_MIGRATIONS_DIR).toBe(MIGRATIONS_DIR);
      expect(getMigrationFiles()).toEqual(getMigrationFiles(MIGRATIONS_DIR));
    });

    it('should return empty array for non-existent directory', () => {
      const files = getMigrationFiles('/non/existent/path');
      expect(files).toEqual([]);
    });
  });
});
