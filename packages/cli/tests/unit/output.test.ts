/**
 * Unit tests for CLI output helpers
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';

import { formatTable, relativeTime, statusBadge, isOutputFormat } from '../../src/output.js';

describe('output', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  describe('formatTable', () => {
    it('pads columns to the widest cell', () => {
      const lines = formatTable(
        [
          { id: 'a', name: 'alpha' },
          { id: 'bb', name: 'b' },
        ],
        [
          { key: 'id', header: 'ID' },
          { key: 'name', header: 'NAME' },
        ],
      );

      expect(lines).toEqual(['ID  NAME ', '─────────', 'a   alpha', 'bb  b    ']);
    });

    it('ignores colour codes when measuring', () => {
      chalk.level = 1;
      try {
        const lines = formatTable([{ status: 'up' }], [{ key: 'status', header: 'STATUS', format: (v) => chalk.green(v) }]);
        expect(lines[1]).toBe('──────');
        expect(lines[2]).toBe(`${chalk.green('up')}    `);
      } finally {
        chalk.level = 0;
      }
    });

    it('reports an empty table', () => {
      expect(formatTable([], [])).toEqual(['No data to display']);
    });
  });

  describe('statusBadge', () => {
    it.each([
      ['up', '● up'],
      ['down', '● down'],
      ['closing', '◐ closing'],
      ['unknown', '○ unknown'],
    ])('renders %s', (status, expected) => {
      expect(statusBadge(status)).toBe(expected);
    });
  });

  describe('relativeTime', () => {
    const now = new Date('2026-03-10T12:00:00.000Z');

    it.each([
      ['2026-03-10T11:59:30.000Z', 'just now'],
      ['2026-03-10T11:30:00.000Z', '30m ago'],
      ['2026-03-10T07:00:00.000Z', '5h ago'],
      ['2026-03-08T12:00:00.000Z', '2d ago'],
      ['2026-02-01T12:00:00.000Z', '2026-02-01'],
    ])('formats %s', (date, expected) => {
      expect(relativeTime(date, now)).toBe(expected);
    });
  });

  it('accepts known output formats only', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('table')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
  });
});
