import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_OUTCOME_TABLE, loadOutcomeTable, validateOutcomeTable } from '../../outcomes/outcome-table';
import { OutcomeTableError } from '../../outcomes/errors';

describe('DEFAULT_OUTCOME_TABLE', () => {
  it('defines five process outcomes with a 70/30 success split', () => {
    const process = DEFAULT_OUTCOME_TABLE.process;
    const total = process.reduce((sum, outcome) => sum + outcome.weight, 0);
    const success = process.filter((outcome) => outcome.statusCode === 200);

    expect(process.map((outcome) => outcome.statusCode)).toEqual([200, 400, 403, 503, 504]);
    expect(success).toHaveLength(1);
    expect(success[0].weight / total).toBeCloseTo(0.7);
  });

  it('splits database outcomes evenly and logs pool exhaustion on failure', () => {
    const [ok, failed] = DEFAULT_OUTCOME_TABLE.database;

    expect(ok.weight).toBe(failed.weight);
    expect(ok.statusCode).toBe(200);
    expect(failed.statusCode).toBe(503);
    expect(failed.body).toEqual({ error: 'Database unavailable' });
    expect(failed.details).toEqual(['PostgreSQL connection pool exhausted']);
  });
});

describe('validateOutcomeTable', () => {
  it('accepts the default table and freezes the result', () => {
    const table = validateOutcomeTable(DEFAULT_OUTCOME_TABLE);

    expect(table.process).toHaveLength(5);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.process)).toBe(true);
    expect(Object.isFrozen(table.process[0])).toBe(true);
  });

  it('rejects an empty outcome set', () => {
    expect(() => validateOutcomeTable({ ...DEFAULT_OUTCOME_TABLE, database: [] }))
      .toThrow('database: Outcome set must not be empty');
  });

  it('rejects non-positive weights', () => {
    const database = [{ ...DEFAULT_OUTCOME_TABLE.database[0], weight: 0 }];

    expect(() => validateOutcomeTable({ ...DEFAULT_OUTCOME_TABLE, database })).toThrow(OutcomeTableError);
  });

  it('rejects status codes outside the HTTP range', () => {
    const process = [{ ...DEFAULT_OUTCOME_TABLE.process[0], statusCode: 700 }];

    expect(() => validateOutcomeTable({ ...DEFAULT_OUTCOME_TABLE, process })).toThrow(/process\.0\.statusCode/);
  });

  it('rejects a missing endpoint', () => {
    expect(() => validateOutcomeTable({ process: DEFAULT_OUTCOME_TABLE.process })).toThrow(OutcomeTableError);
  });

  it('rejects an unknown severity', () => {
    const database = [{ ...DEFAULT_OUTCOME_TABLE.database[0], logSeverity: 'DEBUG' }];

    expect(() => validateOutcomeTable({ ...DEFAULT_OUTCOME_TABLE, database })).toThrow(OutcomeTableError);
  });
});

describe('loadOutcomeTable', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'outcome-table-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the default table without an override', () => {
    expect(loadOutcomeTable()).toEqual(DEFAULT_OUTCOME_TABLE);
  });

  it('replaces only the endpoints named in the override file', () => {
    const path = join(dir, 'table.json');
    writeFileSync(path, JSON.stringify({
      database: [{
        name: 'always-down',
        weight: 1,
        statusCode: 503,
        body: { error: 'Database unavailable' },
        logMessage: 'Database connection failed',
        logSeverity: 'ERROR'
      }]
    }));

    const table = loadOutcomeTable(path);

    expect(table.database.map((outcome) => outcome.name)).toEqual(['always-down']);
    expect(table.process).toEqual(DEFAULT_OUTCOME_TABLE.process);
  });

  it('rejects unknown endpoints in the override file', () => {
    const path = join(dir, 'table.json');
    writeFileSync(path, JSON.stringify({ checkout: [] }));

    expect(() => loadOutcomeTable(path)).toThrow(OutcomeTableError);
  });

  it('reports unreadable files', () => {
    expect(() => loadOutcomeTable(join(dir, 'missing.json'))).toThrow(/Failed to read outcome table/);
  });

  it('reports malformed JSON', () => {
    const path = join(dir, 'table.json');
    writeFileSync(path, '{ not json');

    expect(() => loadOutcomeTable(path)).toThrow(/Failed to read outcome table/);
  });
});
