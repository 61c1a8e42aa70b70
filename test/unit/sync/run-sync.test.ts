import assert from 'assert';
import { runSync } from '../../../src/sync/run-sync.ts';
import type { SheetMap, SyncContext } from '../../../src/types.ts';
import { createTestLogger, LEVEL } from '../../lib/logger.ts';
import { MemorySheetsGateway } from '../../lib/memory-sheets-gateway.ts';
import { MemoryTableStore } from '../../lib/memory-table-store.ts';

function createFixture() {
  const gateway = new MemorySheetsGateway([
    {
      id: 'mob',
      title: 'Mobility Leads',
      sheets: {
        Devices: [
          ['cdn', 'Model', 'Submitted At'],
          ['A1', 'X200', '2024-01-05 10:30:00'],
          ['A1', 'X300', '2024-01-06 10:30:00'],
          ['A2', 'X200', ''],
        ],
        Leads: [
          ['Name', 'Phone'],
          ['bob', '555'],
        ],
        Archive: [],
      },
    },
    {
      id: 'fin',
      title: 'Finance',
      sheets: {
        Payments: [
          ['Payer', 'Amount'],
          ['amy', '12.5'],
        ],
      },
    },
  ]);
  const store = new MemoryTableStore();
  const { logger, lines } = createTestLogger('info');
  const context: SyncContext = { logger, gateway, store, onDrift: 'error' };
  return { gateway, store, lines, context };
}

const SHEET_MAP: SheetMap = {
  Mobility: { file_name: 'Mobility Leads', sheet_file: { Devices: 'mob_devices', Leads: 'mob_leads', Archive: 'mob_archive' } },
  Finance: { file_name: 'Finance', sheet_file: { Payments: 'fin_payments' } },
};

describe('runSync', () => {
  it('copies every configured worksheet into its table', async () => {
    const { store, context } = createFixture();

    const report = await runSync(context, SHEET_MAP);

    assert.strictEqual(report.inserted, 4);
    assert.strictEqual(report.failed, 0);
    assert.deepStrictEqual(
      report.worksheets.map((w) => [w.worksheet, w.status]),
      [
        ['Devices', 'inserted'],
        ['Leads', 'inserted'],
        ['Archive', 'empty'],
        ['Payments', 'inserted'],
      ]
    );
    assert.deepStrictEqual(store.rows('mob_devices'), [
      { cdn: 'A1', Model: 'X200', 'Submitted At': '2024-01-05 10:30:00.000', _row_hash: null },
      { cdn: 'A2', Model: 'X200', 'Submitted At': null, _row_hash: null },
    ]);
    assert.strictEqual(store.rows('fin_payments')[0]?.Amount, '12.5');
    assert.deepStrictEqual(store.rows('mob_archive'), []);
  });

  it('inserts nothing on a second run', async () => {
    const { context } = createFixture();
    await runSync(context, SHEET_MAP);

    const report = await runSync(context, SHEET_MAP);

    assert.strictEqual(report.inserted, 0);
  });

  it('skips a worksheet whose fetch fails and carries on with the group', async () => {
    const { gateway, store, lines, context } = createFixture();
    gateway.failingSheets.set('Devices', new Error('The service is currently unavailable.'));

    const report = await runSync(context, SHEET_MAP);

    assert.strictEqual(report.failed, 1);
    assert.deepStrictEqual(report.worksheets[0], {
      group: 'Mobility',
      spreadsheet: 'Mobility Leads',
      worksheet: 'Devices',
      table: 'mob_devices',
      status: 'failed',
      error: 'The service is currently unavailable.',
    });
    assert.strictEqual(store.rows('mob_leads').length, 1);
    assert.strictEqual(store.rows('fin_payments').length, 1);
    const error = lines.find((line) => line.level === LEVEL.error);
    assert.strictEqual(error?.msg, 'Failed loading sheet Devices into mob_devices');
  });

  it('reports a missing worksheet and continues', async () => {
    const { context } = createFixture();
    const sheetMap: SheetMap = { Mobility: { file_name: 'Mobility Leads', sheet_file: { Responses: 'mob_responses', Leads: 'mob_leads' } } };

    const report = await runSync(context, sheetMap);

    assert.deepStrictEqual(
      report.worksheets.map((w) => w.status),
      ['failed', 'inserted']
    );
  });

  it('skips the group of a spreadsheet that cannot be opened', async () => {
    const { gateway, lines, context } = createFixture();
    const sheetMap: SheetMap = {
      Missing: { file_name: 'Old Leads', sheet_file: { Leads: 'old_leads' } },
      Finance: { file_name: 'Finance', sheet_file: { Payments: 'fin_payments' } },
    };

    const report = await runSync(context, sheetMap);

    assert.deepStrictEqual(report.fileFailures, [{ group: 'Missing', spreadsheet: 'Old Leads', error: 'Spreadsheet not found: Old Leads' }]);
    assert.deepStrictEqual(
      report.worksheets.map((w) => w.table),
      ['fin_payments']
    );
    assert.deepStrictEqual(gateway.ranges, ["'Payments'"]);
    assert.strictEqual(lines.find((line) => line.level === LEVEL.error)?.msg, "Could not open spreadsheet 'Old Leads'");
  });

  it('logs an empty worksheet', async () => {
    const { lines, context } = createFixture();

    await runSync(context, { Mobility: { file_name: 'Mobility Leads', sheet_file: { Archive: 'mob_archive' } } });

    assert.ok(lines.some((line) => line.msg === 'Sheet Archive is empty, skipping.'));
  });
});
