import { describe, it, expect, vi } from 'vitest';
import { TableImport } from '../../src/TableImport.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { formatHeaderToken } from '../../src/domain/services/HeaderTokenParser.js';
import { DuplicateKeyError } from '../../src/domain/errors/ImportErrors.js';
import { FakeCatalog, FakeSqlExecutor, TEST_CONTEXT, createTemplate } from '../fakes.js';

function setup() {
  const catalog = new FakeCatalog()
    .withTab(220, 'AD_User', { Name: { kind: 'text' }, C_BPartner_ID: { kind: 'integer' }, IsActive: { kind: 'boolean' } })
    .withSequence('AD_User', 1000100);
  const executor = new FakeSqlExecutor().withRows('C_BPartner', [
    { C_BPartner_ID: 1000001, Value: 'ACME01' },
    { C_BPartner_ID: 1000002, Value: 'BETA01' },
  ]);
  const importer = new TableImport({ template: createTemplate(), catalog, executor, context: TEST_CONTEXT });
  return { catalog, executor, importer };
}

const FILE = 'Name;C_BPartner_ID[Value]/K;IsActive\nAnn;ACME01;yes\nBob;BETA01;no\nCy;1000003;si\n';

describe('Preview', () => {
  it('should resolve the first rows without writing or reserving keys', async () => {
    const { catalog, executor, importer } = setup();
    const nextPrimaryKey = vi.spyOn(catalog, 'nextPrimaryKey');

    const preview = await importer.from(new BufferSource(FILE)).preview(2);

    expect(preview.table).toBe('AD_User');
    expect(preview.separator).toBe(';');
    expect(preview.totalRows).toBe(3);
    expect(preview.rows.map((r) => [r.rowNumber, [...r.columns.entries()]])).toEqual([
      [
        2,
        [
          ['Name', 'Ann'],
          ['C_BPartner_ID', 1000001],
          ['IsActive', 'Y'],
        ],
      ],
      [
        3,
        [
          ['Name', 'Bob'],
          ['C_BPartner_ID', 1000002],
          ['IsActive', 'N'],
        ],
      ],
    ]);
    expect(executor.writes).toHaveLength(0);
    expect(nextPrimaryKey).not.toHaveBeenCalled();
  });

  it('should return the parsed header fields', async () => {
    const { importer } = setup();

    const preview = await importer.from(new BufferSource(FILE)).preview();

    expect(preview.fields.map(formatHeaderToken)).toEqual(['Name', 'C_BPartner_ID[Value]/K', 'IsActive']);
    expect(preview.rows).toHaveLength(3);
  });

  it('should still validate the whole file', async () => {
    const { importer } = setup();

    await expect(importer.from(new BufferSource(`${FILE}Dee;ACME01;y\n`)).preview(1)).rejects.toThrow(
      DuplicateKeyError,
    );
  });

  it('should not emit events', async () => {
    const { importer } = setup();
    const handler = vi.fn();
    importer.onAny(handler);

    await importer.from(new BufferSource(FILE)).preview();

    expect(handler).not.toHaveBeenCalled();
  });

  it('should leave the import runnable afterwards', async () => {
    const { executor, importer } = setup();
    importer.from(new BufferSource(FILE));

    await importer.preview(1);
    const result = await importer.run();

    expect(result.inserted).toBe(3);
    expect(executor.writes).toHaveLength(3);
  });
});
