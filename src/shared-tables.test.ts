import { describe, it, expect } from 'vitest';
import { CellResolver, SharedTablesBuilder, WarningLog } from './shared-tables';

describe('WarningLog', () => {
  it('should stop recording at its limit and report the dropped count', () => {
    const log = new WarningLog(2);
    log.add({ code: 'A', message: 'first' });
    log.add({ code: 'B', message: 'second' });
    log.add({ code: 'C', message: 'third' });
    log.add({ code: 'D', message: 'fourth' });
    expect(log.size).toBe(4);
    expect(log.list().map((warning) => warning.code)).toEqual(['A', 'B', 'WARNINGS_DROPPED']);
    expect(log.list()[2].message).toBe('2 further warnings were not recorded');
  });
});

describe('SharedResourceTables', () => {
  const build = (configure: (builder: SharedTablesBuilder) => void) => {
    const warnings = new WarningLog();
    const builder = new SharedTablesBuilder(warnings);
    configure(builder);
    return { tables: builder.build(), warnings };
  };

  it('should format every number as General when there is no style table', () => {
    const { tables } = build(() => {});
    expect(tables.formatForStyle(0)).toEqual({ ok: true, format: { id: 0, code: null, kind: 'general' } });
    expect(tables.formatForStyle(1)).toMatchObject({ ok: false, code: '#BAD_STYLE_INDEX' });
  });

  it('should resolve custom formats before built-in ones', () => {
    const { tables } = build((builder) => {
      builder.addFormat(14, '0.00');
      builder.addFormat(170, 'dd/mm/yyyy');
      builder.addStyle(14);
      builder.addStyle(170);
      builder.addStyle(200);
    });
    expect(tables.formatForStyle(0)).toEqual({ ok: true, format: { id: 14, code: '0.00', kind: 'numeric' } });
    expect(tables.formatForStyle(1)).toEqual({ ok: true, format: { id: 170, code: 'dd/mm/yyyy', kind: 'date' } });
    expect(tables.formatForStyle(2)).toEqual({
      ok: false,
      code: '#BAD_NUMBER_FORMAT',
      detail: 'number format 200 is not defined',
    });
  });

  it('should reject negative format ids with a warning', () => {
    const { tables, warnings } = build((builder) => builder.addFormat(-4, '0'));
    expect(tables.numberFormat(-4)).toBeUndefined();
    expect(warnings.list()).toEqual([{ code: 'BAD_NUMBER_FORMAT', message: 'Skipped number format with id -4' }]);
  });
});

describe('CellResolver', () => {
  const setup = () => {
    const warnings = new WarningLog();
    const builder = new SharedTablesBuilder(warnings);
    builder.addString('only');
    builder.addStyle(0);
    builder.addStyle(14);
    builder.addStyle(46);
    return { resolver: new CellResolver(builder.build(), warnings, 'Sheet1'), warnings };
  };

  it('should keep integer and float numbers apart', () => {
    const { resolver } = setup();
    expect(resolver.integer(7, 0, 0, 0)).toEqual({ type: 'int', value: 7n });
    expect(resolver.number(7, 0, 0, 0)).toEqual({ type: 'float', value: 7 });
  });

  it('should turn date and duration styles into temporal cells', () => {
    const { resolver } = setup();
    expect(resolver.number(44197, 1, 0, 0)).toEqual({
      type: 'datetime',
      value: new Date(Date.UTC(2021, 0, 1)),
      kind: 'date',
      serial: 44197,
    });
    expect(resolver.number(0.5, 2, 0, 0)).toEqual({ type: 'duration', milliseconds: 43_200_000, serial: 0.5 });
  });

  it('should report a bad shared string index with its position', () => {
    const { resolver, warnings } = setup();
    expect(resolver.sharedString(3, 4, 2)).toEqual({
      type: 'error',
      code: '#BAD_STRING_INDEX',
      detail: 'shared string 3 is outside a table of 1',
    });
    expect(warnings.list()).toEqual([
      {
        code: 'BAD_STRING_INDEX',
        message: 'shared string 3 is outside a table of 1',
        sheet: 'Sheet1',
        row: 4,
        col: 2,
      },
    ]);
  });

  it('should flag out-of-range date serials', () => {
    const { resolver, warnings } = setup();
    expect(resolver.number(-1, 1, 0, 0)).toMatchObject({ type: 'error', code: '#DATE_RANGE' });
    expect(warnings.list()[0].code).toBe('DATE_OUT_OF_RANGE');
  });
});
