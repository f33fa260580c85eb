import { XmlEventSource } from '../../container/xml-source';
import { StreamFramingError, errorMessage } from '../../errors';
import type { WarningLog } from '../../shared-tables';

export interface OdsTable {
  name: string;
  hidden: boolean;
}

export interface OdsNamedExpression {
  name: string;
  reference: string;
  /** Table the expression is declared inside, `null` at spreadsheet level. */
  scope: string | null;
}

export interface OdsContentHeader {
  tables: OdsTable[];
  names: OdsNamedExpression[];
  date1904: boolean;
}

/** Numbers a repetition attribute such as `table:number-rows-repeated`; absent or invalid → 1. */
export function repeatCount(value: string | undefined): number {
  if (value === undefined) return 1;
  const count = Number(value);
  return Number.isInteger(count) && count > 0 ? count : 1;
}

/**
 * Collects the table directory, table visibility (from the automatic
 * table styles), named ranges and expressions, and the null date.
 *
 * Broken markup after the first table has started ends the scan with an
 * `ODS_CONTENT_TRUNCATED` warning and keeps what was collected; the
 * cursor of the affected table reports the truncation itself. Broken
 * markup before any table is a malformed header.
 */
export function parseContentHeader(bytes: Uint8Array, chunkSize: number, warnings: WarningLog): OdsContentHeader {
  const header: OdsContentHeader = { tables: [], names: [], date1904: false };
  const tableStyles = new Map<string, string | undefined>();
  const hiddenStyles = new Set<string>();
  const open: { style: string | null; table: string | null; tableDepth: number } = {
    style: null,
    table: null,
    tableDepth: 0,
  };

  const source = new XmlEventSource(
    bytes,
    {
      open(element) {
        const { attributes } = element;
        switch (element.name) {
          case 'style:style':
            open.style = attributes['style:family'] === 'table' ? attributes['style:name'] ?? null : null;
            break;
          case 'style:table-properties':
            if (open.style !== null && attributes['table:display'] === 'false') hiddenStyles.add(open.style);
            break;
          case 'table:table': {
            open.tableDepth++;
            if (open.tableDepth > 1) break;
            const name = attributes['table:name'] ?? `Sheet${header.tables.length + 1}`;
            open.table = name;
            tableStyles.set(name, attributes['table:style-name']);
            header.tables.push({ name, hidden: false });
            break;
          }
          case 'table:named-range':
            header.names.push({
              name: attributes['table:name'] ?? '',
              reference: attributes['table:cell-range-address'] ?? '',
              scope: open.table,
            });
            break;
          case 'table:named-expression':
            header.names.push({
              name: attributes['table:name'] ?? '',
              reference: attributes['table:expression'] ?? '',
              scope: open.table,
            });
            break;
          case 'table:null-date':
            header.date1904 = (attributes['table:date-value'] ?? '').startsWith('1904-01-01');
            break;
        }
      },
      close(name) {
        if (name === 'style:style') open.style = null;
        if (name === 'table:table') {
          open.tableDepth--;
          if (open.tableDepth === 0) open.table = null;
        }
      },
    },
    chunkSize,
  );
  try {
    source.drain();
  } catch (error) {
    if (!(error instanceof StreamFramingError) || header.tables.length === 0) throw error;
    warnings.add({
      code: 'ODS_CONTENT_TRUNCATED',
      message: `content.xml is malformed after ${header.tables.length} table(s): ${errorMessage(error)}`,
      sheet: header.tables[header.tables.length - 1].name,
    });
  }

  for (const table of header.tables) {
    const style = tableStyles.get(table.name);
    table.hidden = style !== undefined && hiddenStyles.has(style);
  }
  return header;
}
