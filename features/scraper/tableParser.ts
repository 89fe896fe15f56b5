// Filename: features/scraper/tableParser.ts

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { TableBodyGroup, TableRecord, TableRow } from '../../core/types.js';

/** Selector of the statistics table on every upstream page. */
export const STATISTICS_TABLE_SELECTOR = 'table.tb_base.tb_dados';

// htmlparser2 keeps the tree as written; parse5 would insert a <tbody> into every table
const PARSE_OPTIONS = { xml: { xmlMode: false, decodeEntities: true } };

function rowCells($: CheerioAPI, row: Element): TableRow {
  return $(row)
    .children('th, td')
    .toArray()
    .map((cell) => $(cell).text().trim());
}

function sectionRows($: CheerioAPI, section: Cheerio<Element>): TableRow[] {
  return section
    .find('tr')
    .toArray()
    .map((row) => rowCells($, row))
    .filter((cells) => cells.length > 0);
}

function firstCellHasClass($: CheerioAPI, row: Element, className: string): boolean {
  return $(row).children('td').first().hasClass(className);
}

/**
 * Groups tbody rows: a `td.tb_item` row opens a group and the `td.tb_subitem` rows
 * right after it become its sub-items. Any other row lands in one shared group with
 * empty `item_data`, created where the first such row appears.
 */
function groupBodyRows($: CheerioAPI, tbody: Cheerio<Element>): TableBodyGroup[] {
  const rows = tbody.children('tr').toArray();
  const groups: TableBodyGroup[] = [];
  let ungrouped: TableBodyGroup | null = null;
  let index = 0;

  while (index < rows.length) {
    const row = rows[index];
    const cells = rowCells($, row);
    index++;
    if (cells.length === 0) continue;

    if (firstCellHasClass($, row, 'tb_item')) {
      const group: TableBodyGroup = { item_data: cells, sub_items: [] };
      groups.push(group);
      while (index < rows.length && firstCellHasClass($, rows[index], 'tb_subitem')) {
        const subCells = rowCells($, rows[index]);
        if (subCells.length > 0) group.sub_items.push(subCells);
        index++;
      }
      continue;
    }

    if (!ungrouped) {
      ungrouped = { item_data: [], sub_items: [] };
      groups.push(ungrouped);
    }
    ungrouped.sub_items.push(cells);
  }

  return groups;
}

/**
 * Parses the statistics table of an upstream page.
 * @returns the table, or null when the page has no statistics table
 */
export function parseStatisticsTable(html: string): TableRecord | null {
  if (html.trim() === '') return null;

  const $ = cheerio.load(html, PARSE_OPTIONS);
  const table = $(STATISTICS_TABLE_SELECTOR).first();
  if (table.length === 0) return null;

  const thead = table.children('thead').first();
  const tfoot = table.children('tfoot').first();
  const tbody = table.children('tbody').first();

  const header = sectionRows($, thead);
  const footer = sectionRows($, tfoot);

  let body: TableBodyGroup[];
  if (tbody.length > 0) {
    body = groupBodyRows($, tbody);
  } else {
    // Rows straight under <table>: one group per row
    body = table
      .children('tr')
      .toArray()
      .map((row) => rowCells($, row))
      .filter((cells) => cells.length > 0)
      .map((cells) => ({ item_data: cells, sub_items: [] }));
  }

  return { header, body, footer };
}
