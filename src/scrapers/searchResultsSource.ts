/**
 * searchResultsSource.ts — The servant search results table.
 *
 * The table is filled by the portal's own scripts after the document loads,
 * so the same page is seen in four states while polling:
 *   • no table yet                              → null (not this layout, yet)
 *   • table with an empty body or loading row   → "rendering"
 *   • table whose placeholder says "no records" → "not-found"
 *   • table with data rows                      → "results"
 *
 * Once the table exists only its own placeholder decides "no records"; the
 * rest of the page carries an empty-result message even while loading.
 *
 * Columns are located by their header text rather than their position: the
 * `colunasSelecionadas` parameter decides which columns exist, and the
 * portal has reordered them before.
 */

import type { CheerioAPI } from 'cheerio';
import { BaseResultSource, type SearchPageState, type ServantRow } from './baseResultSource';
import { isNotFoundText } from './notFoundSource';

const RESULTS_TABLE_SELECTOR = '#lista, table#tabela-servidores, #resultados table';

type ResultsState = Extract<
  SearchPageState,
  { layout: 'results' | 'rendering' | 'malformed' | 'not-found' }
>;

interface ColumnIndexes {
  status: number;
  type: number;
  role: number;
  detail: number;
}

export class SearchResultsSource extends BaseResultSource<ResultsState> {
  readonly name = 'search-results';

  read($: CheerioAPI, pageUrl: string): ResultsState | null {
    const table = $(RESULTS_TABLE_SELECTOR).first();
    if (table.length === 0) return null;

    const headers = table
      .find('thead th')
      .toArray()
      .map((th) => this.foldLabel($(th).text()));

    // Headers are injected together with the first page of rows.
    if (headers.length === 0) return { layout: 'rendering' };

    const columns = this.locateColumns(headers);
    if (columns.status < 0) {
      return { layout: 'malformed', reason: 'results table has no status column' };
    }

    const rows: ServantRow[] = [];
    table.find('tbody tr').each((_, tr) => {
      const cells = $(tr).children('td');
      // Placeholder rows ("Carregando…", "Nenhum registro encontrado") span
      // the table in a single cell.
      if (cells.length < headers.length || $(tr).find('.dataTables_empty').length > 0) {
        return;
      }

      const textAt = (index: number): string =>
        index >= 0 ? this.cleanText(cells.eq(index).text()) : '';

      const linkCell = columns.detail >= 0 ? cells.eq(columns.detail) : $(tr);
      const href = linkCell.find('a[href]').last().attr('href');

      rows.push({
        role: textAt(columns.type) || textAt(columns.role),
        status: textAt(columns.status),
        detailUrl: this.resolveLink(href, pageUrl),
      });
    });

    if (rows.length > 0) return { layout: 'results', rows };

    const placeholder = this.cleanText(table.find('tbody .dataTables_empty').text());
    return isNotFoundText(placeholder) ? { layout: 'not-found' } : { layout: 'rendering' };
  }

  private locateColumns(headers: string[]): ColumnIndexes {
    const find = (pattern: RegExp): number => headers.findIndex((h) => pattern.test(h));
    return {
      status: find(/^situacao/),
      type: find(/^tipo/),
      role: find(/^cargo/),
      detail: find(/^detalhar/),
    };
  }
}
