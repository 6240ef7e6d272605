import Table from 'cli-table3';
import { HighlightResult } from '../../domain/entities';

export class CliPresenter {
  public present(data: unknown, options: { table?: boolean }): void {
    if (!options.table || !this.isHighlightResult(data)) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }
    this.renderHighlights(data);
  }

  private isHighlightResult(data: unknown): data is HighlightResult {
    return typeof data === 'object' && data !== null && 'documents' in data && Array.isArray(data.documents);
  }

  private renderHighlights(result: HighlightResult): void {
    const rows = result.documents.flatMap((document) => document.highlights);
    if (rows.length === 0) {
      console.log('No highlights found.');
      return;
    }

    const table = new Table({
      head: ['File', 'Line', 'Character', 'Role', 'ID'],
      style: { head: ['cyan'] },
    });
    rows.forEach((highlight) => {
      table.push([highlight.filePath, highlight.line, highlight.character, highlight.role, highlight.id]);
    });

    console.log(table.toString());
  }
}
