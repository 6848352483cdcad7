import type { Palette } from './theme.js';

export type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

/** Buffered terminal writer; `run` hands the lines to the caller */
export interface Ui {
  say(msg: string, style?: Style): void;
  table(rows: Array<Record<string, string | number>>): void;
  readonly out: string[];
  readonly err: string[];
}

export function createUi(palette: Palette): Ui {
  const out: string[] = [];
  const err: string[] = [];

  function say(msg: string, style: Style = 'info') {
    switch (style) {
      case 'success': out.push(palette.success(msg)); break;
      case 'warn': err.push(palette.warn(msg)); break;
      case 'error': err.push(palette.error(msg)); break;
      case 'dim': out.push(palette.dim(msg)); break;
      case 'title': out.push(palette.bold(palette.info(msg))); break;
      default: out.push(palette.info(msg)); break;
    }
  }

  function table(rows: Array<Record<string, string | number>>) {
    if (rows.length === 0) {
      out.push('(none)');
      return;
    }
    const headers = Object.keys(rows[0]);
    const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
    out.push(headers.map((h, i) => palette.bold(h.padEnd(widths[i]))).join('  ').trimEnd());
    for (const r of rows) {
      out.push(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  ').trimEnd());
    }
  }

  return { say, table, out, err };
}
