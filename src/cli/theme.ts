import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  bold: (s: string) => string;
};

export type ThemeName = 'neo' | 'mono' | 'solarized';

export function getPalette(noColor: boolean, theme: string = 'neo'): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const name = theme.toLowerCase();
  if (name === 'mono') {
    return { info: c.white, success: c.white, warn: c.white, error: c.white, dim: c.gray, bold: c.bold };
  }
  if (name === 'solarized') {
    return { info: c.blue, success: c.green, warn: c.yellow, error: c.red, dim: c.gray, bold: c.bold };
  }
  // neo (default)
  return { info: c.cyan, success: c.green, warn: c.yellow, error: c.red, dim: c.gray, bold: c.bold };
}
