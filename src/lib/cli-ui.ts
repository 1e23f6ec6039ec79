/**
 * Terminal styling helpers
 *
 * Colours and tables with plain fallbacks for --no-color, NO_COLOR and legacy
 * Windows consoles.
 */

import chalk from "chalk";
// cli-table3 uses CommonJS `export =` syntax, default import works with esModuleInterop
import Table from "cli-table3";

export interface UIConfig {
  /** Disable all colors and styling */
  noColor: boolean;
}

let config: UIConfig = {
  noColor: false,
};

/**
 * Call early in CLI startup to set global options
 */
export function configureUI(options: Partial<UIConfig>): void {
  config = { ...config, ...options };
  if (process.env.NO_COLOR) {
    config.noColor = true;
  }
}

export function getUIConfig(): Readonly<UIConfig> {
  return { ...config };
}

function styled(colorFn: (s: string) => string): (s: string) => string {
  return (s: string) => (config.noColor ? s : colorFn(s));
}

export const colors = {
  success: styled(chalk.green),
  error: styled(chalk.red),
  warning: styled(chalk.yellow),
  muted: styled(chalk.gray),
  header: styled(chalk.cyan.bold),
  bold: styled(chalk.bold),
};

function isLegacyWindows(): boolean {
  return (
    process.platform === "win32" &&
    !process.env.WT_SESSION && // Not Windows Terminal
    !process.env.TERM_PROGRAM // Not VS Code terminal
  );
}

const ASCII_TABLE_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

/**
 * Render rows under a header line
 */
export function table(headers: string[], rows: string[][]): string {
  const tableInstance = new Table({
    head: headers.map(colors.header),
    style: {
      head: [],
      border: config.noColor ? [] : ["gray"],
    },
    chars: isLegacyWindows() ? ASCII_TABLE_CHARS : undefined,
  });

  for (const row of rows) {
    tableInstance.push(row);
  }

  return tableInstance.toString();
}
