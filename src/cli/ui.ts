import chalk from "chalk";
import ora from "ora";

export type Tone = "ok" | "warn" | "fail" | "note";

const TONES: Record<Tone, (text: string) => string> = {
  ok: (text) => chalk.green(`  ✓ ${text}`),
  warn: (text) => chalk.yellow(`  ! ${text}`),
  fail: (text) => chalk.red(`  ✗ ${text}`),
  note: (text) => chalk.gray(`    ${text}`),
};

export function line(tone: Tone, text: string): void {
  console.log(TONES[tone](text));
}

export function heading(title: string): void {
  console.log(chalk.bold.cyan(`\n  ${title}\n`));
}

/** Runs `task` behind a spinner; the task may retitle it as it goes. */
export async function withSpinner<T>(text: string, task: (retitle: (text: string) => void) => Promise<T>): Promise<T> {
  const spinner = ora({ text, indent: 2 }).start();
  try {
    return await task((next) => {
      spinner.text = next;
    });
  } finally {
    spinner.stop();
  }
}

/** Label/value rows with the labels padded to one column. */
export function fields(rows: ReadonlyArray<readonly [string, string]>): void {
  const width = Math.max(0, ...rows.map(([label]) => label.length));
  for (const [label, value] of rows) {
    console.log(`  ${chalk.gray(label.padEnd(width))}  ${value}`);
  }
}

/** Plain-text columns; cells longer than their column are not truncated. */
export function table(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const render = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join("  ").trimEnd();
  console.log(chalk.bold(`  ${render(headers)}`));
  for (const row of rows) {
    console.log(`  ${render(row)}`);
  }
}
