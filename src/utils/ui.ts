import chalk from "chalk";
import ora, { type Ora } from "ora";

const DEBUG_ENV_VAR = "STOREFRONT_QA_DEBUG";

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DEBUG_ENV_VAR];
  return value !== undefined && value !== "" && value !== "0" && value !== "false";
}

export const ui = {
  success: (msg: string) => console.log(chalk.green("✔ ") + msg),
  error: (msg: string) => console.error(chalk.red("✖ ") + msg),
  warn: (msg: string) => console.log(chalk.yellow("⚠ ") + msg),
  info: (msg: string) => console.log(chalk.blue("ℹ ") + msg),
  skip: (msg: string) => console.log(chalk.gray("⊘ ") + msg),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  heading: (msg: string) => console.log(chalk.bold.underline(msg)),
  step: (msg: string) => console.log(chalk.cyan("  → ") + msg),
  debug: (msg: string) => {
    if (isDebugEnabled()) console.log(chalk.dim("  · " + msg));
  },

  spinner(text: string): Ora {
    return ora({ text, color: "cyan" });
  },

  table(rows: string[][]) {
    const header = rows[0];
    if (!header) return;
    const colWidths = header.map((_, col) =>
      Math.max(...rows.map((row) => (row[col] ?? "").length))
    );
    for (const row of rows) {
      const line = row
        .map((cell, i) => cell.padEnd(colWidths[i] ?? 0))
        .join("  ");
      console.log("  " + line);
    }
  },
};
