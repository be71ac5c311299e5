import { bgRed, bold, cyan, dim, red, white } from "./ansi.js";

/**
 * Prints the config validation report to stderr, one line per problem.
 */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgRed("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [variable, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(variable))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: unset a variable to fall back to its default, e.g.")}`);
  lines.push(`  ${cyan("$ env -u TOTP_WINDOW totpgate auth alice")}`);
  lines.push("");

  process.stderr.write(`${lines.join("\n")}\n`);
};
