/**
 * Output rendering helpers
 */

type Color = "red" | "green" | "yellow";

/**
 * Destination for command output
 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * Output bound to the process streams; errors are red on a terminal
 */
export const processOutput: CliOutput = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(colorize(text, "red", process.stderr));
  },
};

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param output - Destination
 */
export function printJson(data: unknown, output: CliOutput): void {
  output.stdout(JSON.stringify(data, null, 2) + "\n");
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: readonly string[], output: CliOutput): void {
  output.stdout(lines.map((line) => `${line}\n`).join(""));
}
