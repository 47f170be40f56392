/**
 * Output goes through process streams directly so commands stay testable
 * by swapping the stream's write function.
 */

export function writeLine(line = ""): void {
  process.stdout.write(`${line}\n`);
}

export function writeErrorLine(line: string): void {
  process.stderr.write(`${line}\n`);
}
