const formatChunk = (chunk: unknown): string => {
  if (typeof chunk === "string") {
    return chunk;
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk).toString("utf8");
  }
  return String(chunk);
};

export interface CapturedOutput<T> {
  result: T;
  stdout: string;
  stderr: string;
}

/** Run `fn` with stdout and stderr writes collected instead of printed. */
export async function captureOutput<T>(
  fn: () => Promise<T>
): Promise<CapturedOutput<T>> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const originalStdout = process.stdout.write.bind(process.stdout);
  const originalStderr = process.stderr.write.bind(process.stderr);

  process.stdout.write = ((...args: unknown[]) => {
    stdout.push(formatChunk(args[0]));
    return true;
  }) as typeof process.stdout.write;
  process.stderr.write = ((...args: unknown[]) => {
    stderr.push(formatChunk(args[0]));
    return true;
  }) as typeof process.stderr.write;

  try {
    const result = await fn();
    return { result, stdout: stdout.join(""), stderr: stderr.join("") };
  } finally {
    process.stdout.write = originalStdout;
    process.stderr.write = originalStderr;
  }
}
