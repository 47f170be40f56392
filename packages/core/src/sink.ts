import { err, ok, type Result } from "neverthrow";

/**
 * Destination for serialized output. The caller owns the sink; writers and
 * the renderer only call `write`.
 */
export interface TextSink {
  write(chunk: string): void;
}

/** Whatever the sink threw, handed back unchanged. */
export type SinkError = Error;

/** In-memory sink. */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

interface WritableLike {
  write(chunk: string): unknown;
}

/** Adapt a Node writable (process.stdout, a file stream) to a TextSink. */
export function streamSink(stream: WritableLike): TextSink {
  return {
    write(chunk) {
      stream.write(chunk);
    },
  };
}

class SinkFailure {
  constructor(readonly cause: unknown) {}
}

export type Emit = (chunk: string) => void;

/**
 * Run a producer against a sink. A throw from `sink.write` stops the
 * producer and comes back as the `err` value; anything else the producer
 * throws is not caught here.
 */
export function drain(
  sink: TextSink,
  produce: (emit: Emit) => void
): Result<void, SinkError> {
  const emit: Emit = (chunk) => {
    if (chunk.length === 0) {
      return;
    }
    try {
      sink.write(chunk);
    } catch (cause) {
      throw new SinkFailure(cause);
    }
  };

  try {
    produce(emit);
  } catch (error) {
    if (error instanceof SinkFailure) {
      return err(toSinkError(error.cause));
    }
    throw error;
  }
  return ok(undefined);
}

function toSinkError(cause: unknown): SinkError {
  return cause instanceof Error ? cause : new Error(String(cause), { cause });
}

/** Run a producer into a string. */
export function collect(produce: (emit: Emit) => void): string {
  const sink = new StringSink();
  const result = drain(sink, produce);
  if (result.isErr()) {
    throw result.error;
  }
  return sink.toString();
}
