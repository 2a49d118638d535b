import { writeSync } from "node:fs";
import { initialNumericId, verbose } from "./config.js";
import { echo } from "./echo.js";
import { NodeError } from "./errors.js";
import { type JsonText, JsonValueScanner, type TextPosition } from "./json-stream.js";
import {
  type Message,
  parseMessage,
  reply,
  serializeMessage,
} from "./message.js";
import { type Clock, generateUniqueId } from "./unique-id.js";

export type StepResult =
  | { ok: true; reply: Message }
  | { ok: false; error: NodeError };

/** Sink for serialized replies. `write` throws when the chunk cannot be written. */
export interface Output {
  write(chunk: string): void;
}

export type WriteSync = (fd: number, bytes: Uint8Array, offset: number) => number;

const isErrno = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && "code" in err;

// synchronous sleep
const pause = (ms: number) => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

/**
 * Writes synchronously to a file descriptor, so a reply is fully written
 * (or has failed) before the next message is looked at. A full
 * non-blocking pipe (`EAGAIN`) is waited out; any other error is thrown.
 */
export const fdOutput = (
  fd: number,
  write: WriteSync = (target, bytes, offset) => writeSync(target, bytes, offset),
): Output => ({
  write: (chunk) => {
    const bytes = Buffer.from(chunk, "utf8");
    let offset = 0;
    while (offset < bytes.length) {
      try {
        offset += write(fd, bytes, offset);
      } catch (err) {
        if (!isErrno(err) || err.code !== "EAGAIN") {
          throw err;
        }
        pause(1);
      }
    }
  },
});

export interface NodeOptions {
  initialNumericId?: number;
  clock?: Clock;
  log?: (text: string) => void;
}

const describe = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

const unreachable = (value: never): never => {
  throw new Error(`unhandled payload ${JSON.stringify(value)}`);
};

/**
 * A single protocol node. The counter is both the `msg_id` of the next
 * reply and the numeric part of generated ids; it advances only after a
 * reply has been written.
 *
 * Steps run one at a time. Anything that processes messages concurrently
 * has to give the counter a single owner first.
 */
export class Node {
  private counter: number;
  private id: string | undefined;
  private ids: string[] = [];
  private readonly output: Output;
  private readonly clock: Clock;
  private readonly log: ((text: string) => void) | undefined;

  constructor(
    output: Output,
    {
      initialNumericId: start = initialNumericId,
      clock = Date.now,
      log = verbose ? console.warn : undefined,
    }: NodeOptions = {},
  ) {
    this.counter = start;
    this.output = output;
    this.clock = clock;
    this.log = log;
  }

  get numericId(): number {
    return this.counter;
  }

  get nodeId(): string | undefined {
    return this.id;
  }

  get nodeIds(): readonly string[] {
    return this.ids;
  }

  step(input: Message): StepResult {
    const payload = input.body.payload;
    this.log?.(`received ${payload.type} from ${input.src}`);

    switch (payload.type) {
      case "init": {
        const result = this.send(reply(input, this.counter, { type: "init_ok" }));
        if (result.ok) {
          this.id = payload.node_id;
          this.ids = [...payload.node_ids];
        }
        return result;
      }
      case "echo":
        return this.send(reply(input, this.counter, echo(payload)));
      case "generate":
        return this.send(
          reply(input, this.counter, {
            type: "generate_ok",
            id: generateUniqueId(this.counter, input.dest, this.clock),
          }),
        );
      case "init_ok":
      case "echo_ok":
      case "generate_ok":
        // this node never sends the requests these would answer
        return {
          ok: false,
          error: new NodeError(
            "PROTOCOL_VIOLATION",
            `received unexpected ${payload.type} message from ${input.src}`,
            { type: payload.type, src: input.src, msg_id: input.body.msg_id },
          ),
        };
      default:
        return unreachable(payload);
    }
  }

  /** Parses and steps one JSON value; failures carry where it started. */
  handleText(text: string, { line, column }: TextPosition): StepResult {
    const parsed = parseMessage(text);
    const result: StepResult = parsed.ok ? this.step(parsed.message) : parsed;
    return result.ok
      ? result
      : { ok: false, error: result.error.withContext({ line, column }) };
  }

  /**
   * Feeds every JSON value in the input to the node in order, however the
   * values are spread over chunks and lines. Resolves with the first
   * failure, or `undefined` once the input ends.
   */
  async run(chunks: AsyncIterable<string>): Promise<NodeError | undefined> {
    const scanner = new JsonValueScanner();
    for await (const chunk of chunks) {
      const error = this.handleAll(scanner.push(chunk));
      if (error) {
        return error;
      }
    }
    return this.handleAll(scanner.end());
  }

  private handleAll(values: JsonText[]): NodeError | undefined {
    for (const { text, ...position } of values) {
      const result = this.handleText(text, position);
      if (!result.ok) {
        return result.error;
      }
    }
    return undefined;
  }

  private send(message: Message): StepResult {
    const type = message.body.payload.type;
    try {
      this.output.write(`${serializeMessage(message)}\n`);
    } catch (err) {
      return {
        ok: false,
        error: new NodeError(
          "WRITE_ERROR",
          `failed to write ${type} reply to ${message.dest}: ${describe(err)}`,
          { type, dest: message.dest },
          err,
        ),
      };
    }
    this.counter += 1;
    this.log?.(`sent ${type} to ${message.dest}`);
    return { ok: true, reply: message };
  }
}
