import { describe, expect, it, vi } from "vitest";
import { main } from "./cli.js";

async function* chunksOf(...chunks: string[]) {
  yield* chunks;
}

const memoryOutput = () => {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
    },
  };
};

describe("main", () => {
  it("exits with 0 once input ends", async () => {
    const output = memoryOutput();
    const error = vi.fn();

    const code = await main({
      input: chunksOf('{"src":"c1","dest":"n1","body":{"msg_id":1,"type":"echo","echo":"hi"}}\n'),
      output,
      error,
    });

    expect(code).toBe(0);
    expect(output.chunks).toEqual([
      '{"src":"n1","dest":"c1","body":{"msg_id":0,"in_reply_to":1,"type":"echo_ok","echo":"hi"}}\n',
    ]);
    expect(error).not.toHaveBeenCalled();
  });

  it("exits with 1 and reports the first failure", async () => {
    const output = memoryOutput();
    const error = vi.fn();

    const code = await main({
      input: chunksOf('{"src":"n2","dest":"n1","body":{"msg_id":5,"type":"generate_ok","id":"1_n2_0"}}\n'),
      output,
      error,
    });

    expect(code).toBe(1);
    expect(output.chunks).toEqual([]);
    expect(error.mock.calls).toEqual([
      [
        "fatal PROTOCOL_VIOLATION: received unexpected generate_ok message from n2",
        { type: "generate_ok", src: "n2", msg_id: 5, line: 1, column: 1 },
      ],
    ]);
  });

  it("exits with 1 when input is not a message", async () => {
    const error = vi.fn();

    const code = await main({ input: chunksOf("\n  nope\n"), output: memoryOutput(), error });

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toEqual({ line: 2, column: 3 });
  });
});
