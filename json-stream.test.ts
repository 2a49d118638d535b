import { describe, expect, it } from "vitest";
import { JsonValueScanner } from "./json-stream.js";

describe("JsonValueScanner", () => {
  it("cuts values apart on any whitespace", () => {
    const scanner = new JsonValueScanner();

    expect(scanner.push('{"a":1} {"b":[2,3]}\n\t{"c":{}}\n')).toEqual([
      { text: '{"a":1}', line: 1, column: 1 },
      { text: '{"b":[2,3]}', line: 1, column: 9 },
      { text: '{"c":{}}', line: 2, column: 2 },
    ]);
    expect(scanner.end()).toEqual([]);
  });

  it("joins a value cut across chunks and lines", () => {
    const scanner = new JsonValueScanner();

    expect(scanner.push('  {\n  "a": "x')).toEqual([]);
    expect(scanner.push('y"\n}{"b"')).toEqual([
      { text: '{\n  "a": "xy"\n}', line: 1, column: 3 },
    ]);
    expect(scanner.push(":2}")).toEqual([{ text: '{"b":2}', line: 3, column: 2 }]);
  });

  it("ignores brackets and escaped quotes inside strings", () => {
    const scanner = new JsonValueScanner();

    expect(scanner.push('{"a":"}\\"{"}[1]')).toEqual([
      { text: '{"a":"}\\"{"}', line: 1, column: 1 },
      { text: "[1]", line: 1, column: 13 },
    ]);
  });

  it("ends bare scalars at whitespace", () => {
    const scanner = new JsonValueScanner();

    expect(scanner.push('42 "s" true')).toEqual([
      { text: "42", line: 1, column: 1 },
      { text: '"s"', line: 1, column: 4 },
    ]);
    expect(scanner.end()).toEqual([{ text: "true", line: 1, column: 8 }]);
  });

  it("hands back an unfinished value at the end", () => {
    const scanner = new JsonValueScanner();

    expect(scanner.push('{"a":[1,')).toEqual([]);
    expect(scanner.end()).toEqual([{ text: '{"a":[1,', line: 1, column: 1 }]);
  });
});
