export interface TextPosition {
  line: number;
  column: number;
}

/** One top-level JSON value cut out of the input, with where it started. */
export interface JsonText extends TextPosition {
  text: string;
}

const isWhitespace = (ch: string) =>
  ch === " " || ch === "\t" || ch === "\n" || ch === "\r";

/**
 * Splits a stream of text into top-level JSON values separated by any
 * amount of whitespace, the way input arrives: several values on one line,
 * or one value over several lines, in chunks cut anywhere.
 *
 * Only strings, escapes and bracket depth are tracked; whether a value is
 * well-formed is left to `JSON.parse`. A bare scalar ends at whitespace.
 */
export class JsonValueScanner {
  private pending = "";
  private start: TextPosition = { line: 1, column: 1 };
  private depth = 0;
  private inString = false;
  private escaped = false;
  private scalar = false;
  private line = 1;
  private column = 1;

  push(chunk: string): JsonText[] {
    const values: JsonText[] = [];
    for (const ch of chunk) {
      if (this.pending === "") {
        if (isWhitespace(ch)) {
          this.advance(ch);
          continue;
        }
        this.start = { line: this.line, column: this.column };
        this.scalar = ch !== "{" && ch !== "[" && ch !== '"';
      } else if (this.scalar && isWhitespace(ch)) {
        values.push(this.complete());
        this.advance(ch);
        continue;
      }

      this.pending += ch;
      this.advance(ch);

      if (this.scalar) {
        continue;
      }
      if (this.inString) {
        if (this.escaped) {
          this.escaped = false;
        } else if (ch === "\\") {
          this.escaped = true;
        } else if (ch === '"') {
          this.inString = false;
          if (this.depth === 0) {
            values.push(this.complete());
          }
        }
      } else if (ch === '"') {
        this.inString = true;
      } else if (ch === "{" || ch === "[") {
        this.depth += 1;
      } else if (ch === "}" || ch === "]") {
        this.depth -= 1;
        if (this.depth <= 0) {
          values.push(this.complete());
        }
      }
    }
    return values;
  }

  /** Whatever is left once input ends; an unfinished value is returned as is. */
  end(): JsonText[] {
    return this.pending === "" ? [] : [this.complete()];
  }

  private complete(): JsonText {
    const value = { text: this.pending, ...this.start };
    this.pending = "";
    this.depth = 0;
    this.inString = false;
    this.escaped = false;
    this.scalar = false;
    return value;
  }

  private advance(ch: string) {
    if (ch === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
  }
}
