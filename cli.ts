import { fdOutput, Node, type Output } from "./Node.js";

export interface CliOptions {
  input: AsyncIterable<string>;
  output?: Output;
  error?: (...data: unknown[]) => void;
}

/**
 * Runs one node over the whole input and returns the process exit code:
 * 0 once input ends, 1 after printing the first failure.
 */
export const main = async ({
  input,
  output = fdOutput(1),
  error: report = console.error,
}: CliOptions): Promise<number> => {
  const error = await new Node(output).run(input);
  if (!error) {
    return 0;
  }
  report(`fatal ${error.code}: ${error.message}`, error.context ?? {});
  return 1;
};
