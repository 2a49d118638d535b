// trace every received and sent message on stderr
export const verbose = process.env.MAELSTROM_NODE_VERBOSE === "1";

export const initialNumericId = 0;
