export type Clock = () => number;

/**
 * Builds an id as `{seconds}_{destination}_{numericId}`.
 *
 * The leading unix timestamp makes ids sortable by the second they were
 * generated in. Nothing is padded: within one second ids sort lexically by
 * counter (`_12` before `_2`), and two processes answering for the same
 * destination with the same counter value in the same second produce the
 * same id. A fixed-width counter reset every second (or a millisecond
 * timestamp) would remove both, at the price of changing the format
 * consumers already read.
 */
export const generateUniqueId = (
  numericId: number,
  destination: string,
  clock: Clock = Date.now,
): string => {
  const seconds = Math.floor(clock() / 1000);
  return `${seconds}_${destination}_${numericId}`;
};
