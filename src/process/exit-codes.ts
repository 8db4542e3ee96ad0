import { constants } from "node:os";

const SIGNAL_EXIT_CODE_BASE = 128;
const UNKNOWN_TERMINATION_EXIT_CODE = 1;

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(
  Object.entries(constants.signals).filter(
    (entry): entry is [string, number] => typeof entry[1] === "number",
  ),
);

/** Shell convention: a child killed by signal N reports 128 + N. */
export const exitCodeForSignal = (signal: NodeJS.Signals) => {
  const signalNumber = SIGNAL_NUMBERS.get(signal);
  return signalNumber === undefined
    ? UNKNOWN_TERMINATION_EXIT_CODE
    : SIGNAL_EXIT_CODE_BASE + signalNumber;
};

export const exitCodeForTermination = (
  code: number | null,
  signal: NodeJS.Signals | null,
) => {
  if (code !== null) {
    return code;
  }
  if (signal !== null) {
    return exitCodeForSignal(signal);
  }
  return UNKNOWN_TERMINATION_EXIT_CODE;
};
