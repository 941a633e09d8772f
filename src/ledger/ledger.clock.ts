export const LEDGER_CLOCK = Symbol('LEDGER_CLOCK');

/** Current time in whole unix seconds. Any integer is a valid reading. */
export interface LedgerClock {
  now(): number;
}

export const systemClock: LedgerClock = {
  now: () => Math.floor(Date.now() / 1000),
};
