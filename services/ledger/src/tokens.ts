export const APP_CONFIG = Symbol("APP_CONFIG");
export const LEDGER_REPOSITORY = Symbol("LEDGER_REPOSITORY");
export const LEDGER_CLOCK = Symbol("LEDGER_CLOCK");
