export { closeDb, initDb, isDbInitialized, withConnection } from "./connection";
export { bindings, type BindingRowDraft } from "./repos/bindings";
export { deadLetters } from "./repos/dead-letters";
export type {
  BindingDesiredState,
  BindingPlatform,
  BindingRow,
  DeadLetterRow,
} from "./types";
