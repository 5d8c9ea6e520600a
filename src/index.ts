export { VimSimulator } from "./lib/vim-simulator";
export { StreamingVimSimulator } from "./lib/streaming-vim-simulator";
export { SimulatorContractError } from "./lib/vim-errors";
export {
  DEFAULT_SIMULATOR_OPTIONS,
  mergeOptions,
  type SimulatorOptions,
} from "./lib/vim-options";
export {
  countKeystrokes,
  encodeKeys,
  formatToken,
  normalizeKey,
  tokenizeKeystrokes,
} from "./lib/vim-keys";
export {
  checkExercise,
  textSimilarity,
  type ExerciseCheck,
  type ExerciseGoal,
  type ExerciseResult,
} from "./lib/exercise-check";
export {
  createSessionStore,
  type SessionStore,
  type SessionStoreConfig,
} from "./lib/session-store";
export type {
  DisplayState,
  EditorOutcome,
  Position,
  RegisterEntry,
  ReplayStep,
  Selection,
  SerializedState,
  VimMode,
} from "./lib/vim-types";
