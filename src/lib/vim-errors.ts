/**
 * Raised only for caller bugs (direct out-of-range buffer access, malformed
 * state handed to `deserializeState`). Learner input never throws.
 */
export class SimulatorContractError extends Error {
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(`[VimEngine] ${message}`);
    this.name = "SimulatorContractError";
    this.details = details;
  }
}
