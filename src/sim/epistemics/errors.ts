/**
 * Raised when a caller builds structurally invalid evidence (a reflection about
 * someone else, an observation across locations, a value-bearing forgetting).
 * These are bugs in the calling code; the engine never catches them.
 */
export class ContractViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolation";
  }
}
