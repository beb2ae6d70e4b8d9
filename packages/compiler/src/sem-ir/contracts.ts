import { getCompilerConfig } from "../config.js";

/**
 * Raised when a caller breaks a precondition of the IR stores. These indicate
 * a bug in the checking pipeline, never a problem in the user's program.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(`semir contract violation: ${message}`);
    this.name = "ContractViolationError";
  }
}

export const contractChecksEnabled = (): boolean =>
  getCompilerConfig().contractChecks;

export function assertContract(
  condition: boolean,
  message: string | (() => string)
): asserts condition {
  if (condition || !contractChecksEnabled()) {
    return;
  }
  throw new ContractViolationError(
    typeof message === "function" ? message() : message
  );
}

/** Unconditional failure, used where continuing would corrupt a store. */
export const contractViolation = (message: string): never => {
  throw new ContractViolationError(message);
};
