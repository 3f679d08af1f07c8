import { Address } from "viem";

export type RewardsErrorCode =
  | "ARITHMETIC"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_BALANCE"
  | "OPERATION_IN_PROGRESS"
  | "INVALID_ARGUMENT"
  | "NOT_FOUND";

/**
 * Base class for every failure raised by the reward accounting core.
 * Failures are synchronous and abort the operation that raised them.
 */
export class RewardsError extends Error {
  constructor(readonly code: RewardsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ArithmeticFault = "overflow" | "underflow" | "division-by-zero";

export class ArithmeticError extends RewardsError {
  constructor(readonly fault: ArithmeticFault, message: string) {
    super("ARITHMETIC", `${fault}: ${message}`);
  }
}

export class UnauthorizedError extends RewardsError {
  constructor(readonly caller: Address, operation: string) {
    super("UNAUTHORIZED", `${caller} is not allowed to call ${operation}`);
  }
}

export class InsufficientBalanceError extends RewardsError {
  constructor(
    readonly token: Address,
    readonly required: bigint,
    readonly available: bigint
  ) {
    super(
      "INSUFFICIENT_BALANCE",
      `token ${token}: required ${required}, available ${available}`
    );
  }
}

export class OperationInProgressError extends RewardsError {
  constructor(readonly operation: string) {
    super("OPERATION_IN_PROGRESS", `${operation} is already in progress`);
  }
}

export class InvalidArgumentError extends RewardsError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class NotFoundError extends RewardsError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}
