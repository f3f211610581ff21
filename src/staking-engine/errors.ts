export type StakingErrorCode =
  | "Unauthorized"
  | "NotDepositor"
  | "NotAStaker"
  | "NotADepositorOrStaker"
  | "ContractIsPaused"
  | "ContractIsNotPaused"
  | "UnstakePending"
  | "AssetTypeMismatch"
  | "DepositFailed"
  | "StakeLimitExceeded"
  | "ZeroRewardCantBeAdded"
  | "InsufficientFunds"
  | "InsufficientRewardPool"
  | "CoolDownPeriodIsActive"
  | "TransferFailed"
  | "WithdrawFailed"
  | "InvalidPrice"
  | "ReentrantCall";

const HTTP_STATUS: Record<StakingErrorCode, number> = {
  Unauthorized: 403,
  NotDepositor: 409,
  NotAStaker: 409,
  NotADepositorOrStaker: 409,
  ContractIsPaused: 423,
  ContractIsNotPaused: 409,
  UnstakePending: 409,
  AssetTypeMismatch: 409,
  DepositFailed: 400,
  StakeLimitExceeded: 400,
  ZeroRewardCantBeAdded: 400,
  InsufficientFunds: 409,
  InsufficientRewardPool: 409,
  CoolDownPeriodIsActive: 425,
  TransferFailed: 502,
  WithdrawFailed: 502,
  InvalidPrice: 503,
  ReentrantCall: 409,
};

export class StakingError extends Error {
  constructor(
    public readonly code: StakingErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? code, options);
    this.name = "StakingError";
  }

  httpStatus(): number {
    return HTTP_STATUS[this.code];
  }
}

export function isStakingError(err: unknown, code?: StakingErrorCode): err is StakingError {
  return err instanceof StakingError && (code === undefined || err.code === code);
}
