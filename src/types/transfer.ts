export type TransferStage = 'WITHDRAW' | 'CONVERT' | 'DEPOSIT';

export const TRANSFER_STAGES: readonly TransferStage[] = ['WITHDRAW', 'CONVERT', 'DEPOSIT'];

export type StageStatus = 'PENDING' | 'SUBMITTED' | 'CONFIRMING' | 'DONE' | 'FAILED';

export type OrchestratorState =
  | 'INIT'
  | 'WITHDRAW_SUBMIT'
  | 'WITHDRAW_WAIT'
  | 'CONVERT_QUOTE'
  | 'CONVERT_SUBMIT'
  | 'CONVERT_WAIT'
  | 'DEPOSIT_SUBMIT'
  | 'DEPOSIT_WAIT'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'ABORTED';

export type TerminalOutcome = 'SUCCEEDED' | 'FAILED' | 'ABORTED';

export type ErrorClassification =
  | 'TRANSIENT'
  | 'PERMANENT'
  | 'RATE_LIMITED'
  | 'POLICY'
  | 'CONFIRMATION_TIMEOUT'
  | 'DEADLINE_EXCEEDED';

export type FailureReason =
  | 'PERMANENT_ERROR'
  | 'RETRIES_EXHAUSTED'
  | 'CONFIRMATION_TIMEOUT'
  | 'DEADLINE_EXCEEDED'
  | 'EXTERNAL_FAILURE'
  | 'SLIPPAGE_EXCEEDED'
  | 'CANCELLED';

/**
 * `CONFIRMED`: at least one stage settled, so funds left their origin.
 * `UNCONFIRMED`: an external side effect was issued but never confirmed.
 */
export type FundsMovement = 'NONE' | 'CONFIRMED' | 'UNCONFIRMED';

export interface TransferRequest {
  sourceAsset: string;
  destinationAsset: string;
  /** Integer amount in the source asset's base units. */
  amount: string;
  chain: string;
  destinationAddress: string;
  /** Integer amount in the destination asset's base units. */
  minOutput: string;
  deadline: string;
}

export interface SubmitTransferInput extends TransferRequest {
  idempotencyKey?: string;
  nonce?: string;
}

export interface StageProgress {
  status: StageStatus;
  externalId: string | null;
  clientId: string | null;
  signedTransaction: string | null;
  requestedAmount: string | null;
  observedAmount: string | null;
  attempts: number;
  submittedAt: string | null;
  confirmedAt: string | null;
}

export interface ConversionPlan {
  planId: string;
  inputAsset: string;
  outputAsset: string;
  inputAmount: string;
  expectedOutput: string;
  priceImpact: number | null;
  router: string;
  calldata: string;
  value: string;
  expiresAt: string;
}

export interface ExternalRefs {
  withdrawalId: string | null;
  conversionTxHash: string | null;
  depositTxHash: string | null;
  depositId: string | null;
}

export interface TransferFailure {
  stage: TransferStage;
  state: OrchestratorState;
  reason: FailureReason;
  classification: ErrorClassification;
  message: string;
  externalRefs: ExternalRefs;
  fundsMovement: FundsMovement;
  requiresReconciliation: boolean;
  failedAt: string;
}

export interface TransferRecord {
  idempotencyKey: string;
  version: number;
  request: TransferRequest;
  state: OrchestratorState;
  stage: TransferStage;
  stages: Record<TransferStage, StageProgress>;
  stateAttempts: number;
  stateEnteredAt: string;
  quote: ConversionPlan | null;
  requoteCount: number;
  depositId: string | null;
  outcome: TerminalOutcome | null;
  failure: TransferFailure | null;
  createdAt: string;
  updatedAt: string;
}

export const TERMINAL_STATES: readonly OrchestratorState[] = ['SUCCEEDED', 'FAILED', 'ABORTED'];

export const CANCELLABLE_STATES: readonly OrchestratorState[] = ['INIT', 'CONVERT_QUOTE'];

export const stageOfState = (state: OrchestratorState, fallback: TransferStage): TransferStage => {
  if (state.startsWith('WITHDRAW')) {
    return 'WITHDRAW';
  }
  if (state.startsWith('CONVERT')) {
    return 'CONVERT';
  }
  if (state.startsWith('DEPOSIT')) {
    return 'DEPOSIT';
  }
  return fallback;
};

export const isTerminalState = (state: OrchestratorState): boolean =>
  TERMINAL_STATES.includes(state);

export interface TransferJobPayload {
  idempotencyKey: string;
  reason: 'admission' | 'recovery';
}

/** Hands admitted keys to whatever drives them (queue worker or runner). */
export interface TransferDispatcher {
  dispatch(payload: TransferJobPayload): Promise<void>;
}
