import {
  ErrorClassification,
  ExternalRefs,
  FailureReason,
  FundsMovement,
  OrchestratorState,
  StageProgress,
  TRANSFER_STAGES,
  TerminalOutcome,
  TransferFailure,
  TransferRecord,
  TransferRequest,
  TransferStage,
  stageOfState
} from '@app-types/transfer';

const emptyStage = (): StageProgress => ({
  status: 'PENDING',
  externalId: null,
  clientId: null,
  signedTransaction: null,
  requestedAmount: null,
  observedAmount: null,
  attempts: 0,
  submittedAt: null,
  confirmedAt: null
});

export const newTransferRecord = (
  idempotencyKey: string,
  request: TransferRequest,
  now: Date
): TransferRecord => {
  const timestamp = now.toISOString();
  return {
    idempotencyKey,
    version: 0,
    request: { ...request },
    state: 'INIT',
    stage: 'WITHDRAW',
    stages: {
      WITHDRAW: { ...emptyStage(), requestedAmount: request.amount },
      CONVERT: emptyStage(),
      DEPOSIT: emptyStage()
    },
    stateAttempts: 0,
    stateEnteredAt: timestamp,
    quote: null,
    requoteCount: 0,
    depositId: null,
    outcome: null,
    failure: null,
    createdAt: timestamp,
    updatedAt: timestamp
  };
};

export const withStage = (
  record: TransferRecord,
  stage: TransferStage,
  patch: Partial<StageProgress>
): TransferRecord => ({
  ...record,
  stages: {
    ...record.stages,
    [stage]: { ...record.stages[stage], ...patch }
  }
});

/** Moves to a non-terminal state, resetting the per-state attempt counter. */
export const enterState = (
  record: TransferRecord,
  state: OrchestratorState,
  now: Date
): TransferRecord => ({
  ...record,
  state,
  stage: stageOfState(state, record.stage),
  stateAttempts: 0,
  stateEnteredAt: now.toISOString()
});

export const externalRefsOf = (record: TransferRecord): ExternalRefs => ({
  withdrawalId: record.stages.WITHDRAW.externalId,
  conversionTxHash: record.stages.CONVERT.externalId,
  depositTxHash: record.stages.DEPOSIT.externalId,
  depositId: record.depositId
});

export const fundsMovementOf = (record: TransferRecord): FundsMovement => {
  const active = record.stages[record.stage];
  if (active.externalId && active.status !== 'DONE') {
    return 'UNCONFIRMED';
  }

  return TRANSFER_STAGES.some((stage) => record.stages[stage].status === 'DONE')
    ? 'CONFIRMED'
    : 'NONE';
};

export interface TerminationInput {
  outcome: Exclude<TerminalOutcome, 'SUCCEEDED'>;
  reason: FailureReason;
  classification: ErrorClassification;
  message: string;
}

/**
 * Builds the terminal FAILED/ABORTED record. A failed stage keeps its
 * external id and amounts so the operator can look the operation up
 * directly at the exchange or on the chain.
 */
export const terminate = (
  record: TransferRecord,
  input: TerminationInput,
  now: Date
): TransferRecord => {
  const fundsMovement = fundsMovementOf(record);
  const failure: TransferFailure = {
    stage: record.stage,
    state: record.state,
    reason: input.reason,
    classification: input.classification,
    message: input.message,
    externalRefs: externalRefsOf(record),
    fundsMovement,
    requiresReconciliation: fundsMovement !== 'NONE',
    failedAt: now.toISOString()
  };

  const base =
    input.outcome === 'FAILED'
      ? withStage(record, record.stage, { status: 'FAILED' })
      : record;

  return {
    ...base,
    state: input.outcome,
    outcome: input.outcome,
    failure
  };
};

export const succeed = (record: TransferRecord): TransferRecord => ({
  ...record,
  state: 'SUCCEEDED',
  outcome: 'SUCCEEDED'
});
