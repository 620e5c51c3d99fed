import {
  OrchestratorState,
  TRANSFER_STAGES,
  TransferRecord,
  isTerminalState,
  stageOfState
} from '@app-types/transfer';
import { InvariantViolationError, TerminalRecordError } from '@lib/errors';
import { diffRequests } from '@lib/idempotency';

const STATE_ORDER: readonly OrchestratorState[] = [
  'INIT',
  'WITHDRAW_SUBMIT',
  'WITHDRAW_WAIT',
  'CONVERT_QUOTE',
  'CONVERT_SUBMIT',
  'CONVERT_WAIT',
  'DEPOSIT_SUBMIT',
  'DEPOSIT_WAIT'
];

const stageIndex = (record: TransferRecord): number => TRANSFER_STAGES.indexOf(record.stage);

/**
 * Rejects any write that would break the record's durable guarantees.
 * Both store implementations call this before persisting.
 */
export const assertValidTransition = (previous: TransferRecord, next: TransferRecord): void => {
  const key = previous.idempotencyKey;
  const violate = (violation: string): never => {
    throw new InvariantViolationError(key, violation);
  };

  if (previous.outcome !== null) {
    throw new TerminalRecordError(key);
  }

  if (next.idempotencyKey !== key) {
    violate('idempotency key changed');
  }

  if (diffRequests(previous.request, next.request).length > 0) {
    violate('request is immutable');
  }

  if (stageIndex(next) < stageIndex(previous)) {
    violate(`stage regressed from ${previous.stage} to ${next.stage}`);
  }

  if (isTerminalState(next.state)) {
    if (next.outcome !== next.state) {
      violate(`terminal state ${next.state} without matching outcome`);
    }
  } else {
    if (next.outcome !== null) {
      violate('outcome set on a non-terminal state');
    }
    if (STATE_ORDER.indexOf(next.state) < STATE_ORDER.indexOf(previous.state)) {
      violate(`state regressed from ${previous.state} to ${next.state}`);
    }
    if (stageOfState(next.state, next.stage) !== next.stage) {
      violate(`state ${next.state} does not belong to stage ${next.stage}`);
    }
  }

  TRANSFER_STAGES.forEach((stage, index) => {
    const before = previous.stages[stage];
    const after = next.stages[stage];

    if (before.externalId && after.externalId !== before.externalId) {
      violate(`external id of ${stage} is immutable`);
    }

    if (before.status === 'DONE' && after.observedAmount !== before.observedAmount) {
      violate(`observed amount of settled stage ${stage} is immutable`);
    }

    if (index < stageIndex(next) && after.status !== 'DONE') {
      violate(`stage ${stage} must be settled before ${next.stage}`);
    }
  });

  const { WITHDRAW, CONVERT, DEPOSIT } = next.stages;

  if (stageIndex(next) >= 1 && CONVERT.requestedAmount !== WITHDRAW.observedAmount) {
    violate(
      `CONVERT input ${CONVERT.requestedAmount} differs from the observed withdrawal ${WITHDRAW.observedAmount}`
    );
  }

  if (
    stageIndex(next) >= 2 &&
    (CONVERT.observedAmount === null ||
      DEPOSIT.requestedAmount === null ||
      BigInt(DEPOSIT.requestedAmount) > BigInt(CONVERT.observedAmount))
  ) {
    violate(
      `DEPOSIT input ${DEPOSIT.requestedAmount} exceeds the observed conversion ${CONVERT.observedAmount}`
    );
  }
};
