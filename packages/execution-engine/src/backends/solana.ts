import { VersionedTransaction, type SignatureStatus, type TransactionConfirmationStatus } from '@solana/web3.js';
import bs58 from 'bs58';
import {
  CONFIRMATION_RANK,
  ValidationError,
  type ConfirmationLevel,
  type ConfirmationStatus,
  type SignedPayload,
} from '@sluice/types';

export interface DecodedTransaction {
  transaction: VersionedTransaction;
  /** Fee payer signature, base58; the transaction id */
  signature: string;
  recentBlockhash: string;
}

/** Deserialize every transaction in a payload */
export function decodePayload(payload: SignedPayload): DecodedTransaction[] {
  return payload.transactions.map((bytes, index) => {
    let transaction: VersionedTransaction;
    try {
      transaction = VersionedTransaction.deserialize(bytes);
    } catch {
      throw new ValidationError(`Transaction ${index} is not a serialized versioned transaction`);
    }
    const first = transaction.signatures[0];
    if (!first) {
      throw new ValidationError(`Transaction ${index} carries no signature`);
    }
    return {
      transaction,
      signature: bs58.encode(first),
      recentBlockhash: transaction.message.recentBlockhash,
    };
  });
}

/** Map a commitment string onto the confirmation lattice */
export function commitmentToLevel(status: TransactionConfirmationStatus | undefined): ConfirmationLevel {
  switch (status) {
    case 'finalized':
      return 'finalized';
    case 'confirmed':
      return 'confirmed';
    default:
      // processed, or an old node that does not report it
      return 'submitted';
  }
}

/**
 * Fold per-signature statuses of one group into a single observation.
 * The group sits at the lowest level any landed constituent has reached.
 */
export function summarizeSignatureStatuses(statuses: ReadonlyArray<SignatureStatus | null>): ConfirmationStatus {
  const landed = statuses.filter((s): s is SignatureStatus => s !== null);

  const failed = landed.find((s) => s.err !== null);
  if (failed) {
    return { state: 'failed', error: JSON.stringify(failed.err), slot: failed.slot };
  }
  if (landed.length === 0) {
    return { state: 'not_found' };
  }

  let level: ConfirmationLevel = 'finalized';
  for (const status of landed) {
    const next = commitmentToLevel(status.confirmationStatus);
    if (CONFIRMATION_RANK[next] < CONFIRMATION_RANK[level]) level = next;
  }

  return {
    state: 'progress',
    level,
    landedCount: landed.length,
    slot: Math.max(...landed.map((s) => s.slot)),
  };
}
