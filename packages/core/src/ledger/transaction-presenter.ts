import type { TransactionRecord, TransactionStatus, TransactionType } from '@payflow/database';
import type { PartySummary, TransactionWithParties } from './ledger-types.js';
import { DEFAULT_CURRENCY, toMajorUnits } from './money.js';

export interface PartyView {
  id: string;
  name: string;
  email: string;
}

export interface TransactionView {
  id: string;
  reference: string;
  type: TransactionType;
  status: TransactionStatus;
  /** Relative to the viewer; null when the viewer is not a party (admin listings) */
  direction: 'sent' | 'received' | 'deposit' | null;
  amount: number;
  fee: number;
  totalAmount: number;
  currency: string;
  note: string | null;
  senderId: string;
  receiverId: string;
  sender: PartyView | null;
  receiver: PartyView | null;
  /** The other party from the viewer's point of view */
  counterparty: PartyView | null;
  createdAt: string;
}

function presentParty(party: PartySummary | null | undefined): PartyView | null {
  if (!party) {
    return null;
  }
  return {
    id: party.id,
    name: `${party.firstName} ${party.lastName}`.trim(),
    email: party.email,
  };
}

function hasParties(
  record: TransactionRecord | TransactionWithParties
): record is TransactionWithParties {
  return 'sender' in record && 'receiver' in record;
}

export function transactionDirection(
  record: TransactionRecord,
  viewerId?: string
): TransactionView['direction'] {
  if (record.type === 'deposit') {
    return 'deposit';
  }
  if (viewerId === record.senderId) {
    return 'sent';
  }
  if (viewerId === record.receiverId) {
    return 'received';
  }
  return null;
}

export function presentTransaction(
  record: TransactionRecord | TransactionWithParties,
  viewerId?: string
): TransactionView {
  const sender = hasParties(record) ? presentParty(record.sender) : null;
  const receiver = hasParties(record) ? presentParty(record.receiver) : null;
  const direction = transactionDirection(record, viewerId);

  let counterparty: PartyView | null = null;
  if (direction === 'sent') {
    counterparty = receiver;
  } else if (direction === 'received') {
    counterparty = sender;
  }

  return {
    id: record.id,
    reference: record.reference,
    type: record.type,
    status: record.status,
    direction,
    amount: toMajorUnits(record.amountMinor),
    fee: toMajorUnits(record.feeMinor),
    totalAmount: toMajorUnits(record.totalMinor),
    currency: DEFAULT_CURRENCY,
    note: record.note,
    senderId: record.senderId,
    receiverId: record.receiverId,
    sender,
    receiver,
    counterparty,
    createdAt: record.createdAt.toISOString(),
  };
}
