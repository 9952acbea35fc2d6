import type { Address, Hex } from "viem";

export type Role = "governor" | "executor" | "reserver" | "administrator";

export const ROLES: readonly Role[] = [
  "governor",
  "executor",
  "reserver",
  "administrator",
];

/** A reservation or claimed token record. Token ids are arena indices from 0. */
export interface TokenRecord {
  tokenId: number;
  documentId: Hex;
  slot: bigint;
  value: bigint;
  owner: Address | null;
  /** Targeted recipient while unclaimed; null for anonymous or once claimed. */
  reservedFor: Address | null;
  claimed: boolean;
  label: Hex | null;
  approved: Address | null;
  createdAt: number;
  claimedAt: number | null;
  labelUpdatedAt: number | null;
}

export interface SlotTotals {
  slot: bigint;
  totalReserved: bigint;
  totalMinted: bigint;
}

export interface SlotSummary extends SlotTotals {
  /** Owners with a positive balance in the slot, in the order they joined. */
  holders: Address[];
}

export interface UpgradeAuthorization {
  id: number;
  implementation: Address;
  authorizedBy: Address;
  authorizedAt: number;
}

export const LEDGER_EVENT_NAMES = [
  "IssuerRegistered",
  "Reserved",
  "Claimed",
  "Cancelled",
  "Transfer",
  "Approval",
  "ApprovalForAll",
  "CapabilityVerified",
  "LabelUpdated",
  "TransferValue",
  "ValueApproval",
  "SlotApproval",
  "Locked",
  "Revoked",
  "UpdateUser",
  "Paused",
  "Unpaused",
  "SchemaUpdated",
  "UpgradeAuthorized",
] as const;

export type LedgerEventName = (typeof LEDGER_EVENT_NAMES)[number];

export type EventData = Record<string, string | number | boolean | null>;

export interface LedgerEvent {
  id: number;
  name: LedgerEventName;
  tokenId: number | null;
  documentId: Hex | null;
  data: EventData;
  at: number;
}

export interface NewLedgerEvent {
  name: LedgerEventName;
  tokenId?: number;
  documentId?: Hex;
  data?: EventData;
}

export function isLedgerEventName(value: string): value is LedgerEventName {
  return (LEDGER_EVENT_NAMES as readonly string[]).includes(value);
}
