/**
 * Reservation lifecycle for a single (documentId, slot) key.
 *
 * States:
 * - unreserved: No record exists for the key
 * - reserved: A record exists, waiting for its recipient to claim it
 * - claimed: The record is owned (terminal)
 * - cancelled: The issuer withdrew the reservation (terminal; the record is deleted)
 */

import {
  AlreadyClaimedError,
  AlreadyReservedError,
  TokenNotFoundError,
} from "../errors/catalog.js";
import type { TokenRecord } from "../ledger/types.js";

export type ReservationState = "unreserved" | "reserved" | "claimed" | "cancelled";

export type ReservationAction = "reserve" | "claim" | "cancel";

/** Valid transitions. Each state maps an action to the state it leads to. */
const VALID_TRANSITIONS: Record<
  ReservationState,
  Partial<Record<ReservationAction, ReservationState>>
> = {
  unreserved: { reserve: "reserved" },
  reserved: { claim: "claimed", cancel: "cancelled" },
  claimed: {},
  cancelled: {},
};

export function reservationState(record: TokenRecord | undefined): ReservationState {
  if (!record) return "unreserved";
  return record.claimed ? "claimed" : "reserved";
}

export function canTransition(from: ReservationState, action: ReservationAction): boolean {
  return VALID_TRANSITIONS[from][action] !== undefined;
}

/**
 * Resolve the state an action leads to.
 * Throws the error that describes why the action is not allowed from `from`.
 */
export function transition(
  from: ReservationState,
  action: ReservationAction,
  details?: Record<string, unknown>,
): ReservationState {
  const to = VALID_TRANSITIONS[from][action];
  if (to !== undefined) return to;

  switch (from) {
    case "claimed":
      throw new AlreadyClaimedError(details);
    case "reserved":
      throw new AlreadyReservedError(details);
    case "unreserved":
    case "cancelled":
      throw new TokenNotFoundError(details);
  }
}
