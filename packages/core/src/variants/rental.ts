/**
 * Time-bound delegated role ("user") on a claimed record. The role lapses
 * on its own once `expires` passes and is cleared on every transfer.
 *
 * Owners can also delegate off-line: they sign an EIP-712 SetUser message
 * bound to the record's current nonce, and anyone may submit it.
 */

import {
  getAddress,
  verifyTypedData,
  zeroAddress,
  type Address,
  type Hex,
  type TypedDataDomain,
} from "viem";

import {
  InvalidDelegationSignatureError,
  InvalidValueError,
  NotAuthorizedError,
} from "../errors/catalog.js";
import { requireClaimed, type ClaimEngine } from "../ledger/engine.js";
import { intColumn, textColumn, type LedgerDatabase } from "../ledger/sqlite.js";
import type { LedgerTx } from "../ledger/transactions.js";
import { normalizeAddress } from "../schemas/primitives.js";

import type { VariantHooks } from "./types.js";

export const SET_USER_TYPES = {
  SetUser: [
    { name: "tokenId", type: "uint256" },
    { name: "user", type: "address" },
    { name: "expires", type: "uint64" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint64" },
  ],
} as const;

export function rentalDomain(resolverId: string, chainId: number): TypedDataDomain {
  return {
    name: `docclaims/${resolverId}`,
    version: "1",
    chainId,
    verifyingContract: zeroAddress,
  };
}

export interface Delegation {
  user: Address;
  expires: number;
}

export interface RentalRegistry {
  readonly hooks: VariantHooks;
  /** Stored delegation, whether or not it has lapsed. */
  delegation(tokenId: number): Delegation | null;
  nonce(tokenId: number): number;
  setDelegation(tx: LedgerTx, tokenId: number, user: Address | null, expires: number): void;
  bumpNonce(tokenId: number): void;
}

export function createRentalRegistry(db: LedgerDatabase): RentalRegistry {
  function readDelegation(tokenId: number): Delegation | null {
    const row = db.get("SELECT user, expires FROM delegations WHERE token_id = ?", [tokenId]);
    if (!row) return null;
    return { user: getAddress(textColumn(row, "user")), expires: intColumn(row, "expires") };
  }

  const registry: RentalRegistry = {
    hooks: {
      kind: "rental",
      multiSlot: false,
      onTransfer(tx, record) {
        if (readDelegation(record.tokenId) === null) return;
        registry.setDelegation(tx, record.tokenId, null, 0);
      },
    },

    delegation: readDelegation,

    nonce(tokenId) {
      const row = db.get("SELECT nonce FROM delegation_nonces WHERE token_id = ?", [tokenId]);
      return row ? intColumn(row, "nonce") : 0;
    },

    setDelegation(tx, tokenId, user, expires) {
      if (user === null) {
        db.run("DELETE FROM delegations WHERE token_id = ?", [tokenId]);
      } else {
        db.run(
          `INSERT INTO delegations (token_id, user, expires) VALUES (?, ?, ?)
           ON CONFLICT (token_id) DO UPDATE SET user = excluded.user, expires = excluded.expires`,
          [tokenId, user, expires],
        );
      }

      const record = tx.store.getRecord(tokenId);
      tx.emit({
        name: "UpdateUser",
        tokenId,
        documentId: record?.documentId,
        data: { user, expires },
      });
    },

    bumpNonce(tokenId) {
      db.run(
        `INSERT INTO delegation_nonces (token_id, nonce) VALUES (?, ?)
         ON CONFLICT (token_id) DO UPDATE SET nonce = excluded.nonce`,
        [tokenId, registry.nonce(tokenId) + 1],
      );
    },
  };

  return registry;
}

export interface SignedDelegation {
  tokenId: number;
  user: Address;
  expires: number;
  nonce: number;
  deadline: number;
  signature: Hex;
}

export class RentalLedger {
  constructor(
    private readonly engine: ClaimEngine,
    readonly registry: RentalRegistry,
    readonly domain: TypedDataDomain,
  ) {}

  /** Owner or an approved party assigns the user role until `expires`. */
  async setUser(
    rawCaller: Address,
    params: { tokenId: number; user: Address | null; expires: number },
  ): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    const user = params.user === null ? null : normalizeAddress(params.user, "user");
    assertExpires(params.expires);

    return this.engine.execute("setUser", (tx) => {
      const record = requireClaimed(tx.store, params.tokenId);
      if (!this.engine.isAuthorizedForToken(tx.store, record, caller)) {
        throw new NotAuthorizedError({ tokenId: params.tokenId, caller });
      }
      this.registry.setDelegation(tx, params.tokenId, user, user === null ? 0 : params.expires);
    });
  }

  /** Apply an owner-signed SetUser message. Consumes the record's nonce. */
  async setUserWithSignature(params: SignedDelegation): Promise<void> {
    const user = normalizeAddress(params.user, "user");
    assertExpires(params.expires);
    const { tokenId } = params;

    return this.engine.executePrepared(
      "setUserWithSignature",
      async (store) => {
        const record = requireClaimed(store, tokenId);

        if (params.deadline < this.engine.now()) {
          throw new InvalidDelegationSignatureError({ tokenId, reason: "deadline passed" });
        }
        const current = this.registry.nonce(tokenId);
        if (params.nonce !== current) {
          throw new InvalidDelegationSignatureError({
            tokenId,
            reason: "stale nonce",
            expected: current,
          });
        }

        let valid: boolean;
        try {
          valid = await verifyTypedData({
            address: record.owner,
            domain: this.domain,
            types: SET_USER_TYPES,
            primaryType: "SetUser",
            message: {
              tokenId: BigInt(tokenId),
              user,
              expires: BigInt(params.expires),
              nonce: BigInt(params.nonce),
              deadline: BigInt(params.deadline),
            },
            signature: params.signature,
          });
        } catch {
          throw new InvalidDelegationSignatureError({ tokenId, reason: "malformed signature" });
        }
        if (!valid) {
          throw new InvalidDelegationSignatureError({ tokenId, reason: "signer is not the owner" });
        }
      },
      (tx) => {
        // The queue keeps owner and nonce unchanged between the check and here.
        this.registry.bumpNonce(tokenId);
        this.registry.setDelegation(tx, tokenId, user, params.expires);
      },
    );
  }

  /** Current user, or null once the delegation has lapsed. No writes. */
  userOf(tokenId: number): Address | null {
    requireClaimed(this.engine.store, tokenId);
    const delegation = this.registry.delegation(tokenId);
    if (!delegation || this.engine.now() > delegation.expires) return null;
    return delegation.user;
  }

  userExpires(tokenId: number): number {
    requireClaimed(this.engine.store, tokenId);
    return this.registry.delegation(tokenId)?.expires ?? 0;
  }

  nonceOf(tokenId: number): number {
    return this.registry.nonce(tokenId);
  }
}

function assertExpires(expires: number): void {
  if (!Number.isSafeInteger(expires) || expires < 0) {
    throw new InvalidValueError({ field: "expires", reason: "must be unix seconds" });
  }
}
