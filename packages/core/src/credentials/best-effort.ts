import type { Logger } from "pino";

import type { CommittedClaim } from "../ledger/engine.js";

import type { CredentialClient } from "./client.js";

/**
 * Request a trust credential for a committed claim. Never throws: the
 * outcome is logged and the claim stands either way.
 */
export async function issueCredentialBestEffort(
  client: CredentialClient,
  claim: CommittedClaim,
  logger: Logger,
): Promise<void> {
  const { record, grant } = claim;
  if (record.owner === null) return;

  const result = await client.issue({
    recipient: record.owner,
    documentId: record.documentId,
    tokenId: record.tokenId,
    verifiedIdentity: grant.payload.verifiedIdentity,
    contractRole: grant.payload.contractRole,
  });

  if (result.ok) {
    logger.info(
      { tokenId: record.tokenId, credentialId: result.value.credentialId },
      "Trust credential issued",
    );
    return;
  }
  logger.warn({ err: result.error, tokenId: record.tokenId }, "Trust credential not issued");
}
