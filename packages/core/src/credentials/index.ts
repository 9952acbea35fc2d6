export { ok, err, type Result } from "./result.js";
export {
  DEFAULT_CREDENTIAL_TIMEOUT_MS,
  createCredentialClient,
  type CredentialClient,
  type CredentialReceipt,
  type CredentialRequest,
} from "./client.js";
export { issueCredentialBestEffort } from "./best-effort.js";
