export {
  createTestWallet,
  buildWeb3SignedHeader,
  type TestWallet,
} from "./wallet.js";
export {
  TEST_SCHEMA_ID,
  testBytes32,
  createInMemoryAttestationGateway,
  buildAttestation,
  type InMemoryAttestationGateway,
  type BuildAttestationParams,
} from "./attestations.js";
export {
  TEST_NOW,
  createTestClock,
  createTestLedger,
  createTestWallets,
  testDocumentId,
  type CreateTestLedgerOptions,
  type TestClock,
  type TestLedger,
  type TestWallets,
} from "./ledger.js";
