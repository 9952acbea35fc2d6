export {
  assertCapability,
  checkCapability,
  evaluateCapability,
  fetchAttestation,
  type CapabilityCheck,
  type CapabilityGrant,
  type CapabilityRequest,
} from "./verify.js";
