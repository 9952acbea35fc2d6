export {
  Capability,
  ALL_CAPABILITIES,
  type CapabilityName,
  isAdmin,
  hasCapability,
  addCapability,
  removeCapability,
  capabilityNames,
  parseCapabilities,
} from "./bitmask.js";
