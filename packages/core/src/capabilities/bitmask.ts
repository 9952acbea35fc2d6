/**
 * Capability bitmask algebra. The bit table is stable across every resolver
 * variant; ADMIN implies all other bits.
 */

export const Capability = {
  CLAIM: 0x01,
  TRANSFER: 0x02,
  REQUEST_PAYMENT: 0x04,
  APPROVE_PAYMENT: 0x08,
  UPDATE_METADATA: 0x10,
  DELEGATE_RIGHTS: 0x20,
  REVOKE_ACCESS: 0x40,
  ADMIN: 0x80,
} as const;

export type CapabilityName = keyof typeof Capability;

export const ALL_CAPABILITIES = 0xff;

const NAMES = Object.keys(Capability).filter((key): key is CapabilityName => key in Capability);

export function isAdmin(bits: number): boolean {
  return (bits & Capability.ADMIN) !== 0;
}

/** True when `granted` covers every bit of `required` (or carries ADMIN). */
export function hasCapability(granted: number, required: number): boolean {
  if (isAdmin(granted)) return true;
  return (granted & required) === required;
}

export function addCapability(bits: number, capability: number): number {
  return (bits | capability) & ALL_CAPABILITIES;
}

export function removeCapability(bits: number, capability: number): number {
  return bits & ~capability & ALL_CAPABILITIES;
}

/** Names of the bits set in `bits`, in table order. */
export function capabilityNames(bits: number): CapabilityName[] {
  return NAMES.filter((name) => (bits & Capability[name]) !== 0);
}

function isCapabilityName(name: string): name is CapabilityName {
  return Object.hasOwn(Capability, name);
}

/**
 * Fold a list of capability names (case-insensitive) into a bitmask.
 * Throws on an unknown name.
 */
export function parseCapabilities(names: readonly string[]): number {
  let bits = 0;
  for (const raw of names) {
    const name = raw.trim().toUpperCase();
    if (!isCapabilityName(name)) {
      throw new Error(`Unknown capability: ${raw}`);
    }
    bits = addCapability(bits, Capability[name]);
  }
  return bits;
}
