import type { VariantHooks } from "./types.js";

/** Plain single-token records with no behaviour beyond the shared lifecycle. */
export const standardHooks: VariantHooks = {
  kind: "standard",
  multiSlot: false,
};
