export type { Attestation, AttestationPayload } from "./types.js";
export {
  ATTESTATION_PAYLOAD_PARAMETERS,
  encodeAttestationPayload,
  decodeAttestationPayload,
} from "./payload.js";
export {
  DEFAULT_GATEWAY_TIMEOUT_MS,
  createAttestationGatewayClient,
  GatewayAttestationSchema,
  isTimeoutError,
  type AttestationGateway,
  type AttestationGatewayClientOptions,
  type GatewayProof,
} from "./gateway.js";
