export {
  parseWeb3SignedHeader,
  verifyWeb3Signed,
  type VerifiedAuth,
  type Web3SignedPayload,
} from "./web3-signed.js";
