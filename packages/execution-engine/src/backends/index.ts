export { SolanaRpcBackend, DEFAULT_RPC_BACKEND_CONFIG, type RpcConnection, type SolanaRpcBackendConfig } from './rpc.js';
export {
  JitoBundleBackend,
  DEFAULT_JITO_BACKEND_CONFIG,
  JITO_MAINNET_ENDPOINTS,
  MAX_BUNDLE_SIZE,
  type JitoBundleBackendConfig,
} from './jito.js';
export {
  createConnection,
  getRpcDisplayUrl,
  resolveRpcUrl,
  type ConnectionConfig,
  type SolanaCluster,
} from './connection.js';
export { decodePayload, commitmentToLevel, summarizeSignatureStatuses, type DecodedTransaction } from './solana.js';
