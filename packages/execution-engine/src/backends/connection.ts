import { Connection, type Commitment } from '@solana/web3.js';

export type SolanaCluster = 'mainnet-beta' | 'devnet' | 'localnet';

/** Public RPC endpoints by cluster */
const PUBLIC_ENDPOINTS: Record<SolanaCluster, string> = {
  'mainnet-beta': 'https://api.mainnet-beta.solana.com',
  devnet: 'https://api.devnet.solana.com',
  localnet: 'http://127.0.0.1:8899',
};

export interface ConnectionConfig {
  cluster: SolanaCluster;
  heliusApiKey?: string;
  customRpcUrl?: string;
  commitment?: Commitment;
}

/**
 * Resolve the RPC URL for a config.
 *
 * Priority order:
 * 1. Custom RPC URL (if provided)
 * 2. Helius (if API key is provided)
 * 3. Public RPC (always available)
 */
export function resolveRpcUrl(config: ConnectionConfig): string {
  if (config.customRpcUrl) {
    return config.customRpcUrl;
  }
  if (config.heliusApiKey && config.cluster !== 'localnet') {
    const subdomain = config.cluster === 'devnet' ? 'devnet' : 'mainnet';
    return `https://${subdomain}.helius-rpc.com/?api-key=${config.heliusApiKey}`;
  }
  return PUBLIC_ENDPOINTS[config.cluster];
}

export function createConnection(config: ConnectionConfig): Connection {
  return new Connection(resolveRpcUrl(config), {
    commitment: config.commitment ?? 'confirmed',
    // Confirmation is polled by the executor, not by web3.js
    disableRetryOnRateLimit: true,
  });
}

/** RPC URL safe to log: the API key is masked */
export function getRpcDisplayUrl(config: ConnectionConfig): string {
  return resolveRpcUrl(config).replace(/api-key=[^&]+/, 'api-key=***');
}
