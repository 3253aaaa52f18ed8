import { NetworkId } from '@/config/constants';

export interface KeyPair {
  publicKey: string;          // hex, 32-byte Ed25519 public key
  secretKey: string;          // hex, 32-byte Ed25519 seed
}

export interface DeviceIdentity {
  device_id: string;          // Unique within the platform namespace
  key_pair: KeyPair;
  account: string;            // "k:" + publicKey
  network_id: NetworkId;
  node_url: string;
}

export type GuardPredicate = 'keys-all' | 'keys-any' | 'keys-2';

export interface KeysetGuard {
  keys: string[];             // Authorised signer public keys
  pred: GuardPredicate;
}

// Device metadata as held by the platform registry; refreshed wholesale
export interface DeviceInfo {
  device_id: string;
  name?: string;
  status?: string;
  guard: KeysetGuard;
  [key: string]: unknown;
}

// On-disk device configuration written by `setup`
export interface DeviceConfigFile {
  device_id: string;
  device_name?: string;
  description?: string;
  network_id: NetworkId;
  node_url: string;
  public_key: string;
  secret_key: string;
}
