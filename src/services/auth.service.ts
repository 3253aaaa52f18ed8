import { DeviceInfo, KeysetGuard } from '@/types/device.types';
import { CommandEnvelope, SignedExecCommand } from '@/types/envelope.types';
import { verifySignature } from '@/utils/crypto.utils';

/**
 * The envelope's expiry (unix seconds) must lie strictly after `now` (ms).
 */
export const validateExpiry = (envelope: CommandEnvelope, now: number = Date.now()): boolean => {
  const expiry = envelope.expiry_time;
  if (typeof expiry !== 'number' || !Number.isFinite(expiry)) {
    return false;
  }
  return expiry * 1000 > now;
};

const satisfiesGuard = (guard: KeysetGuard, signers: Set<string>): boolean => {
  const matched = guard.keys.filter((key) => signers.has(key.toLowerCase())).length;

  switch (guard.pred) {
    case 'keys-all':
      return matched === guard.keys.length;
    case 'keys-any':
      return matched >= 1;
    case 'keys-2':
      return matched >= 2;
    default:
      return false;
  }
};

/**
 * Every attached signature must verify over the exact `device_exec` string,
 * and the verified signers must satisfy the device's keyset guard.
 */
export const checkAuth = (signed: SignedExecCommand, deviceInfo: DeviceInfo | null): boolean => {
  if (!deviceInfo || deviceInfo.guard.keys.length === 0 || signed.sigs.length === 0) {
    return false;
  }

  const signers = new Set<string>();
  for (const { pubKey, sig } of signed.sigs) {
    if (!verifySignature(signed.device_exec, sig, pubKey)) {
      return false;
    }
    signers.add(pubKey.toLowerCase());
  }

  return satisfiesGuard(deviceInfo.guard, signers);
};

export const validateCommand = (
  signed: SignedExecCommand,
  envelope: CommandEnvelope,
  deviceInfo: DeviceInfo | null,
  now: number = Date.now()
): boolean => validateExpiry(envelope, now) && checkAuth(signed, deviceInfo);
