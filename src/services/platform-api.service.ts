import axios from 'axios';
import { z } from 'zod';
import { DeviceInfo } from '@/types/device.types';
import { Rule } from '@/types/rule.types';
import { NetworkId, PLATFORM_API_CONFIG } from '@/config/constants';
import { PlatformRequestError, getErrorMessage } from '@/utils/errors.utils';
import { logger } from '@/utils/logger';

const deviceInfoSchema = z
  .object({
    device_id: z.string(),
    name: z.string().optional(),
    status: z.string().optional(),
    guard: z.object({
      keys: z.array(z.string()),
      pred: z.enum(['keys-all', 'keys-any', 'keys-2']),
    }),
  })
  .passthrough();

const ruleSchema = z.object({
  rule: z.unknown(),
  action: z.object({
    topic: z.string(),
    message: z.record(z.unknown()),
  }),
});

const rulesSchema = z.array(ruleSchema);

export interface PlatformApi {
  getDeviceInfo(deviceId: string, networkId: NetworkId): Promise<DeviceInfo>;
  getRules(deviceId: string, networkId: NetworkId): Promise<Rule[]>;
}

// The slice of an axios instance the client uses
export interface HttpGetter {
  get(url: string, config?: { params?: Record<string, unknown> }): Promise<{ data: unknown }>;
}

export const platformApiUrl = (nodeUrl: string): string =>
  PLATFORM_API_CONFIG.BASE_URL || `${nodeUrl.replace(/\/+$/, '')}/api`;

/**
 * Device and rule registry client for the platform's REST API
 */
export class HttpPlatformApi implements PlatformApi {
  private readonly http: HttpGetter;

  constructor(baseUrl: string, http?: HttpGetter) {
    this.http = http ?? axios.create({ baseURL: baseUrl, timeout: PLATFORM_API_CONFIG.TIMEOUT_MS });
  }

  async getDeviceInfo(deviceId: string, networkId: NetworkId): Promise<DeviceInfo> {
    const data = await this.fetch(`/devices/${encodeURIComponent(deviceId)}`, networkId);
    const parsed = deviceInfoSchema.safeParse(data);
    if (!parsed.success) {
      throw new PlatformRequestError(`Invalid device info for ${deviceId}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data;
  }

  async getRules(deviceId: string, networkId: NetworkId): Promise<Rule[]> {
    const data = await this.fetch(`/devices/${encodeURIComponent(deviceId)}/rules`, networkId);
    const parsed = rulesSchema.safeParse(data);
    if (!parsed.success) {
      throw new PlatformRequestError(`Invalid rules for ${deviceId}: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data.map(({ rule, action }) => ({ rule, action }));
  }

  private async fetch(url: string, networkId: NetworkId): Promise<unknown> {
    try {
      const response = await this.http.get(url, { params: { network_id: networkId } });
      return response.data;
    } catch (error) {
      const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.error(`Platform request ${url} failed: ${getErrorMessage(error)}`);
      throw new PlatformRequestError(`Platform request ${url} failed: ${getErrorMessage(error)}`, statusCode);
    }
  }
}
