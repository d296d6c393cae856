import axios, { type AxiosInstance } from 'axios';

import { formatProtocolTimestamp } from '../protocol/accessPayloads.js';
import type { AccessRequest } from '../types.js';
import type { RemoteAuthority, RemoteVerdict } from './onlineValidator.js';

export interface RemoteAuthorityConfig {
  url: string;
  apiKey?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const interpretDecision = (value: string | undefined): boolean | null => {
  if (!value) {
    return null;
  }

  const normalized = value.trim().toUpperCase();
  if (
    ['ACCEPTED', 'GRANTED', 'ALLOW', 'ALLOWED'].includes(normalized) ||
    normalized.includes('ACESSO LIBERADO')
  ) {
    return true;
  }

  if (
    ['REJECTED', 'DENIED', 'BLOCKED', 'FORBIDDEN'].includes(normalized) ||
    normalized.includes('ACESSO NEGADO')
  ) {
    return false;
  }

  return null;
};

/**
 * Authorities answer in a few shapes: a boolean `granted`/`accepted`, a
 * status word under `status`/`result`/`decision`, or only a message. Anything
 * undecidable is a denial.
 */
export const interpretRemoteResponse = (data: unknown): RemoteVerdict => {
  if (!isRecord(data)) {
    return { granted: false, reason: 'UNREADABLE_RESPONSE' };
  }

  const displayMessage = asString(data.displayMessage) ?? asString(data.message);
  const reason = asString(data.reason);

  const flag = typeof data.granted === 'boolean' ? data.granted : data.accepted;
  if (typeof flag === 'boolean') {
    return { granted: flag, displayMessage, reason };
  }

  const candidates = [data.status, data.result, data.decision, data.message, data.details].map(asString);
  for (const candidate of candidates) {
    const granted = interpretDecision(candidate);
    if (granted !== null) {
      return { granted, displayMessage, reason };
    }
  }

  return { granted: false, displayMessage, reason: reason ?? 'UNREADABLE_RESPONSE' };
};

export class HttpRemoteAuthority implements RemoteAuthority {
  private readonly client: AxiosInstance;

  constructor(
    private readonly config: RemoteAuthorityConfig,
    client?: AxiosInstance
  ) {
    this.client = client ?? axios.create();
    if (config.apiKey) {
      this.client.defaults.headers.common.Authorization = `Bearer ${config.apiKey}`;
    }
  }

  async authorize(request: AccessRequest, signal: AbortSignal): Promise<RemoteVerdict> {
    const response = await this.client.post<unknown>(
      this.config.url,
      {
        credential: request.credential,
        timestamp: request.timestamp.toISOString(),
        deviceTimestamp: formatProtocolTimestamp(request.timestamp),
        direction: request.direction,
        readerType: request.readerType
      },
      { signal }
    );

    return interpretRemoteResponse(response.data);
  }
}
