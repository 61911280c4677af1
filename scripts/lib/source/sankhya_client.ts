import axios, { type AxiosInstance } from 'axios';

import type { SankhyaConfig } from '../config.js';
import { SourceQueryError } from '../errors.js';
import type { SourceRecord } from '../hierarchy/types.js';

const QUERY_SERVICE = 'DbExplorerSP.executeQuery';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** Zips `fieldsMetadata` column names with each row of a query response body. */
export function rowsToRecords(body: unknown): SourceRecord[] {
  if (!isRecord(body)) {
    return [];
  }

  const metadata = Array.isArray(body.fieldsMetadata) ? body.fieldsMetadata : [];
  const columns = metadata.map((field: unknown) =>
    isRecord(field) && typeof field.name === 'string' ? field.name : ''
  );
  const rows = Array.isArray(body.rows) ? body.rows : [];

  return rows.filter(Array.isArray).map((row: unknown[]) => {
    const record: SourceRecord = {};
    columns.forEach((column, index) => {
      if (column) {
        record[column] = row[index];
      }
    });
    return record;
  });
}

/**
 * Source ERP gateway client: OAuth client-credentials login, then SQL through
 * the query service.
 */
export class SankhyaClient {
  private readonly http: AxiosInstance;
  private accessToken: string | null = null;

  constructor(
    private readonly config: SankhyaConfig,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs
      });
  }

  async authenticate(): Promise<string> {
    if (this.accessToken) {
      return this.accessToken;
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret
    });

    let data: unknown;
    try {
      const response = await this.http.post<unknown>('/authenticate', form.toString(), {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'X-Token': this.config.token
        }
      });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new SourceQueryError(`authentication against ${this.config.baseUrl} failed: ${error.message}`);
      }
      throw error;
    }

    if (!isRecord(data) || typeof data.access_token !== 'string' || !data.access_token) {
      throw new SourceQueryError('authentication response carried no access token');
    }
    this.accessToken = data.access_token;
    return data.access_token;
  }

  async executeQuery(sql: string): Promise<SourceRecord[]> {
    const token = await this.authenticate();

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        '/gateway/v1/mge/service.sbr',
        { serviceName: QUERY_SERVICE, requestBody: { sql } },
        {
          params: { serviceName: QUERY_SERVICE, outputType: 'json' },
          headers: { Authorization: `Bearer ${token}` }
        }
      );
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new SourceQueryError(`${QUERY_SERVICE} request failed: ${error.message}`);
      }
      throw error;
    }

    if (!isRecord(data)) {
      throw new SourceQueryError(`${QUERY_SERVICE} returned a malformed response`);
    }
    if (String(data.status) !== '1') {
      const message = typeof data.statusMessage === 'string' ? data.statusMessage : 'unknown error';
      throw new SourceQueryError(`${QUERY_SERVICE} failed: ${message}`);
    }

    return rowsToRecords(data.responseBody);
  }
}
