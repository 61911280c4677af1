import axios, { type AxiosInstance } from 'axios';

import type { OdooConfig } from '../config.js';
import { describeError, TargetConnectionError, TargetRpcError } from '../errors.js';
import type {
  Domain,
  FieldCatalog,
  FieldInfo,
  FieldValues,
  TargetRecord,
  TargetStore
} from './store.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function rpcErrorMessage(error: Record<string, unknown>): string {
  const data = error.data;
  if (isRecord(data) && typeof data.message === 'string' && data.message) {
    return data.message;
  }
  return typeof error.message === 'string' ? error.message : 'unknown RPC error';
}

function toTargetRecord(value: unknown): TargetRecord | null {
  if (!isRecord(value) || typeof value.id !== 'number') {
    return null;
  }
  return { ...value, id: value.id };
}

function toFieldInfo(value: unknown): FieldInfo {
  if (!isRecord(value)) {
    return {};
  }
  const info: FieldInfo = {};
  if (typeof value.type === 'string') {
    info.type = value.type;
  }
  if (typeof value.string === 'string') {
    info.string = value.string;
  }
  return info;
}

/**
 * Target store over the server's JSON-RPC endpoint. Logs in on the first
 * call and reuses the uid for the rest of the run.
 */
export class OdooClient implements TargetStore {
  private readonly http: AxiosInstance;
  private uid: number | null = null;
  private requestId = 0;

  constructor(
    private readonly config: OdooConfig,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: config.url,
        timeout: config.timeoutMs,
        headers: { 'Content-Type': 'application/json' }
      });
  }

  private async call(service: string, method: string, args: unknown[]): Promise<unknown> {
    this.requestId += 1;
    const operation = `${service}.${method}`;

    let payload: unknown;
    try {
      const response = await this.http.post<unknown>('/jsonrpc', {
        jsonrpc: '2.0',
        method: 'call',
        params: { service, method, args },
        id: this.requestId
      });
      payload = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TargetConnectionError(`${operation} request to ${this.config.url} failed: ${error.message}`);
      }
      throw error;
    }

    if (!isRecord(payload)) {
      throw new TargetRpcError(operation, 'malformed JSON-RPC response');
    }
    if (isRecord(payload.error)) {
      throw new TargetRpcError(operation, rpcErrorMessage(payload.error));
    }
    return payload.result;
  }

  async login(): Promise<number> {
    if (this.uid !== null) {
      return this.uid;
    }

    const uid = await this.call('common', 'login', [
      this.config.db,
      this.config.username,
      this.config.password
    ]);
    if (typeof uid !== 'number' || uid <= 0) {
      throw new TargetConnectionError(
        `login to ${this.config.url} as ${this.config.username} was rejected`
      );
    }
    this.uid = uid;
    return uid;
  }

  async executeKw(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown> = {}
  ): Promise<unknown> {
    const uid = await this.login();
    try {
      return await this.call('object', 'execute_kw', [
        this.config.db,
        uid,
        this.config.password,
        model,
        method,
        args,
        kwargs
      ]);
    } catch (error) {
      if (error instanceof TargetRpcError) {
        throw new TargetRpcError(`${model}.${method}`, error.remoteMessage);
      }
      if (error instanceof TargetConnectionError) {
        throw error;
      }
      throw new TargetConnectionError(`${model}.${method} failed: ${describeError(error)}`);
    }
  }

  async search(
    model: string,
    domain: Domain,
    fields: string[],
    limit: number
  ): Promise<TargetRecord[]> {
    const result = await this.executeKw(model, 'search_read', [domain], { fields, limit });
    if (!Array.isArray(result)) {
      throw new TargetRpcError(`${model}.search_read`, 'expected a list of records');
    }

    const records: TargetRecord[] = [];
    for (const entry of result) {
      const record = toTargetRecord(entry);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async create(model: string, values: FieldValues): Promise<number> {
    const result = await this.executeKw(model, 'create', [values]);
    if (typeof result === 'number') {
      return result;
    }
    if (Array.isArray(result) && typeof result[0] === 'number') {
      return result[0];
    }
    throw new TargetRpcError(`${model}.create`, 'expected the new record id');
  }

  async update(model: string, id: number, values: FieldValues): Promise<boolean> {
    const result = await this.executeKw(model, 'write', [[id], values]);
    return result === true;
  }

  async fieldsGet(model: string): Promise<FieldCatalog> {
    const result = await this.executeKw(model, 'fields_get', [], { attributes: ['type', 'string'] });
    const catalog: FieldCatalog = {};
    if (!isRecord(result)) {
      return catalog;
    }
    for (const [name, info] of Object.entries(result)) {
      catalog[name] = toFieldInfo(info);
    }
    return catalog;
  }
}
