import assert from 'node:assert/strict';
import test from 'node:test';

import type { SankhyaConfig } from '../lib/config.js';
import { SourceQueryError } from '../lib/errors.js';
import { rowsToRecords, SankhyaClient } from '../lib/source/sankhya_client.js';
import { createFakeHttp } from './fake_http.js';

const config: SankhyaConfig = {
  baseUrl: 'https://gateway.example.test',
  token: 'test-token',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  timeoutMs: 1000
};

const queryBody = {
  fieldsMetadata: [{ name: 'CODLOCAL' }, { name: 'CODLOCALPAI' }, { name: 'DESCRLOCAL' }],
  rows: [
    [101, 0, 'Main'],
    [102, 101, 'Shelf']
  ]
};

test('rowsToRecords zips column names with row values', () => {
  assert.deepEqual(rowsToRecords(queryBody), [
    { CODLOCAL: 101, CODLOCALPAI: 0, DESCRLOCAL: 'Main' },
    { CODLOCAL: 102, CODLOCALPAI: 101, DESCRLOCAL: 'Shelf' }
  ]);
  assert.deepEqual(rowsToRecords(undefined), []);
  assert.deepEqual(rowsToRecords({ fieldsMetadata: [{ name: 'A' }], rows: ['skip', [1]] }), [{ A: 1 }]);
});

test('authenticates once and runs queries with the bearer token', async () => {
  const { http, requests } = createFakeHttp((request) =>
    request.url === '/authenticate'
      ? { access_token: 'test-access', expires_in: 300 }
      : { status: '1', responseBody: queryBody }
  );
  const client = new SankhyaClient(config, http);

  const first = await client.executeQuery('SELECT CODLOCAL, CODLOCALPAI, DESCRLOCAL FROM TGFLOC');
  await client.executeQuery('SELECT 1');

  assert.equal(first.length, 2);
  assert.deepEqual(
    requests.map((request) => request.url),
    ['/authenticate', '/gateway/v1/mge/service.sbr', '/gateway/v1/mge/service.sbr']
  );

  const [login, query] = requests;
  assert.equal(login.body, 'grant_type=client_credentials&client_id=test-client&client_secret=test-secret');
  assert.equal(login.config.headers['X-Token'], 'test-token');
  assert.equal(query.config.headers.Authorization, 'Bearer test-access');
  assert.deepEqual(query.config.params, { serviceName: 'DbExplorerSP.executeQuery', outputType: 'json' });
  assert.deepEqual(query.body, {
    serviceName: 'DbExplorerSP.executeQuery',
    requestBody: { sql: 'SELECT CODLOCAL, CODLOCALPAI, DESCRLOCAL FROM TGFLOC' }
  });
});

test('a failed query status is a SourceQueryError', async () => {
  const { http } = createFakeHttp((request) =>
    request.url === '/authenticate'
      ? { access_token: 'test-access' }
      : { status: '0', statusMessage: 'ORA-00942: table or view does not exist' }
  );

  await assert.rejects(
    new SankhyaClient(config, http).executeQuery('SELECT * FROM MISSING'),
    (error: unknown) =>
      error instanceof SourceQueryError &&
      error.message === 'DbExplorerSP.executeQuery failed: ORA-00942: table or view does not exist'
  );
});

test('a login without an access token is refused', async () => {
  const { http } = createFakeHttp(() => ({ error: 'invalid_client' }));

  await assert.rejects(
    new SankhyaClient(config, http).authenticate(),
    (error: unknown) =>
      error instanceof SourceQueryError && error.message === 'authentication response carried no access token'
  );
});
