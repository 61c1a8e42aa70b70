import assert from 'assert';
import pg from 'pg';
import { logClientErrors, toClientConfig } from '../../../src/setup/database.ts';
import type { DatabaseConfig } from '../../../src/types.ts';
import { createTestLogger, LEVEL } from '../../lib/logger.ts';

const CONFIG: DatabaseConfig = {
  host: 'db.internal',
  database: 'reporting',
  user: 'etl',
  password: 'test-secret',
  port: 6432,
  sslMode: 'prefer',
};

describe('toClientConfig', () => {
  it('passes connection settings through', () => {
    const clientConfig = toClientConfig(CONFIG);

    assert.strictEqual(clientConfig.host, 'db.internal');
    assert.strictEqual(clientConfig.database, 'reporting');
    assert.strictEqual(clientConfig.user, 'etl');
    assert.strictEqual(clientConfig.password, 'test-secret');
    assert.strictEqual(clientConfig.port, 6432);
  });

  it('connects without TLS for disable, allow and prefer', () => {
    for (const sslMode of ['disable', 'allow', 'prefer'] as const) {
      assert.strictEqual(toClientConfig({ ...CONFIG, sslMode }).ssl, false);
    }
  });

  it('encrypts without verification for require', () => {
    assert.deepStrictEqual(toClientConfig({ ...CONFIG, sslMode: 'require' }).ssl, { rejectUnauthorized: false });
  });

  it('verifies the server for verify-ca and verify-full', () => {
    assert.deepStrictEqual(toClientConfig({ ...CONFIG, sslMode: 'verify-ca' }).ssl, { rejectUnauthorized: true });
    assert.deepStrictEqual(toClientConfig({ ...CONFIG, sslMode: 'verify-full' }).ssl, { rejectUnauthorized: true });
  });
});

describe('logClientErrors', () => {
  it('logs an error emitted while the client is idle instead of crashing', () => {
    const client = new pg.Client(toClientConfig(CONFIG));
    const { logger, lines } = createTestLogger();
    logClientErrors(client, logger);

    assert.doesNotThrow(() => client.emit('error', new Error('terminating connection due to idle-session timeout')));
    assert.strictEqual(lines.length, 1);
    assert.strictEqual(lines[0]?.level, LEVEL.error);
    assert.strictEqual(lines[0]?.msg, 'PostgreSQL connection error');
    assert.strictEqual(lines[0]?.error, 'terminating connection due to idle-session timeout');
  });
});
