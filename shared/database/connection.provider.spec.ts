/**
 * Unit tests for ConnectionProvider
 */

import { DataSourceOptions } from 'typeorm';
import { ConnectionError } from '../errors/database.errors';
import { LoggerService } from '../logger/logger.service';
import { ConnectionProvider, ManagedConnection, quoteIdentifier } from './connection.provider';

class FakeConnection implements ManagedConnection {
  isInitialized = false;
  initialize = jest.fn(async () => {
    this.isInitialized = true;
    return this;
  });
  destroy = jest.fn(async () => {
    this.isInitialized = false;
  });
  query = jest.fn();
}

describe('ConnectionProvider', () => {
  const config = {
    host: 'db.internal',
    port: 6543,
    name: 'inbox',
    user: 'inbox_reader',
    password: 'test-secret',
    schema: 'Puma_L1_AI',
    logging: false,
  };
  let connections: FakeConnection[];
  let factory: jest.Mock<ManagedConnection, [DataSourceOptions]>;
  let logger: { log: jest.Mock; error: jest.Mock; warn: jest.Mock };
  let provider: ConnectionProvider;

  beforeEach(() => {
    connections = [];
    factory = jest.fn<ManagedConnection, [DataSourceOptions]>(() => {
      const connection = new FakeConnection();
      connections.push(connection);
      return connection;
    });
    logger = { log: jest.fn(), error: jest.fn(), warn: jest.fn() };
    provider = new ConnectionProvider(config, factory, logger as unknown as LoggerService);
  });

  it('builds a single-connection postgres data source from the configuration', async () => {
    await provider.withConnection(async () => undefined);

    expect(factory).toHaveBeenCalledWith(
      expect.objectContaining({
        type: 'postgres',
        host: 'db.internal',
        port: 6543,
        database: 'inbox',
        username: 'inbox_reader',
        password: 'test-secret',
        synchronize: false,
        extra: { max: 1 },
      }),
    );
  });

  it('returns the result of the work and closes the connection', async () => {
    const result = await provider.withConnection(async (connection) => {
      expect(connection).toBe(connections[0]);
      return 'done';
    });

    expect(result).toBe('done');
    expect(connections[0].initialize).toHaveBeenCalledTimes(1);
    expect(connections[0].destroy).toHaveBeenCalledTimes(1);
  });

  it('closes the connection when the work throws', async () => {
    await expect(
      provider.withConnection(async () => {
        throw new Error('relation "email_inbox" does not exist');
      }),
    ).rejects.toThrow('relation "email_inbox" does not exist');

    expect(connections[0].destroy).toHaveBeenCalledTimes(1);
  });

  it('wraps a failed connect in ConnectionError without trying to close', async () => {
    factory.mockImplementationOnce(() => {
      const connection = new FakeConnection();
      connection.initialize.mockRejectedValueOnce(new Error('password authentication failed for user "inbox_reader"'));
      connections.push(connection);
      return connection;
    });
    const work = jest.fn();

    const attempt = provider.withConnection(work);

    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toThrow('password authentication failed for user "inbox_reader"');
    expect(work).not.toHaveBeenCalled();
    expect(connections[0].destroy).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      'Could not connect to db.internal:6543/inbox: password authentication failed for user "inbox_reader"',
      undefined,
      'ConnectionProvider',
    );
  });

  it('keeps the work result when closing fails', async () => {
    factory.mockImplementationOnce(() => {
      const connection = new FakeConnection();
      connection.destroy.mockRejectedValueOnce(new Error('socket hang up'));
      connections.push(connection);
      return connection;
    });

    await expect(provider.withConnection(async () => 42)).resolves.toBe(42);
    expect(logger.warn).toHaveBeenCalledWith('Failed to close connection: socket hang up', 'ConnectionProvider');
  });

  it('gives concurrent callers separate connections', async () => {
    await Promise.all([
      provider.withConnection(async () => 'a'),
      provider.withConnection(async () => 'b'),
      provider.withConnection(async () => 'c'),
    ]);

    expect(connections).toHaveLength(3);
    expect(new Set(connections).size).toBe(3);
    connections.forEach((connection) => expect(connection.destroy).toHaveBeenCalledTimes(1));
  });

  it('qualifies table names with the quoted schema', () => {
    expect(provider.table('email_inbox')).toBe('"Puma_L1_AI"."email_inbox"');
  });

  it('escapes embedded quotes in identifiers', () => {
    expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
  });
});
