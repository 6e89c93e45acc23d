/**
 * Unit tests for RecordsService
 */

import { Test, TestingModule } from '@nestjs/testing';
import { ConnectionProvider, QueryExecutor } from '../../shared/database/connection.provider';
import { RecordsService } from './records.service';

describe('RecordsService', () => {
  let service: RecordsService;
  let executor: { query: jest.Mock };
  let connectionProvider: { table: jest.Mock; withConnection: jest.Mock };

  beforeEach(async () => {
    executor = { query: jest.fn().mockResolvedValue([{ case_id: 3 }, { case_id: 2 }]) };
    connectionProvider = {
      table: jest.fn((name: string) => `"Puma_L1_AI"."${name}"`),
      withConnection: jest.fn((work: (connection: QueryExecutor) => Promise<unknown>) => work(executor)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [RecordsService, { provide: ConnectionProvider, useValue: connectionProvider }],
    }).compile();

    service = module.get<RecordsService>(RecordsService);
  });

  it.each(['cases', 'ai_decisions', 'risk_events'] as const)(
    'lists %s newest first with limit and offset',
    async (table) => {
      await service.listRecent(table, { limit: 20, offset: 40 });

      expect(executor.query).toHaveBeenCalledWith(
        `SELECT * FROM "Puma_L1_AI"."${table}" ORDER BY created_at DESC LIMIT $1 OFFSET $2`,
        [20, 40],
      );
    },
  );

  it('returns the rows untouched', async () => {
    await expect(service.listRecent('cases', { limit: 2, offset: 0 })).resolves.toEqual([
      { case_id: 3 },
      { case_id: 2 },
    ]);
  });

  it('propagates database errors', async () => {
    executor.query.mockRejectedValueOnce(new Error('relation "Puma_L1_AI.cases" does not exist'));

    await expect(service.listRecent('cases', { limit: 20, offset: 0 })).rejects.toThrow(
      'relation "Puma_L1_AI.cases" does not exist',
    );
  });
});
